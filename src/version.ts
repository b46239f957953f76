import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const PackageJsonSchema = z.object({ version: z.string().optional() });

function readVersion(relativePath: string): string {
  const pkgPath = new URL(relativePath, import.meta.url);
  const pkg = PackageJsonSchema.parse(JSON.parse(readFileSync(fileURLToPath(pkgPath), 'utf-8')));
  return pkg.version ?? '0.0.0';
}

/**
 * Service version (single source of truth)
 *
 * Reads from package.json by default, with optional env override.
 * Reported by /healthz.
 *
 * Uses import.meta.url for path resolution to work correctly in both:
 * - Dev mode: tsx src/server.ts (executes .ts from src/)
 * - Prod mode: node dist/src/server.js (executes .js from dist/src/)
 */
export const SERVICE_VERSION =
  process.env.SERVICE_VERSION ??
  ((): string => {
    try {
      // From src/version.ts: ../ goes to root (where package.json lives)
      return readVersion('../package.json');
    } catch {
      // Fallback: one more level up (dist/src/version.js)
      try {
        return readVersion('../../package.json');
      } catch {
        return '0.0.0';
      }
    }
  })();

export const SERVICE_NAME = 'requirements-extractor-service';
