/**
 * Vitest Global Setup
 *
 * Runs before each test file. Resets the config cache so tests can use
 * vi.stubEnv() to set environment variables that the config module picks up.
 */

import { beforeAll, beforeEach } from "vitest";
import { _resetConfigCache } from "./src/config/index.js";

/**
 * Reset config cache before ALL tests in a file, so vi.stubEnv() calls at
 * file level and in beforeAll (before build()) are respected.
 */
beforeAll(() => {
  _resetConfigCache();
});

/**
 * Reset config cache before each test, so env changes in one test don't
 * leak into the next.
 */
beforeEach(() => {
  _resetConfigCache();
});
