/**
 * Requirements extraction demo: runs the full pipeline over a built-in
 * laundromat description and prints the grouped requirements.
 *
 * Usage:
 *   npm run demo
 */

import { extractAndFormat } from "../src/requirements/index.js";
import { getErrorMessage } from "../src/utils/errors.js";
import { log } from "../src/utils/telemetry.js";

const EXAMPLE_DESCRIPTION = `
A neighbourhood laundromat rents washing machines and dryers to walk-in customers and to customers who book ahead.
Customers should be able to reserve a machine through the online booking page before they arrive.
The customer must pay for each cycle with a prepaid card, coins or a mobile payment account.
Each machine reports its remaining cycle time to the kiosk in the lobby.
The system will send a notification to the customer when the laundry is ready for collection.
The owner should review customer feedback and track machine faults every week.
Staff can mark a machine as out of order while a technician repairs it.
`;

function main(): void {
  const requirements = extractAndFormat(EXAMPLE_DESCRIPTION);
  requirements.forEach((requirement, i) => {
    console.log(`${i + 1}. ${requirement}`);
  });
}

try {
  main();
} catch (error) {
  log.error({ error_message: getErrorMessage(error) }, "Requirements extraction failed");
  process.exitCode = 1;
}
