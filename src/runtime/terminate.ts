/**
 * Reserved exit status for telemetry misconfiguration. A program that asked
 * for telemetry and can't have it stops before doing any work.
 */
export const EXIT_CONFIGURATION_FAILURE = 99;

export function terminate(message: string): never {
  process.stderr.write(`${message}\n`);
  process.exit(EXIT_CONFIGURATION_FAILURE);
}
