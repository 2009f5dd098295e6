/** current ISO timestamp */
export function isoTimestamp(): string {
  return new Date().toISOString();
}

/**
 * Timestamp in the DID resolution metadata format: YYYY-MM-DDTHH:MM:SSZ (UTC,
 * whole seconds).
 */
export function didTimestamp(date: Date = new Date()): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}
