const ID_PREFIX = "NF-";
const MIN_DIGITS = 3;

/**
 * External identifier for a notification. Derived from the store-assigned
 * sequence number only; never persisted or assigned on its own.
 */
export function formatNotificationId(sequence: number): string {
  if (!Number.isSafeInteger(sequence) || sequence <= 0) {
    throw new Error("sequence must be a positive integer");
  }
  return `${ID_PREFIX}${String(sequence).padStart(MIN_DIGITS, "0")}`;
}

/**
 * Returns the sequence number for a canonical id (`NF-006`), or null.
 * Non-canonical spellings such as `NF-6` or `nf-006` are treated as unknown.
 */
export function parseNotificationId(id: string): number | null {
  const match = /^NF-(\d+)$/.exec(id);
  if (!match) return null;
  const sequence = Number(match[1]);
  if (!Number.isSafeInteger(sequence) || sequence <= 0) return null;
  return formatNotificationId(sequence) === id ? sequence : null;
}
