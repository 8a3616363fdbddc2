const UPPER_HEX = /^[0-9A-F]{40}$/;

/**
 * A relay fingerprint is the 40 character upper-case hex SHA-1 of its identity key.
 */
export function isFingerprintValid(fingerprint?: string): fingerprint is string {
  if (!fingerprint) return false;
  return UPPER_HEX.test(fingerprint);
}
