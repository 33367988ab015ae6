export const ENCRYPTED_PREFIX = "encrypted:"

/**
 * Whether a value is ciphertext marked for decryption.
 */
export function isEncrypted(value: string): boolean {
  return value.startsWith(ENCRYPTED_PREFIX)
}
