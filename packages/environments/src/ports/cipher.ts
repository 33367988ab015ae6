/**
 * Encryption collaborator for variable values.
 *
 * Implementations work on the bare ciphertext; marking values as encrypted
 * (the `encrypted:` prefix) is done by the caller.
 */
export interface ValueCipher {
  encrypt(plaintext: string, publicKey: string): string

  /**
   * @throws when the key does not match or the ciphertext is corrupt
   */
  decrypt(ciphertext: string, privateKey: string): string
}
