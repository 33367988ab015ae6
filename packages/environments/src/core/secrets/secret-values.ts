import type { ValueCipher } from "../../ports/cipher"
import type { ReadonlyVariableMap, VariableMap } from "../../ports/variables"
import { SecretError } from "../errors/secret-error"
import { ENCRYPTED_PREFIX, isEncrypted } from "./encrypted-values"

export type DecryptOptions = {
  cipher?: ValueCipher | undefined
  privateKey?: string | undefined
}

export type EncryptOptions = {
  cipher: ValueCipher
  publicKey: string
}

/**
 * Marks the cipher output with the `encrypted:` prefix.
 *
 * @throws {SecretError} `encryption_failed` with the cipher error as `cause`
 */
export function encryptValue(plaintext: string, { cipher, publicKey }: EncryptOptions): string {
  try {
    return `${ENCRYPTED_PREFIX}${cipher.encrypt(plaintext, publicKey)}`
  } catch (err) {
    throw new SecretError({ kind: "encryption_failed" }, err)
  }
}

/**
 * Decrypts one value when it is marked encrypted; other values pass through.
 *
 * @param key - Variable name, reported on failure
 * @throws {SecretError}
 */
export function decryptValue(key: string, value: string, options: DecryptOptions): string {
  if (!isEncrypted(value)) return value

  const { cipher, privateKey } = options
  if (!cipher) throw new SecretError({ kind: "missing_cipher" })
  if (privateKey === undefined) throw new SecretError({ kind: "missing_private_key" })

  try {
    return cipher.decrypt(value.slice(ENCRYPTED_PREFIX.length), privateKey)
  } catch (err) {
    throw new SecretError({ kind: "decryption_failed", key }, err)
  }
}

/**
 * Returns a new mapping with every encrypted value decrypted.
 *
 * Mappings without encrypted values need neither a cipher nor a key.
 *
 * @throws {SecretError}
 */
export function decryptVariables(variables: ReadonlyVariableMap, options: DecryptOptions): VariableMap {
  const decrypted: VariableMap = new Map()

  for (const [key, value] of variables) {
    decrypted.set(key, decryptValue(key, value, options))
  }

  return decrypted
}
