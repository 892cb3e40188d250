import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto'
import { SecretError } from './errors.js'

const ALGORITHM = 'aes-256-cbc'
const KEY_BYTES = 32
const IV_BYTES = 16
const SEPARATOR = '!'

/** Returns a fresh base64-encoded 256-bit key suitable for `encryptString`. */
export function generateKey(): string {
  return randomBytes(KEY_BYTES).toString('base64')
}

function decodeKey(secret: string): Buffer {
  const key = Buffer.from(secret, 'base64')
  if (key.length !== KEY_BYTES) {
    throw new SecretError(`Secret must be a base64-encoded ${KEY_BYTES}-byte key`)
  }
  return key
}

/**
 * Encrypts `plainText` as `base64(iv)!base64(ciphertext)`.
 * Empty input is returned as is.
 */
export function encryptString(plainText: string, secret: string): string {
  if (!plainText) {
    return plainText
  }

  const key = decodeKey(secret)
  const iv = randomBytes(IV_BYTES)
  const cipher = createCipheriv(ALGORITHM, key, iv)
  const encrypted = Buffer.concat([cipher.update(plainText, 'utf8'), cipher.final()])

  return `${iv.toString('base64')}${SEPARATOR}${encrypted.toString('base64')}`
}

export function decryptString(encryptedValue: string, secret: string): string {
  if (!encryptedValue) {
    return encryptedValue
  }

  const key = decodeKey(secret)
  const parts = encryptedValue.split(SEPARATOR)
  if (parts.length !== 2) {
    throw new SecretError('Encrypted value is not in iv!ciphertext form')
  }

  const [ivText, cipherText] = parts
  const iv = Buffer.from(ivText, 'base64')
  if (iv.length !== IV_BYTES) {
    throw new SecretError('Encrypted value carries an invalid IV')
  }

  try {
    const decipher = createDecipheriv(ALGORITHM, key, iv)
    const decrypted = Buffer.concat([decipher.update(Buffer.from(cipherText, 'base64')), decipher.final()])
    return decrypted.toString('utf8')
  } catch (err) {
    throw new SecretError('Failed to decrypt value with the supplied secret', { cause: err })
  }
}
