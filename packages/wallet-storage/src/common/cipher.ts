/**
 * Record encryption.
 *
 * AES-256-GCM with a caller-supplied 256-bit key and a fresh random IV per
 * record. The envelope is base64 text so it can be stored wherever a plain
 * record value can:
 *
 *   base64( [version(1)] [iv(12)] [authTag(16)] [ciphertext(...)] )
 */

import { randomBytes, createCipheriv, createDecipheriv } from 'node:crypto';
import { DecryptionError, MisuseError } from './errors.js';

const ALGORITHM = 'aes-256-gcm';
export const ENCRYPTION_KEY_LENGTH = 32;
const IV_LENGTH = 12;
const AUTH_TAG_LENGTH = 16;

const ENVELOPE_VERSION = 0x01;
const ENVELOPE_OVERHEAD = 1 + IV_LENGTH + AUTH_TAG_LENGTH;

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Throw unless the key is exactly ENCRYPTION_KEY_LENGTH bytes.
 */
export function assertEncryptionKey(key: Uint8Array): void {
	if (key.byteLength !== ENCRYPTION_KEY_LENGTH) {
		throw new MisuseError(`encryption key must be ${ENCRYPTION_KEY_LENGTH} bytes, got ${key.byteLength}`);
	}
}

/**
 * Encrypt a UTF-8 record value into a base64 envelope.
 */
export function encryptRecord(plaintext: string, key: Uint8Array): string {
	assertEncryptionKey(key);
	const iv = randomBytes(IV_LENGTH);

	const cipher = createCipheriv(ALGORITHM, key, iv, { authTagLength: AUTH_TAG_LENGTH });
	const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
	const authTag = cipher.getAuthTag();

	return Buffer.concat([
		Buffer.from([ENVELOPE_VERSION]),
		iv,
		authTag,
		ciphertext,
	]).toString('base64');
}

/**
 * Decrypt a base64 envelope produced by encryptRecord().
 *
 * @throws DecryptionError if the envelope is malformed or fails authentication.
 *   No partial plaintext is ever returned.
 */
export function decryptRecord(envelope: string, key: Uint8Array): string {
	assertEncryptionKey(key);
	if (!BASE64_PATTERN.test(envelope)) {
		throw new DecryptionError('decryption failed: record is not an encrypted envelope');
	}

	const data = Buffer.from(envelope, 'base64');
	if (data.length < ENVELOPE_OVERHEAD) {
		throw new DecryptionError('decryption failed: envelope too short');
	}

	const version = data[0];
	if (version !== ENVELOPE_VERSION) {
		throw new DecryptionError(`decryption failed: unsupported envelope version ${version}`);
	}

	let offset = 1;
	const iv = data.subarray(offset, offset + IV_LENGTH);
	offset += IV_LENGTH;

	const authTag = data.subarray(offset, offset + AUTH_TAG_LENGTH);
	offset += AUTH_TAG_LENGTH;

	const ciphertext = data.subarray(offset);

	const decipher = createDecipheriv(ALGORITHM, key, iv, { authTagLength: AUTH_TAG_LENGTH });
	decipher.setAuthTag(authTag);

	let plaintext: Buffer;
	try {
		plaintext = Buffer.concat([decipher.update(ciphertext), decipher.final()]);
	} catch {
		throw new DecryptionError();
	}
	return plaintext.toString('utf8');
}

/**
 * Decode a hex string (64 characters) into an encryption key.
 */
export function encryptionKeyFromHex(hex: string): Uint8Array {
	if (!/^[0-9a-fA-F]*$/.test(hex) || hex.length !== ENCRYPTION_KEY_LENGTH * 2) {
		throw new MisuseError(`encryption key must be ${ENCRYPTION_KEY_LENGTH * 2} hex characters`);
	}
	return new Uint8Array(Buffer.from(hex, 'hex'));
}
