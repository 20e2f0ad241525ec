/**
 * Numeric codes carried by every wallet storage error.
 */
export enum StorageErrorCode {
	ERROR = 1,
	NOT_FOUND = 2,
	STORAGE = 3,
	DECRYPTION = 4,
	SCHEMA = 5,
	INCONSISTENT = 6,
	FORMAT = 7,
	SECRET_MANAGER = 8,
	MISUSE = 9,
}

/**
 * Base class for wallet storage errors.
 * Carries a status code and, for wrapped failures, the underlying error.
 */
export class WalletStorageError extends Error {
	public code: StorageErrorCode;
	public cause?: unknown;

	constructor(message: string, code: StorageErrorCode = StorageErrorCode.ERROR, cause?: unknown) {
		super(message);
		this.code = code;
		this.name = 'WalletStorageError';
		this.cause = cause;

		// Maintain stack trace in V8
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, WalletStorageError);
		}
	}
}

/**
 * The requested key has no record.
 */
export class RecordNotFoundError extends WalletStorageError {
	public readonly key: string;

	constructor(key: string) {
		super(`record not found: ${key}`, StorageErrorCode.NOT_FOUND);
		this.key = key;
		this.name = 'RecordNotFoundError';
		Object.setPrototypeOf(this, RecordNotFoundError.prototype);
	}
}

/**
 * Failure reported by a storage engine. The engine's message is kept
 * verbatim; the original error is available as `cause`.
 */
export class StorageError extends WalletStorageError {
	constructor(detail: string, cause?: unknown) {
		super(detail, StorageErrorCode.STORAGE, cause);
		this.name = 'StorageError';
		Object.setPrototypeOf(this, StorageError.prototype);
	}
}

/**
 * An encrypted record could not be authenticated or decoded.
 */
export class DecryptionError extends WalletStorageError {
	constructor(message: string = 'decryption failed: wrong key or corrupted record') {
		super(message, StorageErrorCode.DECRYPTION);
		this.name = 'DecryptionError';
		Object.setPrototypeOf(this, DecryptionError.prototype);
	}
}

/**
 * The persisted schema version differs from the running one.
 */
export class UnsupportedSchemaVersionError extends WalletStorageError {
	public readonly found: number;
	public readonly expected: number;

	constructor(found: number, expected: number) {
		super(`unsupported database schema version ${found} (expected ${expected})`, StorageErrorCode.SCHEMA);
		this.found = found;
		this.expected = expected;
		this.name = 'UnsupportedSchemaVersionError';
		Object.setPrototypeOf(this, UnsupportedSchemaVersionError.prototype);
	}
}

/**
 * The account index registry names an account whose record is missing.
 * This is an internal-consistency violation, not a user error.
 */
export class InconsistentRegistryError extends WalletStorageError {
	public readonly accountIndex: number;

	constructor(accountIndex: number) {
		super(`account index ${accountIndex} is registered but has no record`, StorageErrorCode.INCONSISTENT);
		this.accountIndex = accountIndex;
		this.name = 'InconsistentRegistryError';
		Object.setPrototypeOf(this, InconsistentRegistryError.prototype);
	}
}

/**
 * A stored value is not valid JSON or does not match its expected shape.
 */
export class SerializationError extends WalletStorageError {
	public readonly key: string;

	constructor(key: string, detail: string, cause?: unknown) {
		super(`invalid record ${key}: ${detail}`, StorageErrorCode.FORMAT, cause);
		this.key = key;
		this.name = 'SerializationError';
		Object.setPrototypeOf(this, SerializationError.prototype);
	}
}

/**
 * A secret manager snapshot cannot be turned back into a secret manager.
 */
export class SecretManagerError extends WalletStorageError {
	constructor(message: string) {
		super(message, StorageErrorCode.SECRET_MANAGER);
		this.name = 'SecretManagerError';
		Object.setPrototypeOf(this, SecretManagerError.prototype);
	}
}

/**
 * Error thrown when the API is used incorrectly
 */
export class MisuseError extends WalletStorageError {
	constructor(message: string = 'API misuse') {
		super(message, StorageErrorCode.MISUSE);
		this.name = 'MisuseError';
		Object.setPrototypeOf(this, MisuseError.prototype);
	}
}

/**
 * Wrap an engine failure into a StorageError, leaving errors that already
 * belong to the taxonomy untouched.
 */
export function toStorageError(error: unknown): WalletStorageError {
	if (error instanceof WalletStorageError) {
		return error;
	}
	const detail = error instanceof Error ? error.message : String(error);
	return new StorageError(detail, error);
}
