import createError from '@fastify/error';

// File center errors (STORE_*, FILE_*, PAYLOAD_*, INVALID_TOKEN)

/** Backing store unreachable or an operation on it failed (503) */
export const StoreUnavailableError = createError<[string]>(
  'STORE_UNAVAILABLE',
  'File store unavailable during %s',
  503
);

/** Persisted schema version is newer than this library understands (500) */
export const StoreVersionError = createError<[number, number]>(
  'STORE_VERSION_UNSUPPORTED',
  'File store schema version is %s, but only versions up to %s are supported',
  500
);

/** No retrievable file for the identifier: unknown, expired or already consumed (404) */
export const FileNotFoundError = createError('FILE_NOT_FOUND', 'File not found', 404);

/** Token is malformed or was not issued with the current key (400) */
export const InvalidTokenError = createError('INVALID_TOKEN', 'Invalid file token', 400);

/** Input is larger than the configured maximum file size (413) */
export const PayloadTooLargeError = createError<[number]>(
  'PAYLOAD_TOO_LARGE',
  'File exceeds the maximum size of %s bytes',
  413
);

/** Stored chunks do not add up to the recorded file (500) */
export const InconsistentPayloadError = createError<[string]>(
  'PAYLOAD_INCONSISTENT',
  'Stored payload is inconsistent: %s',
  500
);

/** File size threshold outside the supported range (500) */
export const FileSizeThresholdError = createError<[number]>(
  'FILE_SIZE_THRESHOLD_INVALID',
  'File size threshold %s is out of range',
  500
);

/** True for any error raised by the file center itself, as opposed to a store driver */
export function isFileCenterError(error: unknown): boolean {
  return (
    error instanceof StoreUnavailableError ||
    error instanceof StoreVersionError ||
    error instanceof FileNotFoundError ||
    error instanceof InvalidTokenError ||
    error instanceof PayloadTooLargeError ||
    error instanceof InconsistentPayloadError ||
    error instanceof FileSizeThresholdError
  );
}
