import createError from '@fastify/error';

// Configuration errors (CONFIG_*)
export const ConfigInvalidError = createError<[string]>(
  'CONFIG_INVALID',
  'Invalid configuration: %s',
  500
);

export const ConfigMissingError = createError<[string]>(
  'CONFIG_MISSING',
  'Missing configuration file: %s',
  500
);

export const ConfigParseError = createError<[string]>(
  'CONFIG_PARSE_ERROR',
  'Failed to parse configuration: %s',
  500
);

// Server errors (SERVER_*)
export const ServerStartError = createError<[string]>(
  'SERVER_START_ERROR',
  'Failed to start server: %s',
  500
);

// Request errors (FILE_REQUIRED)
export const FileRequiredError = createError(
  'FILE_REQUIRED',
  'No file provided. Send a multipart/form-data request with a "file" field.',
  400
);

// File center errors (STORE_*, FILE_*, PAYLOAD_*, INVALID_TOKEN) - re-exported from file center domain
export {
  StoreUnavailableError,
  StoreVersionError,
  FileNotFoundError,
  InvalidTokenError,
  PayloadTooLargeError,
  InconsistentPayloadError,
  FileSizeThresholdError,
  isFileCenterError,
} from '../file-center/errors.js';
