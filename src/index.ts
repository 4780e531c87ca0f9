export * from './services/identityResolution';
export { AppError, ConfigurationError, PartitionMismatchError } from './utils/errors';
export { logger } from './utils/logger';
