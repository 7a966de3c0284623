export * from './types/logging.types';
export * from './utils/logger';
export * from './utils/duration';
export * from './utils/truncate';
export * from './errors/AppError';
export * from './errors/PreconditionError';
