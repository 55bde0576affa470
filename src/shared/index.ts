export * from './logging/Logger';
export * from './errors/AppError';
export * from './errors/ErrorHandler';
export * from './utils/sleep';
export * from './utils/clock';
export * from './utils/format';
