/**
 * @klinecheck/utils
 *
 * Shared utility functions and helpers
 */

// Logger
export * from './logger/logger';
export * from './logger/log-config';
export * from './logger/file-transport';

// Errors
export * from './errors/kline-errors';

// Configuration
export * from './config/load-config';

// Time utilities
export * from './time/timestamp';

// Kline normalization and export
export * from './kline/cells';
export * from './kline/normalize-klines';
export * from './kline/kline-csv';
