/**
 * @klinecheck/schemas
 *
 * Single source of truth for the kline data model, its field maps,
 * and the environment configuration schema
 */

// Market data schemas
export * from './market/kline.schema';

// Environment and configuration schemas
export * from './env/config.schema';
