/**
 * Summary: Barrel exports for infrastructure adapters.
 */

export * from './sqlite';
export * from './logger/pinoLogger';
