/**
 * Core Module
 *
 * Exports domain types, ports, and use cases.
 * This is all you need to understand the business logic.
 */

export * from './domain';
export * from './fingerprint';
export * from './importance';
export * from './ports';
export * from './usecases';
