/**
 * Use Cases Index
 *
 * Re-exports all use cases from their domain-specific modules.
 */

// Tiered classification engine
export * from './classification-usecases';

// Folder scanning and routing
export * from './scan-usecases';

// Correction folders
export * from './feedback-usecases';

// Filter export, folder discovery, statistics
export * from './rules-usecases';

// Factory
export { createUseCases, type UseCases } from './factory';
