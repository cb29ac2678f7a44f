/**
 * @brdocs/contracts
 *
 * TypeScript interfaces and types for the brdocs document toolkit.
 * This package has zero runtime dependencies beyond its constant tables.
 *
 * @packageDocumentation
 */

// Documents
export * from './document/kinds.js';
export * from './document/info.js';

// Detection
export * from './detection/result.js';

// Registry
export * from './registry/registry.js';

// Randomness
export * from './random/random-source.js';
