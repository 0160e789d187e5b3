/**
 * @nfse-reader/contracts
 *
 * Types shared by the NFS-e reader packages.
 * This package has zero runtime dependencies.
 *
 * @packageDocumentation
 */

// Core types
export * from './core/invoice.js';
export * from './core/diagnostic.js';

// XML tree
export * from './xml/node.js';

// Extraction
export * from './extraction/config.js';

// Batch
export * from './batch/result.js';
