/**
 * @unread/types - Type definitions for the unread usage analyzer
 */

// Declarations and report tuples
export * from './declarations.js';

// Branded ids
// Selective export: brandDeclarationId() is exported for the registry only
export type { DeclarationId } from './branded.js';
export { brandDeclarationId } from './branded.js';

// Access contexts and roles
export * from './access.js';

// Declaration sites and policies
export * from './sites.js';

// Logging
export * from './logging.js';

// Configuration
export * from './config.js';
