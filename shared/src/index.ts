/**
 * @drawermap/shared - storage allocation and picking core
 *
 * Types, Zod schemas, the error taxonomy, the pure domain layer and the
 * services that connect it to disk and to the inventory system.
 */

// Entity types (pure interfaces)
export type * from './types/index.js';

// Zod schemas + inferred record types
export * from './schemas/index.js';

// Error codes, StorageError and review items
export * from './errors/index.js';

// Pure domain logic
export * from './domain/index.js';

// I/O services
export * from './services/index.js';

// Loggers
export {
    default as logger,
    catalogLogger,
    allocationLogger,
    pickingLogger,
    inventoryLogger,
    storeLogger,
} from './utils/logger.js';
