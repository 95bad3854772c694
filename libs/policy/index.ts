/**
 * Public exports for the versioned policy store.
 */

// Types
export type { AttachedMetadata, Metadata, MetadataJson } from './types.js';
export { AttachedMetadataSchema, MetadataSchema, metadataToJson } from './types.js';

// Content
export type { ContentCodec } from './codec.js';
export { ContentCodecError, createJsonCodec } from './codec.js';

// Errors
export type { PolicyStoreErrorCode } from './errors.js';
export {
    PolicyContentError,
    PolicyStoreAbortedError,
    PolicyStoreConnectError,
    PolicyStoreError,
    PolicyStoreQueryError,
} from './errors.js';

// Backends
export type { PostgresConnectorOptions } from './postgresConnector.js';
export { PostgresPolicyConnector } from './postgresConnector.js';
export type { MemoryConnectorOptions } from './memoryConnector.js';
export { MemoryPolicyConnector } from './memoryConnector.js';
export type { Migration } from './migrations.js';
export { POLICY_MIGRATIONS, migratePolicyStore } from './migrations.js';
