/**
 * Storage Factory
 *
 * Opens the better-sqlite3 backend from a path or a full configuration.
 */

import type { StorageBackend } from './backend.js';
import type { StorageConfig } from './types.js';
import { createNodeStorage } from './node-backend.js';

/**
 * Create a storage backend.
 *
 * @param config - Database path (or `:memory:`), or a full storage configuration
 * @returns An open storage backend
 *
 * @example
 * ```typescript
 * import { createStorage, initializeSchema } from '@worklane/storage';
 *
 * const storage = createStorage('./.worklane/worklane.db');
 * initializeSchema(storage);
 * ```
 */
export function createStorage(config: StorageConfig | string): StorageBackend {
  return createNodeStorage(typeof config === 'string' ? { path: config } : config);
}
