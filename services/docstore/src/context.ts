import type { AppConfig } from './config';
import { createAddressScheme } from './addressing';
import type { AddressScheme } from './addressing';
import type { DocumentStore } from './contracts/documentStore';
import { createSql } from './postgres/client';
import { ensureSchema } from './postgres/schema';
import { MemoryDocumentStore } from './storage/memoryDocumentStore';
import { PostgresDocumentStore } from './storage/postgresDocumentStore';

/**
 * Everything a handler needs, built once at startup and passed explicitly.
 * Handlers only read from it; the store's pool is the one shared mutable part.
 */
export interface AppContext {
  readonly config: AppConfig;
  readonly store: DocumentStore;
  readonly scheme: AddressScheme;
}

export function createContext(config: AppConfig, store: DocumentStore): AppContext {
  return Object.freeze({
    config,
    store,
    scheme: createAddressScheme(config.api),
  });
}

/** Builds the context with the store selected by `storeDriver`. */
export async function createAppContext(config: AppConfig): Promise<AppContext> {
  if (config.storeDriver === 'memory') {
    return createContext(config, new MemoryDocumentStore());
  }

  const sql = createSql(config.db);
  if (config.db.migrate) {
    try {
      await ensureSchema(sql, config.db.schema, config.api.resourceTypes);
    } catch (err) {
      await sql.end({ timeout: 2 });
      throw err;
    }
  }
  return createContext(config, new PostgresDocumentStore(sql, config.db.schema));
}
