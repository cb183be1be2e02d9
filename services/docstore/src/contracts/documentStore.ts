import type { Identifier, JsonText, ResourceType, StoredDocument } from '../types';

/** Per-call options. Aborting the signal asks the backend to cancel the statement. */
export interface StoreCallOptions {
  signal?: AbortSignal;
}

/**
 * Pluggable persistence for JSON documents, one table per resource type.
 * Every method is a single statement against the backend.
 */
export interface DocumentStore {
  /** Reserves a new identifier with an empty body. */
  allocate(type: ResourceType, opts?: StoreCallOptions): Promise<Identifier>;
  /** Inserts a document under a new identifier. */
  create(type: ResourceType, body: JsonText, opts?: StoreCallOptions): Promise<Identifier>;
  get(type: ResourceType, id: Identifier, opts?: StoreCallOptions): Promise<StoredDocument | null>;
  /** Overwrites the body of an existing row; false when no row matches. */
  replace(type: ResourceType, id: Identifier, body: JsonText, opts?: StoreCallOptions): Promise<boolean>;
  /** Writes the body, inserting the row when absent; true when it was inserted. */
  upsert(type: ResourceType, id: Identifier, body: JsonText, opts?: StoreCallOptions): Promise<boolean>;
  delete(type: ResourceType, id: Identifier, opts?: StoreCallOptions): Promise<boolean>;
  ping(): Promise<void>;
  close(): Promise<void>;
}
