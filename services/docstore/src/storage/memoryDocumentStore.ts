import { randomUUID } from 'crypto';
import { StoreError } from '../errors';
import type { DocumentStore, StoreCallOptions } from '../contracts/documentStore';
import type { Identifier, JsonText, ResourceType, StoredDocument } from '../types';

/**
 * In-process `DocumentStore` for local development and tests.
 * One Map per resource type stands in for one table.
 */
export class MemoryDocumentStore implements DocumentStore {
  private readonly tables = new Map<ResourceType, Map<Identifier, JsonText | null>>();

  constructor(private readonly generateId: () => Identifier = randomUUID) {}

  async allocate(type: ResourceType, opts: StoreCallOptions = {}): Promise<Identifier> {
    return this.insert(type, null, opts);
  }

  async create(type: ResourceType, body: JsonText, opts: StoreCallOptions = {}): Promise<Identifier> {
    return this.insert(type, body, opts);
  }

  async get(type: ResourceType, id: Identifier, opts: StoreCallOptions = {}): Promise<StoredDocument | null> {
    this.checkSignal(opts);
    const table = this.table(type);
    if (!table.has(id)) return null;
    return { identifier: id, body: table.get(id) ?? null };
  }

  async replace(type: ResourceType, id: Identifier, body: JsonText, opts: StoreCallOptions = {}): Promise<boolean> {
    this.checkSignal(opts);
    const table = this.table(type);
    if (!table.has(id)) return false;
    table.set(id, body);
    return true;
  }

  async upsert(type: ResourceType, id: Identifier, body: JsonText, opts: StoreCallOptions = {}): Promise<boolean> {
    this.checkSignal(opts);
    const table = this.table(type);
    const inserted = !table.has(id);
    table.set(id, body);
    return inserted;
  }

  async delete(type: ResourceType, id: Identifier, opts: StoreCallOptions = {}): Promise<boolean> {
    this.checkSignal(opts);
    return this.table(type).delete(id);
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {
    this.tables.clear();
  }

  /** Number of rows in a resource type's table. */
  size(type: ResourceType): number {
    return this.tables.get(type)?.size ?? 0;
  }

  private insert(type: ResourceType, body: JsonText | null, opts: StoreCallOptions): Identifier {
    this.checkSignal(opts);
    const table = this.table(type);
    const id = this.generateId();
    // primary key constraint
    if (table.has(id)) {
      throw new StoreError(`duplicate key value violates unique constraint on ${type}.identifier`);
    }
    table.set(id, body);
    return id;
  }

  private table(type: ResourceType): Map<Identifier, JsonText | null> {
    let table = this.tables.get(type);
    if (!table) {
      table = new Map();
      this.tables.set(type, table);
    }
    return table;
  }

  private checkSignal(opts: StoreCallOptions): void {
    if (opts.signal?.aborted) {
      throw new StoreError('statement cancelled', { timeout: true });
    }
  }
}
