import type { Sql } from 'postgres';
import { toStoreError } from '../errors';
import type { DocumentStore, StoreCallOptions } from '../contracts/documentStore';
import type { Identifier, JsonText, ResourceType, StoredDocument } from '../types';

type Cancellable = PromiseLike<unknown> & { cancel(): void };

/**
 * Implements `DocumentStore` on Postgres JSONB tables through Postgres.js.
 * Each method issues exactly one statement; the JSON body travels as text
 * and is cast to `jsonb` by the server, so the service never parses it.
 */
export class PostgresDocumentStore implements DocumentStore {
  constructor(
    private readonly sql: Sql,
    private readonly schema: string,
  ) {}

  async allocate(type: ResourceType, opts: StoreCallOptions = {}): Promise<Identifier> {
    const rows = await this.run('allocate', opts, this.sql<{ identifier: string }[]>`
      INSERT INTO ${this.sql(this.schema)}.${this.sql(type)} DEFAULT VALUES
      RETURNING identifier
    `);
    return this.firstIdentifier(rows, 'allocate');
  }

  async create(type: ResourceType, body: JsonText, opts: StoreCallOptions = {}): Promise<Identifier> {
    const rows = await this.run('create', opts, this.sql<{ identifier: string }[]>`
      INSERT INTO ${this.sql(this.schema)}.${this.sql(type)} (body)
      VALUES (${body}::jsonb)
      RETURNING identifier
    `);
    return this.firstIdentifier(rows, 'create');
  }

  async get(type: ResourceType, id: Identifier, opts: StoreCallOptions = {}): Promise<StoredDocument | null> {
    const rows = await this.run('get', opts, this.sql<{ identifier: string; body: string | null }[]>`
      SELECT identifier, body::text AS body
      FROM ${this.sql(this.schema)}.${this.sql(type)}
      WHERE identifier = ${id}
    `);
    const row = rows[0];
    if (!row) return null;
    return { identifier: row.identifier, body: row.body };
  }

  async replace(type: ResourceType, id: Identifier, body: JsonText, opts: StoreCallOptions = {}): Promise<boolean> {
    const rows = await this.run('replace', opts, this.sql<{ identifier: string }[]>`
      UPDATE ${this.sql(this.schema)}.${this.sql(type)}
      SET body = ${body}::jsonb
      WHERE identifier = ${id}
      RETURNING identifier
    `);
    return rows.length > 0;
  }

  async upsert(type: ResourceType, id: Identifier, body: JsonText, opts: StoreCallOptions = {}): Promise<boolean> {
    // xmax is 0 only on a freshly inserted tuple
    const rows = await this.run('upsert', opts, this.sql<{ inserted: boolean }[]>`
      INSERT INTO ${this.sql(this.schema)}.${this.sql(type)} (identifier, body)
      VALUES (${id}, ${body}::jsonb)
      ON CONFLICT (identifier) DO UPDATE SET body = EXCLUDED.body
      RETURNING (xmax = 0) AS inserted
    `);
    return rows[0]?.inserted === true;
  }

  async delete(type: ResourceType, id: Identifier, opts: StoreCallOptions = {}): Promise<boolean> {
    const rows = await this.run('delete', opts, this.sql<{ identifier: string }[]>`
      DELETE FROM ${this.sql(this.schema)}.${this.sql(type)}
      WHERE identifier = ${id}
      RETURNING identifier
    `);
    return rows.length > 0;
  }

  async ping(): Promise<void> {
    await this.run('ping', {}, this.sql`SELECT 1 AS probe`);
  }

  async close(): Promise<void> {
    await this.sql.end({ timeout: 5 });
  }

  /**
   * Awaits a pending query, cancelling it server-side when the signal fires,
   * and wraps driver failures in `StoreError`.
   */
  private async run<Q extends Cancellable>(operation: string, opts: StoreCallOptions, query: Q): Promise<Awaited<Q>> {
    const { signal } = opts;
    const onAbort = () => query.cancel();
    if (signal) {
      if (signal.aborted) onAbort();
      else signal.addEventListener('abort', onAbort, { once: true });
    }
    try {
      return await query;
    } catch (err) {
      throw toStoreError(err, operation);
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private firstIdentifier(rows: ReadonlyArray<{ identifier: string }>, operation: string): Identifier {
    const row = rows[0];
    if (!row) throw toStoreError(new Error('no identifier returned'), operation);
    return row.identifier;
  }
}
