import type { Sql } from 'postgres';
import type { ResourceType } from '../types';

export function bodyIndexName(type: ResourceType): string {
  return `${type}_body_gin_idx`;
}

/**
 * Creates the schema, one table per resource type and the GIN index over each
 * body column. Idempotent; safe to run on every start.
 *
 * Table shape:
 *   identifier UUID PRIMARY KEY DEFAULT gen_random_uuid()
 *   body       JSONB
 */
export async function ensureSchema(sql: Sql, schema: string, types: Iterable<ResourceType>): Promise<void> {
  await sql`CREATE SCHEMA IF NOT EXISTS ${sql(schema)}`;

  for (const type of types) {
    await sql`
      CREATE TABLE IF NOT EXISTS ${sql(schema)}.${sql(type)} (
        identifier UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        body JSONB
      )
    `;
    await sql`
      CREATE INDEX IF NOT EXISTS ${sql(bodyIndexName(type))}
        ON ${sql(schema)}.${sql(type)} USING GIN (body)
    `;
  }
}
