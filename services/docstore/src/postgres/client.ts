import postgres from 'postgres';
import type { Sql } from 'postgres';
import type { DatabaseConfig } from '../config';

/**
 * Creates the Postgres.js client. The client owns a connection pool that is
 * safe for concurrent use; callers share one instance for the process.
 */
export function createSql(db: DatabaseConfig): Sql {
  return postgres({
    host: db.host,
    port: db.port,
    database: db.database,
    username: db.username,
    password: db.password,
    ssl: db.sslMode === 'disable' ? false : db.sslMode,
    max: db.poolMax,
    idle_timeout: 20,
    connect_timeout: 10,
    onnotice: () => undefined,
  });
}
