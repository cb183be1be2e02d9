import 'dotenv/config';
import { z } from 'zod';

const RESOURCE_TYPE_PATTERN = /^[a-z][a-z0-9_]*$/;

const seconds = (fallback: number) =>
  z
    .preprocess((v) => (typeof v === 'string' && v.trim() !== '' ? Number(v) : undefined), z.number().int().positive().optional())
    .transform((v) => v ?? fallback);

const flag = z
  .enum(['true', 'false', '1', '0', ''])
  .optional()
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  APP_DB_USERNAME: z.string().default('root'),
  APP_DB_PASSWORD: z.string().default(''),
  APP_DB_NAME: z.string().min(1).default('documents'),
  APP_DB_IP: z.string().min(1).default('127.0.0.1'),
  APP_DB_PORT: z.coerce.number().int().positive().max(65535).default(5432),
  APP_DB_SSL_MODE: z.enum(['disable', 'prefer', 'require', 'verify-full']).default('disable'),
  APP_DB_SCHEMA: z.string().regex(RESOURCE_TYPE_PATTERN, 'schema must be a lowercase identifier').default('public'),
  APP_DB_POOL_MAX: z.coerce.number().int().positive().default(10),
  DB_MIGRATE: flag,
  STORE_DRIVER: z.enum(['postgres', 'memory']).default('postgres'),

  HTTP_IP_ADDR: z.string().min(1).default('127.0.0.1'),
  HTTP_IP_PORT: z.coerce.number().int().nonnegative().max(65535).default(8082),
  HTTP_READ_TIMEOUT: seconds(60),
  HTTP_WRITE_TIMEOUT: seconds(60),
  HTTP_SHUTDOWN_TIMEOUT: seconds(15),
  HTTP_LOG: z.string().default(''),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  API_VERSION: z
    .string()
    .regex(/^\/[A-Za-z0-9._-]+(\/[A-Za-z0-9._-]+)*$/, 'API_VERSION must look like /api/v1')
    .default('/api/v1'),
  DEFAULT_NAMESPACE: z.string().min(1).default('default'),
  RESOURCE_TYPES: z
    .string()
    .default('films')
    .transform((v) => v.split(',').map((t) => t.trim()).filter((t) => t.length > 0))
    .pipe(
      z
        .array(z.string().regex(RESOURCE_TYPE_PATTERN, 'resource types must be lowercase identifiers'))
        .min(1, 'at least one resource type is required'),
    ),
  PUT_POLICY: z.enum(['reject', 'create']).default('reject'),
});

export type PutPolicy = 'reject' | 'create';
export type SslMode = z.infer<typeof envSchema>['APP_DB_SSL_MODE'];

export interface DatabaseConfig {
  username: string;
  password: string;
  database: string;
  host: string;
  port: number;
  sslMode: SslMode;
  schema: string;
  poolMax: number;
  migrate: boolean;
}

export interface HttpConfig {
  host: string;
  port: number;
  readTimeoutMs: number;
  writeTimeoutMs: number;
  shutdownTimeoutMs: number;
  logPath?: string;
  logLevel: string;
}

export interface ApiConfig {
  version: string;
  defaultNamespace: string;
  resourceTypes: string[];
  putPolicy: PutPolicy;
}

export interface AppConfig {
  storeDriver: 'postgres' | 'memory';
  db: DatabaseConfig;
  http: HttpConfig;
  api: ApiConfig;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Reads the service configuration from an environment map.
 * Unset variables fall back to local-development defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  const e = parsed.data;

  return {
    storeDriver: e.STORE_DRIVER,
    db: {
      username: e.APP_DB_USERNAME,
      password: e.APP_DB_PASSWORD,
      database: e.APP_DB_NAME,
      host: e.APP_DB_IP,
      port: e.APP_DB_PORT,
      sslMode: e.APP_DB_SSL_MODE,
      schema: e.APP_DB_SCHEMA,
      poolMax: e.APP_DB_POOL_MAX,
      migrate: e.DB_MIGRATE,
    },
    http: {
      host: e.HTTP_IP_ADDR,
      port: e.HTTP_IP_PORT,
      readTimeoutMs: e.HTTP_READ_TIMEOUT * 1000,
      writeTimeoutMs: e.HTTP_WRITE_TIMEOUT * 1000,
      shutdownTimeoutMs: e.HTTP_SHUTDOWN_TIMEOUT * 1000,
      logPath: e.HTTP_LOG || undefined,
      logLevel: e.LOG_LEVEL,
    },
    api: {
      version: e.API_VERSION,
      defaultNamespace: e.DEFAULT_NAMESPACE,
      resourceTypes: Array.from(new Set(e.RESOURCE_TYPES)),
      putPolicy: e.PUT_POLICY,
    },
  };
}
