import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { logger } from '../utils/logger';
import { env } from './env';

export interface DatabaseConnection {
  db: PostgresJsDatabase;
  close(): Promise<void>;
}

/**
 * Postgres client for the result sink, configured from DB_* variables.
 * Connections are opened on first query.
 */
export function createDatabase(): DatabaseConnection {
  const isProd = env.NODE_ENV === 'production';

  const queryClient = postgres({
    host: env.DB_HOST,
    port: env.DB_PORT,
    username: env.DB_USER,
    password: env.DB_PASSWORD,
    database: env.DB_NAME,
    max: env.DB_POOL_MAX ?? (isProd ? 10 : 5),
    idle_timeout: 20,
    connect_timeout: isProd ? 5 : 10,
    onnotice: () => {},
    ssl: isProd ? 'require' : false,
  });

  return {
    db: drizzle(queryClient),
    async close() {
      await queryClient.end();
      logger.info({ host: env.DB_HOST, database: env.DB_NAME }, 'Database connection closed');
    },
  };
}
