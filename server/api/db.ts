import { Pool } from 'pg';
import type { PostgresConfig } from '../src/config';

export const createPool = (config: PostgresConfig) =>
  new Pool({
    user: config.user,
    password: config.password,
    host: config.host,
    port: config.port,
    database: config.database,
    ssl: config.ssl ? { rejectUnauthorized: false } : undefined,
  });
