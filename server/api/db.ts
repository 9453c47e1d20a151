import dotenv from 'dotenv';
dotenv.config();

import { Pool, type PoolConfig } from 'pg';

const sslOption =
  process.env.POSTGRES_SSL === 'true' ? { rejectUnauthorized: false } : undefined;

const dbConfig: PoolConfig = {
  user: process.env.POSTGRES_USER || 'calc',
  password: process.env.POSTGRES_PASSWORD || 'change-me',
  host: process.env.POSTGRES_HOST || 'localhost',
  port: parseInt(process.env.POSTGRES_PORT || '5432', 10),
  database: process.env.POSTGRES_DB || 'calculations',
  max: parseInt(process.env.POSTGRES_POOL_MAX || '10', 10),
  ssl: sslOption,
};
const pool = new Pool(dbConfig);

export default pool;
