import type { Knex } from 'knex';
import dotenv from 'dotenv';
import pg from 'pg';

dotenv.config();

// Parse NUMERIC/DECIMAL (type id 1700) as numbers instead of strings
pg.types.setTypeParser(1700, (val: string) => parseFloat(val));

const migrations: Knex.MigratorConfig = {
  tableName: 'knex_migrations_campaign_engine',
  directory: './src/migrations',
  extension: 'ts',
  loadExtensions: ['.ts'],
};

const config: { [key: string]: Knex.Config } = {
  development: {
    client: 'postgresql',
    connection: process.env.DATABASE_URL || {
      host: process.env.DB_HOST || 'localhost',
      port: parseInt(process.env.DB_PORT || '5432', 10),
      database: process.env.DB_NAME || 'campaign_engine',
      user: process.env.DB_USER || 'postgres',
      password: process.env.DB_PASSWORD || 'postgres',
    },
    pool: {
      min: 2,
      max: 10,
    },
    migrations,
  },
  production: {
    client: 'postgresql',
    connection: process.env.DATABASE_URL,
    pool: {
      min: 2,
      max: 10,
    },
    migrations,
  },
  test: {
    client: 'postgresql',
    connection: {
      host: process.env.TEST_DB_HOST || 'localhost',
      port: parseInt(process.env.TEST_DB_PORT || '5432', 10),
      database: process.env.TEST_DB_NAME || 'campaign_engine_test',
      user: process.env.TEST_DB_USER || 'postgres',
      password: process.env.TEST_DB_PASSWORD || 'postgres',
    },
    pool: {
      min: 1,
      max: 5,
    },
    migrations,
  },
};

export default config;
