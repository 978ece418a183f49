import { fileURLToPath } from 'node:url';
import knex from 'knex';
import { config } from '../config.js';

interface MysqlField {
  type: string;
  length: number;
  string(): string | null;
}

export const db = knex({
  client: 'mysql2',
  connection: {
    host: config.db.host,
    port: config.db.port,
    user: config.db.user,
    password: config.db.password,
    database: config.db.database,
    timezone: 'Z',
    dateStrings: ['DATE'],
    typeCast(field: MysqlField, next: () => unknown) {
      // Parse TINY(1) as boolean
      if (field.type === 'TINY' && field.length === 1) {
        return field.string() === '1';
      }
      return next();
    },
  },
  pool: {
    min: 2,
    max: 10,
  },
  migrations: {
    directory: fileURLToPath(new URL('./migrations', import.meta.url)),
    loadExtensions: ['.ts', '.js'],
    tableName: 'knex_migrations',
  },
});
