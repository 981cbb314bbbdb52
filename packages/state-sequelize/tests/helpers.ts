import { rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { Sequelize } from 'sequelize';
import { BetterSqliteDriver } from './sqliteDriver.js';

export function tempDatabasePath(): string {
  return join(tmpdir(), `scrapeflow-seq-${randomUUID()}.sqlite`);
}

export function connect(storage: string): Sequelize {
  return new Sequelize({
    dialect: 'sqlite',
    storage,
    logging: false,
    dialectModule: { Database: BetterSqliteDriver },
    pool: {
      max: 1,
      min: 1,
      idle: 30000,
      acquire: 60000,
      evict: 30000,
    },
  });
}

export async function removeDatabase(storage: string): Promise<void> {
  await rm(storage, { force: true });
}
