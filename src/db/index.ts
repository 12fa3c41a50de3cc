import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { APP_CONFIG } from '../lib/config';
import { getLogger } from '../lib/logger';

const logger = getLogger('db');

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS revenue_events (
    id TEXT PRIMARY KEY,
    tenantId TEXT NOT NULL,
    sequence INTEGER NOT NULL,
    eventType TEXT NOT NULL,
    amount TEXT NOT NULL,
    currency TEXT NOT NULL,
    timestamp INTEGER NOT NULL,
    subscriptionId TEXT,
    customerId TEXT,
    invoiceId TEXT,
    metadata TEXT NOT NULL DEFAULT '{}',
    source TEXT NOT NULL,
    UNIQUE (tenantId, sequence)
  );
  CREATE INDEX IF NOT EXISTS idx_revenue_events_tenant_time ON revenue_events (tenantId, timestamp);
  CREATE INDEX IF NOT EXISTS idx_revenue_events_time ON revenue_events (timestamp);

  CREATE TABLE IF NOT EXISTS tenant_state (
    tenantId TEXT PRIMARY KEY,
    limits TEXT,
    usage TEXT,
    periodStart INTEGER,
    updatedAt INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS metrics_snapshots (
    scope TEXT NOT NULL,
    periodKey TEXT NOT NULL,
    watermark TEXT NOT NULL,
    payload TEXT NOT NULL,
    storedAt INTEGER NOT NULL,
    PRIMARY KEY (scope, periodKey)
  );
`;

export function openDatabase(path: string): Database.Database {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }
  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  db.exec(SCHEMA);
  return db;
}

let db: Database.Database | null = null;

export function getDb(): Database.Database {
  if (!db) {
    db = openDatabase(APP_CONFIG.databasePath);
    logger.info('Database opened', { path: APP_CONFIG.databasePath });
  }
  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

export default getDb;
