import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';
import type { StockStatus } from '../types.js';

export const stockState = sqliteTable('stock_state', {
  productId: text('product_id').primaryKey(),
  status: text('status').$type<StockStatus>().notNull(),
  price: text('price'),
  title: text('title'),
  observedAt: integer('observed_at', { mode: 'timestamp_ms' }).notNull(),
  changedAt: integer('changed_at', { mode: 'timestamp_ms' }).notNull(),
});

export const monitorMeta = sqliteTable('monitor_meta', {
  key: text('key').primaryKey(),
  value: text('value').notNull(),
  updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
});

// Kept in step with the tables above; applied on every open.
export const SCHEMA_DDL = `
CREATE TABLE IF NOT EXISTS stock_state (
  product_id TEXT PRIMARY KEY NOT NULL,
  status TEXT NOT NULL,
  price TEXT,
  title TEXT,
  observed_at INTEGER NOT NULL,
  changed_at INTEGER NOT NULL
);
CREATE TABLE IF NOT EXISTS monitor_meta (
  key TEXT PRIMARY KEY NOT NULL,
  value TEXT NOT NULL,
  updated_at INTEGER NOT NULL
);
`;
