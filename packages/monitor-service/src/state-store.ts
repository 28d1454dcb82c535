import { eq } from 'drizzle-orm';
import { createDb, monitorMeta, stockState, StateStoreError, errorMessage } from '@stockwatch/shared';
import type { Db, DbHandle, StockObservation, StoredState } from '@stockwatch/shared';

export interface StateStore {
  read(productId: string): Promise<StoredState | null>;
  /** Replaces the product's record in one transaction; never partially applied. */
  write(productId: string, observation: StockObservation): Promise<StoredState>;
  readMeta(key: string): Promise<string | null>;
  writeMeta(key: string, value: string | null): Promise<void>;
  close(): Promise<void>;
}

function wrap<T>(action: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw new StateStoreError(`State store ${action} failed: ${errorMessage(err)}`, { cause: err });
  }
}

function toStoredState(row: typeof stockState.$inferSelect): StoredState {
  return {
    productId: row.productId,
    status: row.status,
    price: row.price,
    title: row.title,
    observedAt: row.observedAt,
    changedAt: row.changedAt,
  };
}

export function createSqliteStateStore({ db, sqlite }: DbHandle): StateStore {
  const readRow = (tx: Pick<Db, 'select'>, productId: string) =>
    tx.select().from(stockState).where(eq(stockState.productId, productId)).get();

  return {
    async read(productId) {
      return wrap('read', () => {
        const row = readRow(db, productId);
        return row ? toStoredState(row) : null;
      });
    },

    async write(productId, observation) {
      return wrap('write', () =>
        db.transaction((tx) => {
          const existing = readRow(tx, productId);
          const changedAt =
            existing && existing.status === observation.status
              ? existing.changedAt
              : observation.observedAt;

          const row = {
            productId,
            status: observation.status,
            price: observation.price,
            title: observation.title,
            observedAt: observation.observedAt,
            changedAt,
          };

          tx.insert(stockState)
            .values(row)
            .onConflictDoUpdate({
              target: stockState.productId,
              set: {
                status: row.status,
                price: row.price,
                title: row.title,
                observedAt: row.observedAt,
                changedAt: row.changedAt,
              },
            })
            .run();

          return toStoredState(row);
        }),
      );
    },

    async readMeta(key) {
      return wrap('meta read', () => {
        const row = db.select().from(monitorMeta).where(eq(monitorMeta.key, key)).get();
        return row?.value ?? null;
      });
    },

    async writeMeta(key, value) {
      wrap('meta write', () => {
        if (value === null) {
          db.delete(monitorMeta).where(eq(monitorMeta.key, key)).run();
          return;
        }
        db.insert(monitorMeta)
          .values({ key, value, updatedAt: new Date() })
          .onConflictDoUpdate({ target: monitorMeta.key, set: { value, updatedAt: new Date() } })
          .run();
      });
    },

    async close() {
      if (sqlite.open) {
        sqlite.close();
      }
    },
  };
}

export function openSqliteStateStore(path: string): StateStore {
  try {
    return createSqliteStateStore(createDb(path));
  } catch (err) {
    throw new StateStoreError(`Cannot open state database at ${path}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}
