import { Client, type QueryResultRow } from 'pg';
import { ENV } from './env';
import { warn, debug, errorMessage } from './log';

/** The slice of pg.Client the repository needs; lets tests script results. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: QueryResultRow[]; rowCount: number | null }>;
}

export type PgRunner = <T>(fn: (c: Queryable) => Promise<T>) => Promise<T>;

export function redactUrl(url: string): string {
  return url.replace(/:[^:@/]+@/, ':***@');
}

const disabledClient: Queryable = {
  query() {
    return Promise.reject(new Error('DB disabled (DISABLE_DB=true): client not available'));
  },
};

export async function withPg<T>(fn: (c: Queryable) => Promise<T>): Promise<T> {
  if (ENV.disableDb) {
    warn('db.disabled', { reason: 'DISABLE_DB true' });
    // Any query rejects, surfacing accidental usage.
    return await fn(disabledClient);
  }
  const client = new Client({ connectionString: ENV.databaseUrl });
  try {
    await client.connect();
  } catch (e) {
    warn('db.connect.fail', { url: redactUrl(ENV.databaseUrl), error: errorMessage(e) });
    throw e;
  }
  try {
    return await fn(client);
  } finally {
    try { await client.end(); } catch (e) { debug('db.end.fail', { error: errorMessage(e) }); }
  }
}

export async function withTransaction<T>(c: Queryable, fn: (c: Queryable) => Promise<T>): Promise<T> {
  await c.query('BEGIN');
  try {
    const out = await fn(c);
    await c.query('COMMIT');
    return out;
  } catch (e) {
    try {
      await c.query('ROLLBACK');
    } catch (rollbackErr) {
      warn('db.rollback.fail', { error: errorMessage(rollbackErr) });
    }
    throw e;
  }
}
