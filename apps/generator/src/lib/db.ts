import pg from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';

const { Pool } = pg;

export interface DatabaseHandle {
  db: NodePgDatabase;
  close(): Promise<void>;
}

export function createDatabase(connectionString: string): DatabaseHandle {
  const pool = new Pool({ connectionString, max: 4 });
  return {
    db: drizzle(pool),
    close: () => pool.end(),
  };
}
