import fs from 'fs';
import path from 'path';
import { Pool } from 'pg';

export function createPool(connectionString: string): Pool {
  return new Pool({ connectionString });
}

export async function checkConnection(pool: Pool): Promise<void> {
  const client = await pool.connect();
  try {
    await client.query('SELECT 1');
  } finally {
    client.release();
  }
}

/** Runs schema.sql; every statement is idempotent. */
export async function applySchema(pool: Pool, schemaPath = path.join(__dirname, 'schema.sql')): Promise<void> {
  const schema = fs.readFileSync(schemaPath, 'utf-8');
  await pool.query(schema);
}
