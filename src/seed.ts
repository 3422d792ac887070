import { config, validateConfig } from './config';
import { applySchema, createPool } from './db/client';

async function seed() {
  validateConfig();
  const pool = createPool(config.databaseUrl);
  await applySchema(pool);

  const { rows } = await pool.query<{ id: number }>(
    `INSERT INTO repositories (name, path, passphrase)
     VALUES ($1, $2, $3)
     ON CONFLICT (name) DO UPDATE SET path = EXCLUDED.path
     RETURNING id`,
    ['local-example', '/var/backups/borg/example', 'change-me']
  );
  console.log(`Seeded repository: ${rows[0].id}`);

  const notification = await pool.query<{ id: number }>(
    `INSERT INTO notification_configs (name, provider, enabled, settings)
     VALUES ($1, $2, $3, $4)
     ON CONFLICT (name) DO UPDATE SET settings = EXCLUDED.settings
     RETURNING id`,
    ['ops-webhook', 'webhook', false, JSON.stringify({ url: 'http://localhost:9000/backup-events' })]
  );
  console.log(`Seeded notification config: ${notification.rows[0].id} (disabled)`);

  await pool.end();
}

seed().catch((err) => {
  console.error('Seed error:', err);
  process.exit(1);
});
