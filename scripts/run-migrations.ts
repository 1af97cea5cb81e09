/*
 * Applies pending SQL migrations against DATABASE_URL.
 */
import 'dotenv/config';
import postgres from 'postgres';
import { getConfig } from '../src/lib/env';
import { runMigrations } from '../src/lib/db/migrator';
import { errorMessage } from '../src/lib/errors';

async function main(): Promise<void> {
  const sql = postgres(getConfig().database.postgresUrl, { max: 1 });
  try {
    const applied = await runMigrations(sql);
    console.log(`🎉 Migrations complete (${applied.length} applied)`);
    await sql.end();
  } catch (error) {
    await sql.end({ timeout: 0 });
    throw error;
  }
}

main().catch((error: unknown) => {
  console.error('❌ Migration failed:', errorMessage(error));
  process.exitCode = 1;
});
