/**
 * Seat Pack Reconciler - SQL Migrator
 * ===================================
 * Applies the .sql files in ./migrations in lexical order, one transaction
 * per file, and records a checksum per file in _migrations. A file that
 * changed after it was applied stops the run.
 */

import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import type postgres from 'postgres';
import { log } from '../utils/log';

export const MIGRATIONS_DIR = path.resolve(__dirname, 'migrations');

export interface MigrationFile {
  filename: string;
  contents: string;
}

export interface AppliedMigration {
  filename: string;
  checksum: string | null;
}

export interface MigrationPlan {
  pending: MigrationFile[];
  alreadyApplied: string[];
}

type Sql = ReturnType<typeof postgres>;

// ================================================
// PURE HELPERS
// ================================================

export function migrationChecksum(contents: string): string {
  return crypto.createHash('sha256').update(contents).digest('hex');
}

/**
 * Split on statements ending a line with `;`. Dollar-quoted bodies are kept whole.
 */
export function splitStatements(sqlText: string): string[] {
  const statements: string[] = [];
  let current = '';
  let inDollar = false;

  for (const line of sqlText.split('\n')) {
    const markers = line.split('$$').length - 1;
    if (markers % 2 === 1) inDollar = !inDollar;

    current += `${line}\n`;
    if (!inDollar && /;\s*$/.test(line)) {
      statements.push(current.trim());
      current = '';
    }
  }
  if (current.trim().length > 0) statements.push(current.trim());

  // Comment-only chunks carry nothing to run
  return statements.filter((statement) => statement.split('\n').some((line) => line.trim() !== '' && !line.trim().startsWith('--')));
}

export function planMigrations(files: readonly MigrationFile[], applied: ReadonlyMap<string, AppliedMigration>): MigrationPlan {
  const plan: MigrationPlan = { pending: [], alreadyApplied: [] };

  for (const file of [...files].sort((a, b) => a.filename.localeCompare(b.filename))) {
    const previous = applied.get(file.filename);
    if (!previous) {
      plan.pending.push(file);
      continue;
    }
    if (previous.checksum !== null && previous.checksum !== migrationChecksum(file.contents)) {
      throw new Error(`Drift detected for ${file.filename}: stored checksum differs`);
    }
    plan.alreadyApplied.push(file.filename);
  }

  return plan;
}

export function readMigrationFiles(dir: string = MIGRATIONS_DIR): MigrationFile[] {
  return fs
    .readdirSync(dir)
    .filter((filename) => filename.endsWith('.sql'))
    .sort()
    .map((filename) => ({ filename, contents: fs.readFileSync(path.join(dir, filename), 'utf8') }));
}

// ================================================
// RUNNER
// ================================================

export async function runMigrations(sql: Sql, dir: string = MIGRATIONS_DIR): Promise<string[]> {
  await sql`CREATE TABLE IF NOT EXISTS _migrations (
    id SERIAL PRIMARY KEY,
    filename TEXT UNIQUE NOT NULL,
    checksum TEXT,
    applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )`;

  const rows = await sql<AppliedMigration[]>`SELECT filename, checksum FROM _migrations ORDER BY id`;
  const applied = new Map(rows.map((row) => [row.filename, row]));
  const plan = planMigrations(readMigrationFiles(dir), applied);

  plan.alreadyApplied.forEach((filename) => log.info(`↩️  Skipping already applied: ${filename}`));

  for (const file of plan.pending) {
    await sql.begin(async (tx) => {
      await tx.unsafe("SET LOCAL lock_timeout = '2s'");
      await tx.unsafe("SET LOCAL statement_timeout = '30s'");
      for (const statement of splitStatements(file.contents)) {
        log.debug(`➡️  ${file.filename} :: ${statement.slice(0, 80).replace(/\s+/g, ' ')}...`);
        await tx.unsafe(statement);
      }
      await tx.unsafe('INSERT INTO _migrations (filename, checksum) VALUES ($1, $2)', [
        file.filename,
        migrationChecksum(file.contents),
      ]);
    });
    log.info(`✅ Applied migration: ${file.filename}`);
  }

  return plan.pending.map((file) => file.filename);
}
