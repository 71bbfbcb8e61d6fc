/**
 * Database Migrations
 *
 * Idempotent provisioning run once before the engine starts: create the
 * `courses` and `schedules` tables when missing, then load the sample data
 * when both are empty. Safe to run on every start.
 *
 * @module infrastructure/database/migrations
 */

import { readFileSync, existsSync } from 'fs';
import { fileURLToPath } from 'url';
import { createChildLogger, type Logger } from '@/shared/utils/logger';
import type { IStorageCollaborator } from '@/domains/agent/tools/types';

export const DEFAULT_SAMPLE_DATA_PATH = fileURLToPath(new URL('../../../sql/sample-data.sql', import.meta.url));

export const CREATE_COURSES_TABLE = `
IF OBJECT_ID(N'dbo.courses', N'U') IS NULL
CREATE TABLE dbo.courses (
  id INT IDENTITY(1,1) PRIMARY KEY,
  course_name NVARCHAR(255) NOT NULL,
  description NVARCHAR(MAX) NOT NULL,
  discipline NVARCHAR(255) NOT NULL
)`;

export const CREATE_SCHEDULES_TABLE = `
IF OBJECT_ID(N'dbo.schedules', N'U') IS NULL
CREATE TABLE dbo.schedules (
  id INT IDENTITY(1,1) PRIMARY KEY,
  course_name NVARCHAR(255) NOT NULL,
  class_time NVARCHAR(255) NOT NULL,
  exam_date NVARCHAR(50) NOT NULL
)`;

export const COUNT_SEEDED_ROWS =
  'SELECT (SELECT COUNT(*) FROM dbo.courses) + (SELECT COUNT(*) FROM dbo.schedules) AS row_count';

export interface MigrationOptions {
  sampleDataPath?: string;
  logger?: Logger;
}

export interface MigrationResult {
  /** Sample data was loaded in this run */
  seeded: boolean;
}

function readRowCount(row: Record<string, unknown> | undefined): number {
  const value = row?.row_count;
  return typeof value === 'number' ? value : Number(value ?? 0);
}

/**
 * @throws StorageUnavailableError if a statement fails
 */
export async function runMigrations(
  storage: IStorageCollaborator,
  options: MigrationOptions = {}
): Promise<MigrationResult> {
  const logger = options.logger ?? createChildLogger({ service: 'Migrations' });
  const sampleDataPath = options.sampleDataPath ?? DEFAULT_SAMPLE_DATA_PATH;

  await storage.query(CREATE_COURSES_TABLE);
  await storage.query(CREATE_SCHEDULES_TABLE);
  logger.info('Tables courses and schedules are present');

  const [countRow] = await storage.query(COUNT_SEEDED_ROWS);
  if (readRowCount(countRow) > 0) {
    logger.debug('Tables already hold data, skipping sample data');
    return { seeded: false };
  }

  if (!existsSync(sampleDataPath)) {
    logger.warn({ sampleDataPath }, 'Sample data file does not exist, skipping data population');
    return { seeded: false };
  }

  await storage.query(readFileSync(sampleDataPath, 'utf-8'));
  logger.info({ sampleDataPath }, 'Sample data loaded');
  return { seeded: true };
}
