/**
 * Database Storage
 *
 * SQL Server storage collaborator on an mssql connection pool. Agents reach
 * it only through the tool gateway; migrations use it directly.
 *
 * @module infrastructure/database/database
 */

import sql from 'mssql';
import { createChildLogger, type Logger } from '@/shared/utils/logger';
import { StorageUnavailableError, toErrorMessage } from '@/types/error.types';
import type { IStorageCollaborator, StorageRow } from '@/domains/agent/tools/types';

/**
 * The slice of mssql's ConnectionPool the storage uses.
 */
export interface StoragePool {
  readonly connected: boolean;
  connect(): Promise<unknown>;
  close(): Promise<void>;
  request(): { query(command: string): Promise<{ recordset?: StorageRow[] }> };
}

export type StoragePoolFactory = (connectionString: string) => StoragePool;

const createMssqlPool: StoragePoolFactory = (connectionString) => new sql.ConnectionPool(connectionString);

/**
 * Map common driver failures to a hint for the operator.
 */
export function describeConnectionError(err: Error): string | undefined {
  if (err.message.includes('ETIMEDOUT')) {
    return 'Connection timeout. Check network connectivity and firewall rules.';
  } else if (err.message.includes('ECONNREFUSED')) {
    return 'Connection refused. Check that the SQL server is running and accessible.';
  } else if (err.message.includes('ELOGIN') || err.message.includes('Login failed')) {
    return 'Authentication failed. Check the credentials in DATABASE_CONNECTION_STRING.';
  } else if (err.message.includes('ENOTFOUND')) {
    return 'Server not found. Check the host name in DATABASE_CONNECTION_STRING.';
  }
  return undefined;
}

export interface MssqlStorageOptions {
  poolFactory?: StoragePoolFactory;
  logger?: Logger;
}

export class MssqlStorage implements IStorageCollaborator {
  private readonly pool: StoragePool;
  private readonly logger: Logger;

  constructor(connectionString: string, options: MssqlStorageOptions = {}) {
    this.pool = (options.poolFactory ?? createMssqlPool)(connectionString);
    this.logger = options.logger ?? createChildLogger({ service: 'MssqlStorage' });
  }

  get connected(): boolean {
    return this.pool.connected;
  }

  /**
   * Open the pool and verify it with `SELECT 1`.
   * @throws StorageUnavailableError if the server cannot be reached
   */
  async connect(): Promise<void> {
    if (this.pool.connected) {
      return;
    }

    try {
      await this.pool.connect();
      await this.pool.request().query('SELECT 1 AS health');
      this.logger.info('Connected to SQL database');
    } catch (error) {
      const hint = error instanceof Error ? describeConnectionError(error) : undefined;
      this.logger.error({ err: error, hint }, 'Database connection failed');
      throw new StorageUnavailableError(`Database connection failed: ${toErrorMessage(error)}`, { cause: error });
    }
  }

  /**
   * @throws StorageUnavailableError if not connected or the query fails
   */
  async query(command: string): Promise<StorageRow[]> {
    if (!this.pool.connected) {
      throw new StorageUnavailableError('Database not connected. Call connect() first.');
    }

    try {
      const result = await this.pool.request().query(command);
      return result.recordset ?? [];
    } catch (error) {
      throw new StorageUnavailableError(`Query execution failed: ${toErrorMessage(error)}`, { cause: error });
    }
  }

  async close(): Promise<void> {
    if (!this.pool.connected) {
      return;
    }
    await this.pool.close();
    this.logger.info('Database connection closed');
  }
}
