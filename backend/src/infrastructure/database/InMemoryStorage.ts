/**
 * In-memory storage collaborator for tests and local runs.
 *
 * Answers `... FROM <table> ...` with every row of that table. Can be put
 * into a failing state to stand in for an unreachable database.
 *
 * @module infrastructure/database/InMemoryStorage
 */

import { StorageUnavailableError } from '@/types/error.types';
import type { IStorageCollaborator, StorageRow } from '@/domains/agent/tools/types';

export class InMemoryStorage implements IStorageCollaborator {
  private readonly tables: Map<string, StorageRow[]>;
  private failure: StorageUnavailableError | null = null;
  readonly queries: string[] = [];

  constructor(tables: Record<string, StorageRow[]> = {}) {
    this.tables = new Map(
      Object.entries(tables).map(([name, rows]) => [name.toLowerCase(), rows.map(r => ({ ...r }))])
    );
  }

  /**
   * Make every later query fail until `recover()` is called.
   */
  failWith(message = 'Storage is unreachable'): void {
    this.failure = new StorageUnavailableError(message);
  }

  recover(): void {
    this.failure = null;
  }

  async query(command: string): Promise<StorageRow[]> {
    this.queries.push(command);
    if (this.failure) {
      throw this.failure;
    }

    const match = /\bFROM\s+(?:dbo\.)?\[?(\w+)\]?/i.exec(command);
    const table = match?.[1]?.toLowerCase();
    if (!table) {
      return [];
    }
    return (this.tables.get(table) ?? []).map(r => ({ ...r }));
  }
}
