import type Database from 'better-sqlite3';
import type { IStore } from './IStore.js';
import { SqliteCatalogRepository } from './SqliteCatalogRepository.js';
import { SqliteOrderRepository } from './SqliteOrderRepository.js';
import { SqliteUserRepository } from './SqliteUserRepository.js';

export class SqliteStore implements IStore {
  readonly catalog: SqliteCatalogRepository;
  readonly orders: SqliteOrderRepository;
  readonly users: SqliteUserRepository;

  constructor(private readonly db: Database.Database) {
    this.catalog = new SqliteCatalogRepository(db);
    this.orders = new SqliteOrderRepository(db);
    this.users = new SqliteUserRepository(db);
  }

  transaction<T>(work: () => T): T {
    return this.db.transaction(work)();
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
