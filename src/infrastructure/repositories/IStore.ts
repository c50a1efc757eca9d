import type { ICatalogRepository } from './ICatalogRepository.js';
import type { IOrderRepository } from './IOrderRepository.js';
import type { IUserRepository } from './IUserRepository.js';

export interface IStore {
  readonly catalog: ICatalogRepository;
  readonly orders: IOrderRepository;
  readonly users: IUserRepository;
  // runs work atomically; a throw rolls back every write made inside it
  transaction<T>(work: () => T): T;
  close(): void;
}
