import { ObjectStore, StoreFactory } from '../types';

/**
 * One store per worker, created on the worker's first use and kept for its lifetime
 */
export class StorePool {
  private factory: StoreFactory;
  private stores = new Map<number, ObjectStore>();

  constructor(factory: StoreFactory) {
    this.factory = factory;
  }

  acquire(workerId: number): ObjectStore {
    let store = this.stores.get(workerId);
    if (!store) {
      store = this.factory();
      this.stores.set(workerId, store);
    }
    return store;
  }

  get size(): number {
    return this.stores.size;
  }
}
