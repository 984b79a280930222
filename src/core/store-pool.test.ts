import { MemoryObjectStore } from './memory-store';
import { StorePool } from './store-pool';

describe('StorePool', () => {
  it('should create one store per worker on first use', () => {
    const factory = jest.fn(() => new MemoryObjectStore());
    const pool = new StorePool(factory);

    const first = pool.acquire(1);
    expect(pool.acquire(1)).toBe(first);
    expect(pool.acquire(2)).not.toBe(first);

    expect(factory).toHaveBeenCalledTimes(2);
    expect(pool.size).toBe(2);
  });
});
