import * as memory from './index.js';

describe('store-memory index exports', () => {
  it('re-exports the in-memory cache store', () => {
    expect(memory.InMemoryCacheStore).toBeTypeOf('function');
  });
});
