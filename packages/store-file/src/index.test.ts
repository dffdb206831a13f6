import * as file from './index.js';

describe('store-file index exports', () => {
  it('re-exports the file cache store', () => {
    expect(file.FileCacheStore).toBeTypeOf('function');
  });
});
