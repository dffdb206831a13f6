import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { createLogger } from '../logging/logger.js';
import { ManualTransport, MapDiskTier, MapMemoryTier } from '../testing/fakes.js';
import { validateClientOptions } from './client-options.js';

describe('validateClientOptions', () => {
  it('applies defaults', () => {
    expect(validateClientOptions({ baseUrl: 'https://api.example.com' })).toEqual({
      baseUrl: 'https://api.example.com',
      headers: {},
      stores: {},
    });
  });

  it('keeps stores, transport and logger', () => {
    const memory = new MapMemoryTier();
    const disk = new MapDiskTier();
    const transport = new ManualTransport();
    const logger = createLogger();

    const options = validateClientOptions({
      baseUrl: 'http://localhost:8080/api',
      stores: { memory, disk },
      transport,
      logger,
    });

    expect(options.stores.memory).toBe(memory);
    expect(options.stores.disk).toBe(disk);
    expect(options.transport).toBe(transport);
    expect(options.logger).toBe(logger);
  });

  it.each(['', 'not a url', 'ftp://files.example.com', '/relative'])(
    'rejects baseUrl %j',
    (baseUrl) => {
      expect(() => validateClientOptions({ baseUrl })).toThrow(ZodError);
    },
  );

  it('rejects a store without the tier methods', () => {
    const options = JSON.parse(
      '{"baseUrl":"https://api.example.com","stores":{"disk":{}}}',
    );
    expect(() => validateClientOptions(options)).toThrow(
      'Must implement DiskCacheTier',
    );
  });

  it('rejects a scheduler that is not a function', () => {
    const options = JSON.parse(
      '{"baseUrl":"https://api.example.com","schedule":"soon"}',
    );
    expect(() => validateClientOptions(options)).toThrow(ZodError);
  });
});
