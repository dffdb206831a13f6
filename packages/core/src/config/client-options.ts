import type { Logger } from 'pino';
import { z } from 'zod';
import type { ImageDecoder } from '../decoders/image-decoder.js';
import type { DiskCacheTier, MemoryCacheTier } from '../stores/cache-tier.js';
import type { Transport } from '../transport/transport.js';

/** Runs a completion callback on the client's delivery context. */
export type Scheduler = (callback: () => void) => void;

function hasMethods(value: unknown, ...names: Array<string>): boolean {
  if (typeof value !== 'object' || value === null) return false;
  return names.every(
    (name) => typeof Reflect.get(value, name) === 'function',
  );
}

const isFunction = (value: unknown) => typeof value === 'function';

const TierSchema = {
  memory: z.custom<MemoryCacheTier>(
    (val) => hasMethods(val, 'get', 'set', 'delete', 'clear'),
    'Must implement MemoryCacheTier',
  ),
  disk: z.custom<DiskCacheTier>(
    (val) => hasMethods(val, 'get', 'set', 'delete', 'clear'),
    'Must implement DiskCacheTier',
  ),
};

const HttpClientOptionsSchema = z.object({
  baseUrl: z
    .string()
    .url('baseUrl must be an absolute URL')
    .regex(/^https?:\/\//i, 'baseUrl must use http or https'),
  headers: z.record(z.string()).default({}),
  stores: z
    .object({
      memory: TierSchema.memory.optional(),
      disk: TierSchema.disk.optional(),
    })
    .default({}),
  transport: z
    .custom<Transport>(
      (val) => hasMethods(val, 'execute'),
      'Must implement Transport',
    )
    .optional(),
  imageDecoder: z
    .custom<ImageDecoder>(isFunction, 'Must be a function')
    .optional(),
  schedule: z.custom<Scheduler>(isFunction, 'Must be a function').optional(),
  logger: z
    .custom<Logger>(
      (val) => hasMethods(val, 'child', 'debug', 'warn'),
      'Must be a pino logger',
    )
    .optional(),
});

export type HttpClientOptions = z.input<typeof HttpClientOptionsSchema>;
export type ValidatedHttpClientOptions = z.output<typeof HttpClientOptionsSchema>;

/** Throws `ZodError` when the options are invalid. */
export function validateClientOptions(
  options: HttpClientOptions,
): ValidatedHttpClientOptions {
  return HttpClientOptionsSchema.parse(options);
}
