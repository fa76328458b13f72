import { z } from 'zod';
import { END_CAUSES } from '../calls/types';
import { ConfigurationError } from '../errors';

const ReconnectSchema = z
  .object({
    baseDelayMs: z.number().int().positive().default(2000),
    maxDelayMs: z.number().int().positive().default(60_000),
    jitterRatio: z.number().min(0).max(1).default(0.2),
    // 0 keeps retrying until disconnect() is called
    maxAttempts: z.number().int().min(0).default(10),
  })
  .refine((value) => value.maxDelayMs >= value.baseDelayMs, {
    message: 'maxDelayMs must be >= baseDelayMs',
    path: ['maxDelayMs'],
  });

const KeepaliveSchema = z.object({
  idleMs: z.number().int().positive().default(30_000),
  graceMs: z.number().int().positive().default(10_000),
});

const nonBlank = (label: string) =>
  z
    .string({ required_error: `${label} is required` })
    .refine((value) => value.trim() !== '', { message: `${label} must not be empty` });

export const AmiClientConfigSchema = z.object({
  host: nonBlank('host'),
  port: z.number().int().min(1).max(65_535).default(5038),
  username: nonBlank('username'),
  secret: nonBlank('secret'),
  events: z.string().min(1).default('on'),
  connectTimeoutMs: z.number().int().positive().default(10_000),
  actionTimeoutMs: z.number().int().positive().default(5000),
  reconnect: ReconnectSchema.default({}),
  keepalive: KeepaliveSchema.default({}),
  monitoredExtensions: z.array(z.string().trim().min(1)).default([]),
  monitorAll: z.boolean().optional(),
  internalNumberPattern: z
    .string()
    .default('^\\d{2,6}$')
    .refine(
      (value) => {
        try {
          new RegExp(value);
          return true;
        } catch {
          return false;
        }
      },
      { message: 'internalNumberPattern must be a valid regular expression' },
    ),
  callGraceMs: z.number().int().min(0).default(5000),
  sweepIntervalMs: z.number().int().positive().default(1000),
  causeMap: z.record(z.string().regex(/^\d+$/, 'cause codes are numeric'), z.enum(END_CAUSES)).default({}),
});

export type AmiClientConfigInput = z.input<typeof AmiClientConfigSchema>;
export type AmiClientConfig = z.output<typeof AmiClientConfigSchema>;

/** Validates before any connection attempt; every issue is listed in the error. */
export function parseClientConfig(input: unknown): AmiClientConfig {
  const parsed = AmiClientConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new ConfigurationError(`Invalid ami client config: ${issues}`);
  }
  return parsed.data;
}
