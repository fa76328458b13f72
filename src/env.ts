import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const emptyToUndefined = (value: unknown): unknown => {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  return value;
};

const commaList = (value: unknown): unknown => {
  if (typeof value !== 'string') {
    return value;
  }
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry !== '');
};

const EnvSchema = z.object({
  PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(7800)),
  STATUS_TOKEN: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  AMI_HOST: z.string().min(1),
  AMI_PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(5038)),
  AMI_USERNAME: z.string().min(1),
  AMI_SECRET: z.string().min(1),
  AMI_MONITORED_EXTENSIONS: z.preprocess(commaList, z.array(z.string()).default([])),
  AMI_ACTION_TIMEOUT_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(5000)),
  AMI_RECONNECT_BASE_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(2000)),
  AMI_RECONNECT_MAX_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(60_000)),
  AMI_RECONNECT_MAX_ATTEMPTS: z.preprocess(emptyToUndefined, z.coerce.number().int().min(0).default(10)),
  AMI_KEEPALIVE_IDLE_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(30_000)),
  AMI_KEEPALIVE_GRACE_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(10_000)),
  CALL_GRACE_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().min(0).default(5000)),
});

const parsed = EnvSchema.safeParse(process.env);

if (!parsed.success) {
  const issues = parsed.error.issues
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join(', ');
  throw new Error(`Invalid environment variables: ${issues}`);
}

export const env = parsed.data;
