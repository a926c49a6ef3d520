import { z } from 'zod';

const booleanString = z
  .union([z.enum(['true', 'false']), z.undefined()])
  .transform((value) => value === 'true');

const optionalUrl = (name: string) =>
  z
    .union([z.string().url({ message: `${name} must be a valid URL` }), z.literal(''), z.undefined()])
    .transform((value) => (value ? value.replace(/\/$/, '') : undefined));

const optionalString = z
  .union([z.string(), z.undefined()])
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

// setTimeout fires after 1ms for anything above a signed 32-bit delay.
const MAX_TIMER_MS = 2_147_483_647;

const milliseconds = (name: string, fallback: number) =>
  z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .positive(`${name} must be greater than 0`)
    .max(MAX_TIMER_MS, `${name} must be at most ${MAX_TIMER_MS}`)
    .default(fallback);

const normalizeOrigin = (origin: string) => origin.toLowerCase().replace(/\/$/, '');

const envSchema = z
  .object({
    PROVIDER_API_URL: z
      .string({ required_error: 'PROVIDER_API_URL is required' })
      .url({ message: 'PROVIDER_API_URL must be a valid URL' })
      .transform((value) => value.replace(/\/$/, '')),
    PROVIDER_API_KEY: z.string({ required_error: 'PROVIDER_API_KEY is required' }).min(1, 'PROVIDER_API_KEY is required'),
    PUBLIC_BASE_URL: optionalUrl('PUBLIC_BASE_URL'),
    CALLBACK_TOKEN: optionalString,
    LOCAL_RUNTIME_URL: optionalUrl('LOCAL_RUNTIME_URL'),
    PUSH_TIMEOUT_MS: milliseconds('PUSH_TIMEOUT_MS', 180_000),
    POLL_INTERVAL_MS: milliseconds('POLL_INTERVAL_MS', 3_000),
    TOTAL_TIMEOUT_MS: milliseconds('TOTAL_TIMEOUT_MS', 360_000),
    POLL_MODE: z
      .enum(['fallback', 'parallel'], {
        errorMap: () => ({ message: 'POLL_MODE must be fallback or parallel' }),
      })
      .default('fallback'),
    ALLOWED_ORIGINS: z.string({ required_error: 'ALLOWED_ORIGINS is required' }).min(1, 'ALLOWED_ORIGINS is required'),
    FEATURES_PERSIST_ARTIFACTS: booleanString,
    REGION: optionalString,
    R2_S3_ENDPOINT: optionalString,
    R2_BUCKET: optionalString,
    R2_ACCESS_KEY_ID: optionalString,
    R2_SECRET_ACCESS_KEY: optionalString,
    PRESIGN_TTL: z.coerce
      .number({ invalid_type_error: 'PRESIGN_TTL must be a number' })
      .positive('PRESIGN_TTL must be greater than 0')
      .default(900),
    LOG_LEVEL: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'], {
        errorMap: () => ({ message: 'LOG_LEVEL must be a pino level' }),
      })
      .default('info'),
    NODE_ENV: z
      .enum(['development', 'production', 'test'], {
        errorMap: () => ({ message: 'NODE_ENV must be development, production or test' }),
      })
      .default('development'),
    PORT: z.coerce
      .number({ invalid_type_error: 'PORT must be a number' })
      .int('PORT must be an integer')
      .positive('PORT must be greater than 0')
      .default(8787),
    HOST: z.string().min(1).default('0.0.0.0'),
  })
  .superRefine((data, ctx) => {
    if (data.PUBLIC_BASE_URL && !data.CALLBACK_TOKEN) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'CALLBACK_TOKEN is required when PUBLIC_BASE_URL is set',
        path: ['CALLBACK_TOKEN'],
      });
    }

    if (data.POLL_INTERVAL_MS >= data.TOTAL_TIMEOUT_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'POLL_INTERVAL_MS must be shorter than TOTAL_TIMEOUT_MS',
        path: ['POLL_INTERVAL_MS'],
      });
    }

    if (data.POLL_MODE === 'fallback' && data.PUSH_TIMEOUT_MS >= data.TOTAL_TIMEOUT_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'PUSH_TIMEOUT_MS must be shorter than TOTAL_TIMEOUT_MS when POLL_MODE is fallback',
        path: ['PUSH_TIMEOUT_MS'],
      });
    }

    if (data.FEATURES_PERSIST_ARTIFACTS) {
      const storageKeys = ['REGION', 'R2_S3_ENDPOINT', 'R2_BUCKET', 'R2_ACCESS_KEY_ID', 'R2_SECRET_ACCESS_KEY'] as const;
      for (const key of storageKeys) {
        if (!data[key]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `${key} is required when FEATURES_PERSIST_ARTIFACTS is true`,
            path: [key],
          });
        }
      }
    }
  });

export interface StorageConfig {
  REGION: string;
  R2_S3_ENDPOINT: string;
  R2_BUCKET: string;
  R2_ACCESS_KEY_ID: string;
  R2_SECRET_ACCESS_KEY: string;
}

export type Env = ReturnType<typeof loadEnv>;

export function loadEnv(customEnv: NodeJS.ProcessEnv = process.env) {
  try {
    const parsed = envSchema.parse(customEnv);

    const allowedOrigins = parsed.ALLOWED_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter(Boolean);

    if (allowedOrigins.length === 0) {
      throw new Error('ALLOWED_ORIGINS must include at least one origin');
    }

    let storage: StorageConfig | undefined;
    if (
      parsed.FEATURES_PERSIST_ARTIFACTS &&
      parsed.REGION &&
      parsed.R2_S3_ENDPOINT &&
      parsed.R2_BUCKET &&
      parsed.R2_ACCESS_KEY_ID &&
      parsed.R2_SECRET_ACCESS_KEY
    ) {
      storage = {
        REGION: parsed.REGION,
        R2_S3_ENDPOINT: parsed.R2_S3_ENDPOINT.startsWith('http')
          ? parsed.R2_S3_ENDPOINT.replace(/\/$/, '')
          : `https://${parsed.R2_S3_ENDPOINT.replace(/\/$/, '')}`,
        R2_BUCKET: parsed.R2_BUCKET,
        R2_ACCESS_KEY_ID: parsed.R2_ACCESS_KEY_ID,
        R2_SECRET_ACCESS_KEY: parsed.R2_SECRET_ACCESS_KEY,
      };
    }

    return {
      PROVIDER_API_URL: parsed.PROVIDER_API_URL,
      PROVIDER_API_KEY: parsed.PROVIDER_API_KEY,
      PUBLIC_BASE_URL: parsed.PUBLIC_BASE_URL,
      CALLBACK_TOKEN: parsed.CALLBACK_TOKEN,
      LOCAL_RUNTIME_URL: parsed.LOCAL_RUNTIME_URL,
      TIMINGS: {
        pushTimeoutMs: parsed.PUSH_TIMEOUT_MS,
        pollIntervalMs: parsed.POLL_INTERVAL_MS,
        totalTimeoutMs: parsed.TOTAL_TIMEOUT_MS,
        pollMode: parsed.POLL_MODE,
      },
      ALLOWED_ORIGINS: allowedOrigins,
      ALLOWED_ORIGINS_NORMALIZED: allowedOrigins.map(normalizeOrigin),
      FEATURES: {
        PERSIST_ARTIFACTS: parsed.FEATURES_PERSIST_ARTIFACTS,
      },
      STORAGE: storage,
      PRESIGN_TTL: parsed.PRESIGN_TTL,
      LOG_LEVEL: parsed.LOG_LEVEL,
      NODE_ENV: parsed.NODE_ENV,
      PORT: parsed.PORT,
      HOST: parsed.HOST,
    } as const;
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`);
      throw new Error(`Invalid environment configuration. Fix the following: ${issues.join('; ')}`);
    }

    throw error;
  }
}

export const env = loadEnv();
