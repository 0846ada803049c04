import { config } from 'dotenv';
import { z } from 'zod';

config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.string().regex(/^\d+$/).default('3333'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  DATABASE_URL: z.string().url(),
  JWT_SECRET: z.string().min(32),
  RATE_LIMIT_MAX: z.string().regex(/^[0-9]+$/).default('100'),
  RATE_LIMIT_TIME_WINDOW_MS: z.string().regex(/^[0-9]+$/).default('60000'),
  S3_ENDPOINT: z.string().url().optional(),
  S3_REGION: z.string().default('us-east-1'),
  S3_ACCESS_KEY_ID: z.string().optional(),
  S3_SECRET_ACCESS_KEY: z.string().optional(),
  S3_FORCE_PATH_STYLE: z.enum(['true', 'false']).default('false'),
  STAGING_BUCKET: z.string().min(3).default('cert-temp'),
  CERTIFICATES_BUCKET: z.string().min(3).default('certificates'),
  SIGNED_URL_TTL_SECONDS: z.string().regex(/^[0-9]+$/).default('3600'),
  UPLOAD_MAX_SIZE_BYTES: z.string().regex(/^[0-9]+$/).default('10485760'),
  UPLOAD_ALLOWED_MIME_TYPES: z.string().default('image/jpeg,image/png,image/webp'),
  CERTIFICATE_NUMBER_PREFIX: z.string().regex(/^[A-Z]{1,4}$/).default('G'),
  CERTIFICATE_SEQUENCE_WIDTH: z.enum(['4', '5']).default('4'),
  CERTIFICATE_PERSIST_ATTEMPTS: z.string().regex(/^[1-9][0-9]*$/).default('3'),
  OTEL_ENABLED: z.enum(['true', 'false']).default('false'),
  OTEL_SERVICE_NAME: z.string().default('gemlab-certification-engine'),
  OTEL_EXPORTER_OTLP_ENDPOINT: z.string().url().default('http://localhost:4318'),
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

export function getEnv(): Env {
  const source = { ...process.env };

  if (source.NODE_ENV === 'test') {
    return envSchema.parse(source);
  }

  if (!cachedEnv) {
    cachedEnv = envSchema.parse(source);
  }

  return cachedEnv;
}
