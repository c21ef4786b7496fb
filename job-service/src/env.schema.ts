import { z } from 'zod';

const envSchema = z.object({
  // Optional with defaults
  PORT: z.coerce.number().optional().default(3000),
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .optional()
    .default('development'),
  STORE_TYPE: z.enum(['memory', 'mongodb']).optional().default('memory'),
  MONGODB_URL: z.string().min(1).optional(),
  MONGODB_DATABASE: z.string().min(1).optional().default('anomaly_jobs'),
  RESULTS_INDEX_PREFIX: z.string().min(1).optional().default('ml-anomalies-'),
  STATE_INDEX: z.string().min(1).optional().default('ml-state'),
  CONFIG_INDEX: z.string().min(1).optional().default('ml-config'),
  RABBITMQ_URL: z.string().min(1).optional().default('amqp://localhost:5672'),
  RABBITMQ_RESULTS_QUEUE: z.string().min(1).optional().default('job_results'),
  RABBITMQ_JOBS_QUEUE: z.string().min(1).optional().default('job_updates'),
}).superRefine((env, ctx) => {
  if (env.STORE_TYPE === 'mongodb' && !env.MONGODB_URL) {
    ctx.addIssue({
      code: 'custom',
      path: ['MONGODB_URL'],
      message: 'MONGODB_URL is required when STORE_TYPE is mongodb',
    });
  }

  // Index names double as collection names
  for (const key of ['RESULTS_INDEX_PREFIX', 'STATE_INDEX', 'CONFIG_INDEX'] as const) {
    if (env[key].includes('$')) {
      ctx.addIssue({
        code: 'custom',
        path: [key],
        message: `${key} must not contain "$"`,
      });
    }
  }
});

export type Env = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): Env {
  const parsed = envSchema.safeParse(config);
  if (!parsed.success) {
    const formatted = z.prettifyError(parsed.error);
    throw new Error(`Environment validation failed:\n${formatted}`);
  }
  return parsed.data;
}
