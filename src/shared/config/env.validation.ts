import * as Joi from 'joi';

export const validationSchema = Joi.object({
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'test')
    .default('development'),

  // API
  API_PORT: Joi.number().default(3000),
  API_KEY: Joi.string().allow('').optional(),
  CORS_ORIGINS: Joi.string().allow('').optional(),

  // Fetching
  USER_AGENT: Joi.string().default(
    'Mozilla/5.0 (compatible; PageSiftBot/1.0)',
  ),
  ROBOTS_TIMEOUT_MS: Joi.number().min(100).max(30000).default(5000),
  BROWSER_HEADLESS: Joi.boolean().default(true),
  BROWSER_EXECUTABLE_PATH: Joi.string().allow('').optional(),

  // Reasoning service
  GEMINI_API_KEY: Joi.string().allow('').optional(),
  GEMINI_MODEL: Joi.string().default('gemini-2.0-flash'),
  GEMINI_TIMEOUT_MS: Joi.number().min(1000).max(300000).default(60000),

  // Queue
  QUEUE_DRIVER: Joi.string().valid('memory', 'bullmq').default('memory'),
  REDIS_HOST: Joi.string().default('localhost'),
  REDIS_PORT: Joi.number().default(6379),
  WORKER_CONCURRENCY: Joi.number().min(1).max(20).default(4),

  // Retention
  JOB_TTL_MS: Joi.number().min(1000).default(24 * 60 * 60 * 1000),
  JOB_MAX_RECORDS: Joi.number().min(1).default(1000),
});
