import * as Joi from 'joi';

export const configValidationSchema = Joi.object({
  PORT: Joi.number().default(8080),
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'test')
    .default('development'),
  SUBMIT_BEARER_TOKEN: Joi.string().required(),

  GRADER_MODE: Joi.string().valid('gemini', 'dummy').default('gemini'),
  GEMINI_API_KEY: Joi.string().when('GRADER_MODE', {
    is: 'gemini',
    then: Joi.required(),
    otherwise: Joi.optional(),
  }),
  GEMINI_MODEL: Joi.string().default('gemini-2.0-flash'),
  MAX_CONCURRENT_ANSWERS: Joi.number().integer().min(1).max(16).default(4),
  ANSWER_TIMEOUT_MS: Joi.number().integer().min(1000).default(60000),
  PASS_THRESHOLD: Joi.number().min(0).max(1).default(0.7),
  JOB_LEASE_MS: Joi.number().integer().min(10000).default(600000),

  RETRY_MAX_ATTEMPTS: Joi.number().integer().min(1).max(10).default(3),
  RETRY_BASE_DELAY_MS: Joi.number().integer().min(0).default(1000),
  RETRY_MAX_DELAY_MS: Joi.number().integer().min(0).default(10000),

  GCP_PROJECT: Joi.string().required(),
  GCP_LOCATION: Joi.string().required(),
  TASKS_QUEUE: Joi.string().default('grading-jobs'),
  WORKER_URL: Joi.string().uri({ scheme: ['http', 'https'] }).required(),
  TASKS_SERVICE_ACCOUNT_EMAIL: Joi.string().email().required(),
  QUEUE_MAX_DELIVERIES: Joi.number().integer().min(1).default(5),

  JOB_STORE: Joi.string().valid('supabase', 'memory').default('supabase'),
  SUPABASE_URL: Joi.string().uri().when('JOB_STORE', {
    is: 'supabase',
    then: Joi.required(),
    otherwise: Joi.optional(),
  }),
  SUPABASE_SERVICE_KEY: Joi.string().when('JOB_STORE', {
    is: 'supabase',
    then: Joi.required(),
    otherwise: Joi.optional(),
  }),
  GCS_BUCKET: Joi.string().required(),
  GCS_PROJECT_ID: Joi.string().optional(),

  WEBHOOK_SECRET: Joi.string().min(16).required(),
  WEBHOOK_KEY_ID: Joi.string().default('grader-v1'),
  WEBHOOK_DEFAULT_URL: Joi.string().uri({ scheme: ['http', 'https'] }).optional(),
  WEBHOOK_TIMEOUT_MS: Joi.number().integer().min(1000).default(15000),
  WEBHOOK_MAX_ATTEMPTS: Joi.number().integer().min(1).max(10).default(4),
});
