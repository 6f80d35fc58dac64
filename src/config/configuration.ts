export type GraderMode = 'gemini' | 'dummy';
export type JobStoreKind = 'supabase' | 'memory';

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface AppConfig {
  port: number;
  nodeEnv: string;
  auth: {
    submitBearerToken: string;
  };
  gemini: {
    apiKey: string | undefined;
    model: string;
  };
  grading: {
    mode: GraderMode;
    maxConcurrentAnswers: number;
    answerTimeoutMs: number;
    passThreshold: number;
    leaseMs: number;
  };
  retry: RetryConfig;
  queue: {
    projectId: string;
    location: string;
    name: string;
    workerUrl: string;
    serviceAccountEmail: string;
    maxDeliveries: number;
  };
  storage: {
    jobStore: JobStoreKind;
    supabaseUrl: string | undefined;
    supabaseServiceKey: string | undefined;
    gcsBucket: string;
    gcsProjectId: string | undefined;
  };
  webhook: {
    secret: string;
    keyId: string;
    defaultUrl: string | undefined;
    timeoutMs: number;
    maxAttempts: number;
  };
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const nested of Object.values(value)) {
    if (nested !== null && typeof nested === 'object') {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

export default (): Readonly<AppConfig> =>
  deepFreeze({
    port: parseInt(process.env.PORT || '8080', 10),
    nodeEnv: process.env.NODE_ENV || 'development',
    auth: {
      submitBearerToken: process.env.SUBMIT_BEARER_TOKEN || '',
    },
    gemini: {
      apiKey: process.env.GEMINI_API_KEY,
      model: process.env.GEMINI_MODEL || 'gemini-2.0-flash',
    },
    grading: {
      mode: process.env.GRADER_MODE === 'dummy' ? 'dummy' : 'gemini',
      maxConcurrentAnswers: parseInt(
        process.env.MAX_CONCURRENT_ANSWERS || '4',
        10,
      ),
      answerTimeoutMs: parseInt(process.env.ANSWER_TIMEOUT_MS || '60000', 10),
      passThreshold: parseFloat(process.env.PASS_THRESHOLD || '0.7'),
      leaseMs: parseInt(process.env.JOB_LEASE_MS || '600000', 10),
    },
    retry: {
      maxAttempts: parseInt(process.env.RETRY_MAX_ATTEMPTS || '3', 10),
      baseDelayMs: parseInt(process.env.RETRY_BASE_DELAY_MS || '1000', 10),
      maxDelayMs: parseInt(process.env.RETRY_MAX_DELAY_MS || '10000', 10),
    },
    queue: {
      projectId: process.env.GCP_PROJECT || '',
      location: process.env.GCP_LOCATION || '',
      name: process.env.TASKS_QUEUE || 'grading-jobs',
      workerUrl: process.env.WORKER_URL || '',
      serviceAccountEmail: process.env.TASKS_SERVICE_ACCOUNT_EMAIL || '',
      maxDeliveries: parseInt(process.env.QUEUE_MAX_DELIVERIES || '5', 10),
    },
    storage: {
      jobStore: process.env.JOB_STORE === 'memory' ? 'memory' : 'supabase',
      supabaseUrl: process.env.SUPABASE_URL,
      supabaseServiceKey: process.env.SUPABASE_SERVICE_KEY,
      gcsBucket: process.env.GCS_BUCKET || '',
      gcsProjectId: process.env.GCS_PROJECT_ID,
    },
    webhook: {
      secret: process.env.WEBHOOK_SECRET || '',
      keyId: process.env.WEBHOOK_KEY_ID || 'grader-v1',
      defaultUrl: process.env.WEBHOOK_DEFAULT_URL,
      timeoutMs: parseInt(process.env.WEBHOOK_TIMEOUT_MS || '15000', 10),
      maxAttempts: parseInt(process.env.WEBHOOK_MAX_ATTEMPTS || '4', 10),
    },
  });
