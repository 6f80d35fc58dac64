import configuration from './configuration';

describe('configuration', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = {};
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it('should apply defaults for unset variables', () => {
    const config = configuration();

    expect(config.port).toBe(8080);
    expect(config.grading).toEqual({
      mode: 'gemini',
      maxConcurrentAnswers: 4,
      answerTimeoutMs: 60000,
      passThreshold: 0.7,
      leaseMs: 600000,
    });
    expect(config.retry).toEqual({
      maxAttempts: 3,
      baseDelayMs: 1000,
      maxDelayMs: 10000,
    });
    expect(config.queue.maxDeliveries).toBe(5);
    expect(config.storage.jobStore).toBe('supabase');
    expect(config.webhook.maxAttempts).toBe(4);
  });

  it('should read values from the environment', () => {
    process.env = {
      PORT: '3000',
      GRADER_MODE: 'dummy',
      JOB_STORE: 'memory',
      MAX_CONCURRENT_ANSWERS: '8',
      PASS_THRESHOLD: '0.5',
      WEBHOOK_DEFAULT_URL: 'https://ops.example.test/grading',
    };

    const config = configuration();

    expect(config.port).toBe(3000);
    expect(config.grading.mode).toBe('dummy');
    expect(config.grading.maxConcurrentAnswers).toBe(8);
    expect(config.grading.passThreshold).toBe(0.5);
    expect(config.storage.jobStore).toBe('memory');
    expect(config.webhook.defaultUrl).toBe('https://ops.example.test/grading');
  });

  it('should return a frozen object', () => {
    const config = configuration();

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.grading)).toBe(true);
  });
});
