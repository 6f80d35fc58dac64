import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import {
  ConflictException,
  ServiceUnavailableException,
} from '@nestjs/common';
import { mockConfigService } from '../../test/config.mock';
import { TransientExternalError } from '../common/errors/grading.errors';
import { AnswerSubmission } from '../jobs/interfaces/grading-job.interface';
import { toNewGradingJob } from '../jobs/job-payload';
import { InMemoryJobRepository } from '../jobs/repositories/in-memory-job.repository';
import { JobRepository } from '../jobs/repositories/job.repository';
import {
  CompletionNotifierService,
  NotificationResult,
} from '../notification/completion-notifier.service';
import { GradeTaskPayload } from '../queue/interfaces/grade-task.interface';
import { ReportRendererService } from '../report/report-renderer.service';
import { GcsStorageService, StoredObject } from '../storage/gcs-storage.service';
import { AnswerGraderService } from './answer-grader.service';
import { GradingService } from './grading.service';
import { GradedAnswer } from './interfaces/grading.interface';

const JOB_ID = '6f1c2a4e-8d3b-4c1a-9e2f-0a1b2c3d4e5f';

const buildTask = (answers: AnswerSubmission[]): GradeTaskPayload => ({
  jobId: JOB_ID,
  attemptId: 'attempt-1',
  userId: 'user-1',
  attemptNo: 1,
  answers,
  rubric: { criteria: 'clarity' },
  sectionMap: { essay: { '1': 'Part A', '2': 'Part A', '3': 'Part B' } },
  callback: { url: 'https://lms.example.test/hooks/grading' },
});

const essay = (questionId: number): AnswerSubmission => ({
  questionType: 'essay',
  questionId,
  answerText: `Answer to question ${questionId}`,
});

const graded = (score: number): GradedAnswer => ({
  score,
  rationale: 'Clear and correct.',
  tags: [],
  usage: { inputTokens: 100, outputTokens: 20 },
});

describe('GradingService', () => {
  let service: GradingService;
  let jobs: InMemoryJobRepository;

  const grader = {
    grade: jest.fn<Promise<GradedAnswer>, [AnswerSubmission, Record<string, unknown>]>(),
    gradingMode: 'gemini',
  };
  const reportRenderer = {
    render: jest.fn().mockResolvedValue(Buffer.from('%PDF-1.7 test')),
  };
  const storage = {
    uploadBuffer: jest.fn<Promise<StoredObject>, [Buffer, string, string]>(),
  };
  const notifier = {
    notify: jest.fn<Promise<NotificationResult>, unknown[]>(),
  };

  const callsFor = (questionId: number) =>
    grader.grade.mock.calls.filter(([answer]) => answer.questionId === questionId)
      .length;

  beforeEach(async () => {
    jest.clearAllMocks();
    jobs = new InMemoryJobRepository();

    grader.grade.mockResolvedValue(graded(0.9));
    storage.uploadBuffer.mockImplementation(async (buffer, path) => ({
      path,
      uri: `gs://test-bucket/${path}`,
      sizeBytes: buffer.length,
      sha256: 'test-digest',
    }));
    notifier.notify.mockResolvedValue({
      delivered: true,
      skipped: false,
      attempts: 1,
    });

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        GradingService,
        { provide: JobRepository, useValue: jobs },
        { provide: AnswerGraderService, useValue: grader },
        { provide: ReportRendererService, useValue: reportRenderer },
        { provide: GcsStorageService, useValue: storage },
        { provide: CompletionNotifierService, useValue: notifier },
        { provide: ConfigService, useValue: mockConfigService() },
      ],
    }).compile();

    service = module.get<GradingService>(GradingService);
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('process', () => {
    it('should grade every answer and complete the job', async () => {
      const task = buildTask([essay(1), essay(2)]);
      await jobs.create(toNewGradingJob(task));

      const result = await service.process(task);

      expect(result.status).toBe('completed');
      expect(result.duplicate).toBe(false);
      expect(result.reportPath).toMatch(
        new RegExp(`^reports/\\d{4}/\\d{2}/${JOB_ID}\\.pdf$`),
      );

      const job = await jobs.findById(JOB_ID);
      expect(job?.status).toBe('completed');
      expect(job?.leaseToken).toBeNull();
      expect(job?.overall).toEqual({
        score: 0.9,
        band: 'Pass',
        notes: 'Gemini auto-grade',
      });
      expect(job?.usage?.inputTokens).toBe(200);
      expect(job?.usage?.outputTokens).toBe(40);
      expect(jobs.listArtifacts(JOB_ID)).toEqual([
        {
          jobId: JOB_ID,
          kind: 'pdf',
          storagePath: result.reportPath,
          sizeBytes: 13,
          sha256: 'test-digest',
        },
      ]);
    });

    it('should attach section labels to the stored outcomes', async () => {
      const task = buildTask([essay(1), essay(3), essay(9)]);

      await service.process(task);

      const sections = (await jobs.listOutcomes(JOB_ID))
        .sort((a, b) => a.questionId - b.questionId)
        .map((o) => o.section);
      expect(sections).toEqual(['Part A', 'Part B', null]);
    });

    it('should create the job from the payload when it is unknown', async () => {
      const result = await service.process(buildTask([essay(1)]));

      expect(result.status).toBe('completed');
      const job = await jobs.findById(JOB_ID);
      expect(job?.callbackUrl).toBe('https://lms.example.test/hooks/grading');
    });

    it('should upload the rendered report as a PDF', async () => {
      await service.process(buildTask([essay(1)]));

      expect(reportRenderer.render).toHaveBeenCalledTimes(1);
      expect(storage.uploadBuffer).toHaveBeenCalledWith(
        Buffer.from('%PDF-1.7 test'),
        expect.stringMatching(/^reports\//),
        'application/pdf',
      );
    });

    it('should notify once with the completed job and its outcomes', async () => {
      await service.process(buildTask([essay(1), essay(2)]));

      expect(notifier.notify).toHaveBeenCalledTimes(1);
      const [job, outcomes] = notifier.notify.mock.calls[0];
      expect(job).toMatchObject({ id: JOB_ID, status: 'completed' });
      expect(outcomes).toHaveLength(2);

      const stored = await jobs.findById(JOB_ID);
      expect(stored?.notifiedAt).toBeInstanceOf(Date);
      expect(stored?.notificationError).toBeNull();
    });

    it('should not record anything when there is no webhook target', async () => {
      notifier.notify.mockResolvedValueOnce({
        delivered: false,
        skipped: true,
        attempts: 0,
      });

      await service.process(buildTask([essay(1)]));

      const stored = await jobs.findById(JOB_ID);
      expect(stored?.notifiedAt).toBeNull();
    });

    it('should record a failed webhook without changing the job status', async () => {
      notifier.notify.mockResolvedValueOnce({
        delivered: false,
        skipped: false,
        attempts: 3,
        error: 'Webhook returned HTTP 502',
      });

      const result = await service.process(buildTask([essay(1)]));

      expect(result.status).toBe('completed');
      const stored = await jobs.findById(JOB_ID);
      expect(stored?.notificationError).toBe('Webhook returned HTTP 502');
    });
  });

  describe('duplicate deliveries', () => {
    it('should short-circuit a job that already completed', async () => {
      const task = buildTask([essay(1)]);
      const first = await service.process(task);

      const second = await service.process(task);

      expect(second).toEqual({ ...first, duplicate: true });
      expect(grader.grade).toHaveBeenCalledTimes(1);
      expect(notifier.notify).toHaveBeenCalledTimes(1);
      expect(storage.uploadBuffer).toHaveBeenCalledTimes(1);
    });

    it('should reject a delivery while another worker holds the lease', async () => {
      const task = buildTask([essay(1)]);
      await jobs.create(toNewGradingJob(task));
      const now = new Date();
      await jobs.claim(JOB_ID, {
        token: 'other-worker',
        now,
        expiresAt: new Date(now.getTime() + 60000),
      });

      await expect(service.process(task)).rejects.toBeInstanceOf(
        ConflictException,
      );
      expect(grader.grade).not.toHaveBeenCalled();
    });

    it('should take over a lease that has expired', async () => {
      const task = buildTask([essay(1)]);
      await jobs.create(toNewGradingJob(task));
      const past = new Date(Date.now() - 120000);
      await jobs.claim(JOB_ID, {
        token: 'crashed-worker',
        now: past,
        expiresAt: new Date(past.getTime() + 60000),
      });

      const result = await service.process(task);

      expect(result.status).toBe('completed');
    });

    it('should notify when the completion write landed but its reply was lost', async () => {
      const task = buildTask([essay(1)]);
      await jobs.create(toNewGradingJob(task));
      const realTransition = jobs.transition.bind(jobs);
      let replyLost = false;
      jest.spyOn(jobs, 'transition').mockImplementation(async (jobId, change) => {
        const result = await realTransition(jobId, change);
        if (change.to === 'completed' && !replyLost) {
          replyLost = true;
          throw new TransientExternalError('connection reset');
        }
        return result;
      });

      const result = await service.process(task);

      expect(result.status).toBe('completed');
      expect(result.duplicate).toBe(false);
      expect(notifier.notify).toHaveBeenCalledTimes(1);
      expect(notifier.notify.mock.calls[0][0]).toMatchObject({
        id: JOB_ID,
        status: 'completed',
      });
    });

    it('should leave a task alone when its attempt already has another live job', async () => {
      const liveJobId = '0b5e7c1d-2f3a-4b6c-8d9e-1f2a3b4c5d6e';
      await jobs.create(toNewGradingJob({ ...buildTask([essay(1)]), jobId: liveJobId }));

      const result = await service.process(buildTask([essay(1)]));

      expect(result).toEqual({
        jobId: liveJobId,
        status: 'queued',
        duplicate: true,
        reportPath: null,
        error: null,
      });
      expect(grader.grade).not.toHaveBeenCalled();
      expect(await jobs.findById(JOB_ID)).toBeNull();
    });

    it('should let only one of two concurrent deliveries grade and notify', async () => {
      const task = buildTask([essay(1), essay(2)]);
      await jobs.create(toNewGradingJob(task));

      const results = await Promise.allSettled([
        service.process(task),
        service.process(task),
      ]);

      expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
      const rejected = results.find(
        (r): r is PromiseRejectedResult => r.status === 'rejected',
      );
      expect(rejected?.reason).toBeInstanceOf(ConflictException);
      expect(grader.grade).toHaveBeenCalledTimes(2);
      expect(notifier.notify).toHaveBeenCalledTimes(1);
    });
  });

  describe('answer failures', () => {
    it('should retry a transient answer failure and keep the other answers', async () => {
      let failuresLeft = 2;
      grader.grade.mockImplementation(async (answer) => {
        if (answer.questionId === 2 && failuresLeft > 0) {
          failuresLeft--;
          throw new TransientExternalError('Gemini returned HTTP 503');
        }
        return graded(0.9);
      });
      const task = buildTask([essay(1), essay(2), essay(3)]);

      const first = await service.process(task);
      const redelivered = await service.process(task);

      expect(first.status).toBe('completed');
      expect(redelivered.duplicate).toBe(true);
      expect(callsFor(1)).toBe(1);
      expect(callsFor(2)).toBe(3);
      expect(callsFor(3)).toBe(1);
      expect(notifier.notify).toHaveBeenCalledTimes(1);
      expect((await jobs.listOutcomes(JOB_ID)).every((o) => !o.fallback)).toBe(
        true,
      );
    });

    it('should record a fallback for an answer that keeps failing', async () => {
      grader.grade.mockImplementation(async (answer) => {
        if (answer.questionId === 2) {
          throw new TransientExternalError('Grading essay:2 timed out after 1000ms');
        }
        return graded(0.9);
      });

      const result = await service.process(buildTask([essay(1), essay(2)]));

      expect(result.status).toBe('completed');
      expect(callsFor(2)).toBe(3);
      const fallback = (await jobs.listOutcomes(JOB_ID)).find(
        (o) => o.questionId === 2,
      );
      expect(fallback).toEqual({
        questionType: 'essay',
        questionId: 2,
        section: 'Part A',
        score: 0,
        rationale: 'Grading failed: Grading essay:2 timed out after 1000ms',
        tags: ['api_error'],
        fallback: true,
        usage: { inputTokens: 0, outputTokens: 0 },
      });
      expect((await jobs.findById(JOB_ID))?.overall).toEqual({
        score: 0.45,
        band: 'Fail',
        notes: 'Gemini auto-grade 1 of 2 answers could not be graded.',
      });
    });

    it('should not retry an answer failure that is not transient', async () => {
      grader.grade.mockImplementation(async (answer) => {
        if (answer.questionId === 1) {
          throw new Error('Request rejected: invalid argument');
        }
        return graded(0.5);
      });

      await service.process(buildTask([essay(1), essay(2)]));

      expect(callsFor(1)).toBe(1);
    });

    it('should fail the job when no answer could be graded', async () => {
      grader.grade.mockRejectedValue(new Error('Request rejected: invalid argument'));

      const result = await service.process(buildTask([essay(1), essay(2)]));

      expect(result).toEqual({
        jobId: JOB_ID,
        status: 'failed',
        duplicate: false,
        reportPath: null,
        error: 'All 2 answer(s) failed grading',
      });
      expect(storage.uploadBuffer).not.toHaveBeenCalled();
      expect(notifier.notify).toHaveBeenCalledTimes(1);
      const [job, outcomes] = notifier.notify.mock.calls[0];
      expect(job).toMatchObject({ status: 'failed' });
      expect(outcomes).toHaveLength(2);
    });

    it('should regrade fallbacks from an earlier delivery', async () => {
      const task = buildTask([essay(1), essay(2)]);
      await jobs.create(toNewGradingJob(task));
      await jobs.saveOutcome(JOB_ID, {
        questionType: 'essay',
        questionId: 1,
        section: 'Part A',
        score: 0.7,
        rationale: 'Stored earlier.',
        tags: [],
        fallback: false,
        usage: { inputTokens: 10, outputTokens: 5 },
      });
      await jobs.saveOutcome(JOB_ID, {
        questionType: 'essay',
        questionId: 2,
        section: 'Part A',
        score: 0,
        rationale: 'Grading failed: quota',
        tags: ['api_error'],
        fallback: true,
        usage: { inputTokens: 0, outputTokens: 0 },
      });

      await service.process(task);

      expect(callsFor(1)).toBe(0);
      expect(callsFor(2)).toBe(1);
    });
  });

  describe('job failures', () => {
    it('should release the lease and ask for redelivery on a transient failure', async () => {
      storage.uploadBuffer.mockRejectedValue(
        new TransientExternalError('Upload failed: ECONNRESET'),
      );
      const task = buildTask([essay(1)]);

      await expect(service.process(task, { retryCount: 0 })).rejects.toBeInstanceOf(
        ServiceUnavailableException,
      );

      expect(storage.uploadBuffer).toHaveBeenCalledTimes(3);
      const job = await jobs.findById(JOB_ID);
      expect(job?.status).toBe('processing');
      expect(job?.leaseToken).toBeNull();
      expect(notifier.notify).not.toHaveBeenCalled();
    });

    it('should reuse graded answers when the redelivery succeeds', async () => {
      storage.uploadBuffer.mockRejectedValueOnce(new TransientExternalError('a'));
      storage.uploadBuffer.mockRejectedValueOnce(new TransientExternalError('b'));
      storage.uploadBuffer.mockRejectedValueOnce(new TransientExternalError('c'));
      const task = buildTask([essay(1), essay(2)]);

      await expect(service.process(task)).rejects.toBeInstanceOf(
        ServiceUnavailableException,
      );
      const result = await service.process(task, { retryCount: 1 });

      expect(result.status).toBe('completed');
      expect(grader.grade).toHaveBeenCalledTimes(2);
    });

    it('should fail the job on the last delivery', async () => {
      storage.uploadBuffer.mockRejectedValue(
        new TransientExternalError('Upload failed: ECONNRESET'),
      );

      const result = await service.process(buildTask([essay(1)]), {
        retryCount: 2,
      });

      expect(result.status).toBe('failed');
      expect(result.error).toBe('Upload failed: ECONNRESET');
      expect(notifier.notify).toHaveBeenCalledTimes(1);
      const job = await jobs.findById(JOB_ID);
      expect(job?.status).toBe('failed');
      expect(job?.completedAt).toBeInstanceOf(Date);
    });

    it('should fail the job at once on an error that is not transient', async () => {
      reportRenderer.render.mockRejectedValueOnce(new Error('Font missing'));

      const result = await service.process(buildTask([essay(1)]));

      expect(result.status).toBe('failed');
      expect(result.error).toBe('Font missing');
    });
  });
});
