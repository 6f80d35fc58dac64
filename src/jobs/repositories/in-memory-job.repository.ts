import { Injectable, Logger } from '@nestjs/common';
import { assertTransition, isTerminal } from '../job-status';
import {
  AnswerOutcome,
  GradingJob,
  JobLease,
  JobTransition,
  NewGradingJob,
  NotificationRecord,
  questionKey,
  ReportArtifact,
} from '../interfaces/grading-job.interface';
import { CreateJobResult, JobRepository } from './job.repository';

/**
 * Process-local job store for `JOB_STORE=memory` and tests. Each method runs
 * synchronously between awaits, so each compare-and-set is atomic.
 */
@Injectable()
export class InMemoryJobRepository extends JobRepository {
  private readonly logger = new Logger(InMemoryJobRepository.name);
  private readonly jobs = new Map<string, GradingJob>();
  private readonly outcomes = new Map<string, Map<string, AnswerOutcome>>();
  private readonly artifacts: ReportArtifact[] = [];

  async create(job: NewGradingJob): Promise<CreateJobResult> {
    const existing = this.jobs.get(job.id);
    if (existing) {
      return { job: this.copy(existing), created: false };
    }
    const active = this.findActive(job.attemptId, job.purpose);
    if (active) {
      return { job: this.copy(active), created: false };
    }

    const stored: GradingJob = {
      ...job,
      status: 'queued',
      createdAt: new Date(),
      startedAt: null,
      completedAt: null,
      leaseToken: null,
      leaseExpiresAt: null,
      reportPath: null,
      overall: null,
      usage: null,
      error: null,
      notifiedAt: null,
      notificationError: null,
    };
    this.jobs.set(job.id, stored);
    this.logger.debug(`Created job ${job.id}`);
    return { job: this.copy(stored), created: true };
  }

  async findById(jobId: string): Promise<GradingJob | null> {
    const job = this.jobs.get(jobId);
    return job ? this.copy(job) : null;
  }

  async findActiveByAttempt(
    attemptId: string,
    purpose: string,
  ): Promise<GradingJob | null> {
    const active = this.findActive(attemptId, purpose);
    return active ? this.copy(active) : null;
  }

  private findActive(attemptId: string, purpose: string): GradingJob | undefined {
    let latest: GradingJob | undefined;
    for (const job of this.jobs.values()) {
      if (
        job.attemptId === attemptId &&
        job.purpose === purpose &&
        job.status !== 'failed' &&
        (!latest || job.createdAt >= latest.createdAt)
      ) {
        latest = job;
      }
    }
    return latest;
  }

  async claim(jobId: string, lease: JobLease): Promise<GradingJob | null> {
    const job = this.jobs.get(jobId);
    if (!job || isTerminal(job.status)) {
      return null;
    }

    if (job.status === 'queued') {
      job.status = 'processing';
      job.startedAt = lease.now;
    } else if (job.leaseExpiresAt && job.leaseExpiresAt > lease.now) {
      return null;
    }

    job.leaseToken = lease.token;
    job.leaseExpiresAt = lease.expiresAt;
    return this.copy(job);
  }

  async releaseLease(jobId: string, leaseToken: string): Promise<void> {
    const job = this.jobs.get(jobId);
    if (job && job.status === 'processing' && job.leaseToken === leaseToken) {
      job.leaseToken = null;
      job.leaseExpiresAt = null;
    }
  }

  async transition(
    jobId: string,
    change: JobTransition,
  ): Promise<GradingJob | null> {
    assertTransition(change.from, change.to);

    const job = this.jobs.get(jobId);
    if (!job || job.status !== change.from) {
      return null;
    }
    if (change.leaseToken !== undefined && job.leaseToken !== change.leaseToken) {
      return null;
    }

    Object.assign(job, change.patch ?? {});
    job.status = change.to;
    if (isTerminal(change.to)) {
      job.leaseToken = null;
      job.leaseExpiresAt = null;
    }
    return this.copy(job);
  }

  async discard(jobId: string): Promise<boolean> {
    const job = this.jobs.get(jobId);
    if (!job || job.status !== 'queued') {
      return false;
    }
    this.jobs.delete(jobId);
    this.outcomes.delete(jobId);
    return true;
  }

  async saveOutcome(jobId: string, outcome: AnswerOutcome): Promise<void> {
    let byQuestion = this.outcomes.get(jobId);
    if (!byQuestion) {
      byQuestion = new Map();
      this.outcomes.set(jobId, byQuestion);
    }
    byQuestion.set(questionKey(outcome), { ...outcome, tags: [...outcome.tags] });
  }

  async listOutcomes(jobId: string): Promise<AnswerOutcome[]> {
    const byQuestion = this.outcomes.get(jobId);
    if (!byQuestion) {
      return [];
    }
    return Array.from(byQuestion.values(), (o) => ({ ...o, tags: [...o.tags] }));
  }

  async recordArtifact(artifact: ReportArtifact): Promise<void> {
    this.artifacts.push({ ...artifact });
  }

  async recordNotification(
    jobId: string,
    record: NotificationRecord,
  ): Promise<void> {
    const job = this.jobs.get(jobId);
    if (!job) {
      return;
    }
    job.notifiedAt = record.delivered ? record.at : null;
    job.notificationError = record.error ?? null;
  }

  listArtifacts(jobId: string): ReportArtifact[] {
    return this.artifacts.filter((a) => a.jobId === jobId);
  }

  private copy(job: GradingJob): GradingJob {
    return structuredClone(job);
  }
}
