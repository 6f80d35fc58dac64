import {
  AnswerOutcome,
  GradingJob,
  JobLease,
  JobTransition,
  NewGradingJob,
  NotificationRecord,
  ReportArtifact,
} from '../interfaces/grading-job.interface';

export interface CreateJobResult {
  job: GradingJob;
  created: boolean;
}

/**
 * Single source of truth for grading jobs. Every status change is a
 * compare-and-set: it lands only when the stored status (and lease, when one
 * is given) still matches, and resolves to `null` otherwise.
 */
export abstract class JobRepository {
  /**
   * Inserts a `queued` job. Returns the existing job instead when one has the
   * same id, or when a job that has not failed exists for the same attempt and
   * purpose.
   */
  abstract create(job: NewGradingJob): Promise<CreateJobResult>;

  abstract findById(jobId: string): Promise<GradingJob | null>;

  /** Latest job for the attempt and purpose that has not failed. */
  abstract findActiveByAttempt(
    attemptId: string,
    purpose: string,
  ): Promise<GradingJob | null>;

  /**
   * Moves `queued -> processing`, or takes over a `processing` job whose
   * lease has expired. Resolves to `null` when neither applies.
   */
  abstract claim(jobId: string, lease: JobLease): Promise<GradingJob | null>;

  abstract releaseLease(jobId: string, leaseToken: string): Promise<void>;

  abstract transition(
    jobId: string,
    change: JobTransition,
  ): Promise<GradingJob | null>;

  /** Deletes the job only while it is still `queued`. */
  abstract discard(jobId: string): Promise<boolean>;

  /** Upserts by question reference. */
  abstract saveOutcome(jobId: string, outcome: AnswerOutcome): Promise<void>;

  abstract listOutcomes(jobId: string): Promise<AnswerOutcome[]>;

  abstract recordArtifact(artifact: ReportArtifact): Promise<void>;

  abstract recordNotification(
    jobId: string,
    record: NotificationRecord,
  ): Promise<void>;
}
