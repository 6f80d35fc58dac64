import { Logger } from '@nestjs/common';
import { PostgrestError, SupabaseClient } from '@supabase/supabase-js';
import { TransientExternalError } from '../../common/errors/grading.errors';
import { assertTransition, isTerminal } from '../job-status';
import {
  AnswerOutcome,
  AnswerSubmission,
  GradingJob,
  JobLease,
  JobStatus,
  JobTransition,
  NewGradingJob,
  NotificationRecord,
  OverallResult,
  ReportArtifact,
  SectionMap,
  UsageTotals,
} from '../interfaces/grading-job.interface';
import { CreateJobResult, JobRepository } from './job.repository';

const JOBS_TABLE = 'grade_jobs';
const RESULTS_TABLE = 'grade_results';
const ARTIFACTS_TABLE = 'artifacts';
const UNIQUE_VIOLATION = '23505';

export interface JobRow {
  id: string;
  attempt_id: string;
  user_id: string;
  exam_id: string | null;
  attempt_no: number;
  purpose: string;
  status: JobStatus;
  answers: AnswerSubmission[];
  rubric: Record<string, unknown>;
  section_map: SectionMap;
  callback_url: string | null;
  metadata: Record<string, unknown>;
  created_at: string;
  started_at: string | null;
  finished_at: string | null;
  lease_token: string | null;
  lease_expires_at: string | null;
  report_path: string | null;
  overall: OverallResult | null;
  cost_input_tokens: number | null;
  cost_output_tokens: number | null;
  cost_usd: number | null;
  error_message: string | null;
  notified_at: string | null;
  notification_error: string | null;
}

export interface ResultRow {
  job_id: string;
  section: string | null;
  question_type: string;
  question_id: number;
  score: number;
  rationale: string;
  tags: string[];
  fallback: boolean;
  input_tokens: number;
  output_tokens: number;
}

const toDate = (value: string | null): Date | null =>
  value === null ? null : new Date(value);

export function fromJobRow(row: JobRow): GradingJob {
  const usage: UsageTotals | null =
    row.cost_usd === null
      ? null
      : {
          inputTokens: row.cost_input_tokens ?? 0,
          outputTokens: row.cost_output_tokens ?? 0,
          usd: row.cost_usd,
        };

  return {
    id: row.id,
    attemptId: row.attempt_id,
    userId: row.user_id,
    examId: row.exam_id,
    attemptNo: row.attempt_no,
    purpose: row.purpose,
    status: row.status,
    answers: row.answers ?? [],
    rubric: row.rubric ?? {},
    sectionMap: row.section_map ?? {},
    callbackUrl: row.callback_url,
    metadata: row.metadata ?? {},
    createdAt: new Date(row.created_at),
    startedAt: toDate(row.started_at),
    completedAt: toDate(row.finished_at),
    leaseToken: row.lease_token,
    leaseExpiresAt: toDate(row.lease_expires_at),
    reportPath: row.report_path,
    overall: row.overall,
    usage,
    error: row.error_message,
    notifiedAt: toDate(row.notified_at),
    notificationError: row.notification_error,
  };
}

export function toResultRow(jobId: string, outcome: AnswerOutcome): ResultRow {
  return {
    job_id: jobId,
    section: outcome.section,
    question_type: outcome.questionType,
    question_id: outcome.questionId,
    score: outcome.score,
    rationale: outcome.rationale,
    tags: outcome.tags,
    fallback: outcome.fallback,
    input_tokens: outcome.usage.inputTokens,
    output_tokens: outcome.usage.outputTokens,
  };
}

export function fromResultRow(row: ResultRow): AnswerOutcome {
  return {
    questionType: row.question_type,
    questionId: row.question_id,
    section: row.section,
    score: row.score,
    rationale: row.rationale,
    tags: row.tags ?? [],
    fallback: row.fallback,
    usage: { inputTokens: row.input_tokens, outputTokens: row.output_tokens },
  };
}

/**
 * Job store backed by the `grade_jobs`, `grade_results` and `artifacts`
 * tables (see supabase/migrations). Guarded writes filter on the expected
 * status and lease, and a write that matches no row lost the race.
 */
export class SupabaseJobRepository extends JobRepository {
  private readonly logger = new Logger(SupabaseJobRepository.name);

  constructor(private readonly client: SupabaseClient) {
    super();
  }

  async create(job: NewGradingJob): Promise<CreateJobResult> {
    const { data, error } = await this.client
      .from(JOBS_TABLE)
      .upsert(
        {
          id: job.id,
          attempt_id: job.attemptId,
          user_id: job.userId,
          exam_id: job.examId,
          attempt_no: job.attemptNo,
          purpose: job.purpose,
          status: 'queued',
          answers: job.answers,
          rubric: job.rubric,
          section_map: job.sectionMap,
          callback_url: job.callbackUrl,
          metadata: job.metadata,
        },
        { onConflict: 'id', ignoreDuplicates: true },
      )
      .select('*')
      .returns<JobRow[]>();
    if (error?.code === UNIQUE_VIOLATION) {
      // Another request created the live job for this attempt first.
      const active = await this.findActiveByAttempt(job.attemptId, job.purpose);
      if (active) {
        return { job: active, created: false };
      }
    }
    this.throwOnError('create job', error);

    if (data && data.length > 0) {
      return { job: fromJobRow(data[0]), created: true };
    }

    const existing = await this.findById(job.id);
    if (!existing) {
      throw new TransientExternalError(
        `Job ${job.id} was neither inserted nor found`,
      );
    }
    return { job: existing, created: false };
  }

  async findById(jobId: string): Promise<GradingJob | null> {
    const { data, error } = await this.client
      .from(JOBS_TABLE)
      .select('*')
      .eq('id', jobId)
      .limit(1)
      .returns<JobRow[]>();
    this.throwOnError('find job', error);
    return data && data.length > 0 ? fromJobRow(data[0]) : null;
  }

  async findActiveByAttempt(
    attemptId: string,
    purpose: string,
  ): Promise<GradingJob | null> {
    const { data, error } = await this.client
      .from(JOBS_TABLE)
      .select('*')
      .eq('attempt_id', attemptId)
      .eq('purpose', purpose)
      .neq('status', 'failed')
      .order('created_at', { ascending: false })
      .limit(1)
      .returns<JobRow[]>();
    this.throwOnError('find job by attempt', error);
    return data && data.length > 0 ? fromJobRow(data[0]) : null;
  }

  async claim(jobId: string, lease: JobLease): Promise<GradingJob | null> {
    const leaseFields = {
      lease_token: lease.token,
      lease_expires_at: lease.expiresAt.toISOString(),
    };

    const fresh = await this.client
      .from(JOBS_TABLE)
      .update({
        ...leaseFields,
        status: 'processing',
        started_at: lease.now.toISOString(),
      })
      .eq('id', jobId)
      .eq('status', 'queued')
      .select('*')
      .returns<JobRow[]>();
    this.throwOnError('claim queued job', fresh.error);
    if (fresh.data && fresh.data.length > 0) {
      return fromJobRow(fresh.data[0]);
    }

    const takeover = await this.client
      .from(JOBS_TABLE)
      .update(leaseFields)
      .eq('id', jobId)
      .eq('status', 'processing')
      .or(
        `lease_expires_at.is.null,lease_expires_at.lte.${lease.now.toISOString()}`,
      )
      .select('*')
      .returns<JobRow[]>();
    this.throwOnError('take over expired lease', takeover.error);
    if (takeover.data && takeover.data.length > 0) {
      this.logger.warn(`Took over expired lease on job ${jobId}`);
      return fromJobRow(takeover.data[0]);
    }
    return null;
  }

  async releaseLease(jobId: string, leaseToken: string): Promise<void> {
    const { error } = await this.client
      .from(JOBS_TABLE)
      .update({ lease_token: null, lease_expires_at: null })
      .eq('id', jobId)
      .eq('status', 'processing')
      .eq('lease_token', leaseToken);
    this.throwOnError('release lease', error);
  }

  async transition(
    jobId: string,
    change: JobTransition,
  ): Promise<GradingJob | null> {
    assertTransition(change.from, change.to);

    const patch = change.patch ?? {};
    const update: Partial<JobRow> = { status: change.to };
    if (patch.completedAt !== undefined) {
      update.finished_at = patch.completedAt?.toISOString() ?? null;
    }
    if (patch.reportPath !== undefined) update.report_path = patch.reportPath;
    if (patch.overall !== undefined) update.overall = patch.overall;
    if (patch.error !== undefined) update.error_message = patch.error;
    if (patch.usage) {
      update.cost_input_tokens = patch.usage.inputTokens;
      update.cost_output_tokens = patch.usage.outputTokens;
      update.cost_usd = patch.usage.usd;
    }
    if (isTerminal(change.to)) {
      update.lease_token = null;
      update.lease_expires_at = null;
    }

    let query = this.client
      .from(JOBS_TABLE)
      .update(update)
      .eq('id', jobId)
      .eq('status', change.from);
    if (change.leaseToken !== undefined) {
      query = query.eq('lease_token', change.leaseToken);
    }

    const { data, error } = await query.select('*').returns<JobRow[]>();
    this.throwOnError(`transition ${change.from} -> ${change.to}`, error);
    return data && data.length > 0 ? fromJobRow(data[0]) : null;
  }

  async discard(jobId: string): Promise<boolean> {
    const { data, error } = await this.client
      .from(JOBS_TABLE)
      .delete()
      .eq('id', jobId)
      .eq('status', 'queued')
      .select('id')
      .returns<Pick<JobRow, 'id'>[]>();
    this.throwOnError('discard job', error);
    return Boolean(data && data.length > 0);
  }

  async saveOutcome(jobId: string, outcome: AnswerOutcome): Promise<void> {
    const { error } = await this.client
      .from(RESULTS_TABLE)
      .upsert(toResultRow(jobId, outcome), {
        onConflict: 'job_id,question_type,question_id',
      });
    this.throwOnError('save outcome', error);
  }

  async listOutcomes(jobId: string): Promise<AnswerOutcome[]> {
    const { data, error } = await this.client
      .from(RESULTS_TABLE)
      .select('*')
      .eq('job_id', jobId)
      .returns<ResultRow[]>();
    this.throwOnError('list outcomes', error);
    return (data ?? []).map(fromResultRow);
  }

  async recordArtifact(artifact: ReportArtifact): Promise<void> {
    const { error } = await this.client.from(ARTIFACTS_TABLE).insert({
      job_id: artifact.jobId,
      kind: artifact.kind,
      storage_path: artifact.storagePath,
      size_bytes: artifact.sizeBytes,
      sha256: artifact.sha256,
    });
    this.throwOnError('record artifact', error);
  }

  async recordNotification(
    jobId: string,
    record: NotificationRecord,
  ): Promise<void> {
    const { error } = await this.client
      .from(JOBS_TABLE)
      .update({
        notified_at: record.delivered ? record.at.toISOString() : null,
        notification_error: record.error ?? null,
      })
      .eq('id', jobId);
    this.throwOnError('record notification', error);
  }

  private throwOnError(operation: string, error: PostgrestError | null): void {
    if (error) {
      throw new TransientExternalError(
        `Supabase ${operation} failed: ${error.message}`,
        { cause: error },
      );
    }
  }
}
