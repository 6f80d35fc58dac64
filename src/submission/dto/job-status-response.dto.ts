import {
  GradingJob,
  JobStatus,
  OverallResult,
} from '../../jobs/interfaces/grading-job.interface';

export class JobStatusResponseDto {
  jobId!: string;
  attemptId!: string;
  status!: JobStatus;
  createdAt!: string;
  startedAt!: string | null;
  completedAt!: string | null;
  reportPath!: string | null;
  overall!: OverallResult | null;
  error!: string | null;

  static fromJob(job: GradingJob): JobStatusResponseDto {
    return {
      jobId: job.id,
      attemptId: job.attemptId,
      status: job.status,
      createdAt: job.createdAt.toISOString(),
      startedAt: job.startedAt?.toISOString() ?? null,
      completedAt: job.completedAt?.toISOString() ?? null,
      reportPath: job.reportPath,
      overall: job.overall,
      error: job.error,
    };
  }
}
