import { JobStatus } from '../../jobs/interfaces/grading-job.interface';

export class GradeTaskResponseDto {
  jobId!: string;
  status!: JobStatus;
  /** True when the delivery found the job already terminal. */
  duplicate!: boolean;
  reportPath?: string | null;
  error?: string | null;
}
