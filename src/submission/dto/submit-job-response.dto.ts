import { JobStatus } from '../../jobs/interfaces/grading-job.interface';

export class SubmitJobResponseDto {
  jobId!: string;
  status!: JobStatus;
}
