import {
  AnswerSubmission,
  SectionMap,
} from '../../jobs/interfaces/grading-job.interface';

/** Body of the Cloud Task delivered to POST /internal/tasks/grade. */
export interface GradeTaskPayload {
  jobId: string;
  attemptId: string;
  userId: string;
  examId?: string;
  attemptNo: number;
  purpose?: string;
  answers: AnswerSubmission[];
  rubric?: Record<string, unknown>;
  sectionMap?: SectionMap;
  callback?: { url: string };
  metadata?: Record<string, unknown>;
}
