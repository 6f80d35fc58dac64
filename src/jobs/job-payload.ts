import { GradeTaskPayload } from '../queue/interfaces/grade-task.interface';
import { GradingJob, NewGradingJob } from './interfaces/grading-job.interface';

export const DEFAULT_PURPOSE = 'final';

export function toNewGradingJob(payload: GradeTaskPayload): NewGradingJob {
  return {
    id: payload.jobId,
    attemptId: payload.attemptId,
    userId: payload.userId,
    examId: payload.examId ?? null,
    attemptNo: payload.attemptNo,
    purpose: payload.purpose ?? DEFAULT_PURPOSE,
    answers: payload.answers.map(({ questionType, questionId, answerText }) => ({
      questionType,
      questionId,
      answerText,
    })),
    rubric: payload.rubric ?? {},
    sectionMap: payload.sectionMap ?? {},
    callbackUrl: payload.callback?.url ?? null,
    metadata: payload.metadata ?? {},
  };
}

export function toTaskPayload(job: NewGradingJob | GradingJob): GradeTaskPayload {
  return {
    jobId: job.id,
    attemptId: job.attemptId,
    userId: job.userId,
    ...(job.examId !== null ? { examId: job.examId } : {}),
    attemptNo: job.attemptNo,
    purpose: job.purpose,
    answers: job.answers,
    rubric: job.rubric,
    sectionMap: job.sectionMap,
    ...(job.callbackUrl !== null ? { callback: { url: job.callbackUrl } } : {}),
    metadata: job.metadata,
  };
}
