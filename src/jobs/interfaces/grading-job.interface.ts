export const JOB_STATUSES = [
  'queued',
  'processing',
  'completed',
  'failed',
] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export type TerminalJobStatus = Extract<JobStatus, 'completed' | 'failed'>;

export interface AnswerSubmission {
  questionType: string;
  questionId: number;
  answerText: string;
}

/** `{ [questionType]: { [questionId]: sectionLabel } }` */
export type SectionMap = Record<string, Record<string, string>>;

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface UsageTotals extends TokenUsage {
  usd: number;
}

export interface AnswerOutcome {
  questionType: string;
  questionId: number;
  section: string | null;
  score: number;
  rationale: string;
  tags: string[];
  /** Set when grading failed and a zero score was recorded instead. */
  fallback: boolean;
  usage: TokenUsage;
}

export interface OverallResult {
  score: number;
  band: 'Pass' | 'Fail';
  notes: string;
}

export interface GradingJob {
  id: string;
  attemptId: string;
  userId: string;
  examId: string | null;
  attemptNo: number;
  purpose: string;
  status: JobStatus;
  answers: AnswerSubmission[];
  rubric: Record<string, unknown>;
  sectionMap: SectionMap;
  callbackUrl: string | null;
  metadata: Record<string, unknown>;
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  leaseToken: string | null;
  leaseExpiresAt: Date | null;
  reportPath: string | null;
  overall: OverallResult | null;
  usage: UsageTotals | null;
  error: string | null;
  notifiedAt: Date | null;
  notificationError: string | null;
}

export type NewGradingJob = Pick<
  GradingJob,
  | 'id'
  | 'attemptId'
  | 'userId'
  | 'examId'
  | 'attemptNo'
  | 'purpose'
  | 'answers'
  | 'rubric'
  | 'sectionMap'
  | 'callbackUrl'
  | 'metadata'
>;

export type JobPatch = Partial<
  Pick<GradingJob, 'completedAt' | 'reportPath' | 'overall' | 'usage' | 'error'>
>;

export interface JobTransition {
  from: JobStatus;
  to: JobStatus;
  /** When set, the write only lands if the job still holds this lease. */
  leaseToken?: string;
  patch?: JobPatch;
}

export interface JobLease {
  token: string;
  now: Date;
  expiresAt: Date;
}

export interface ReportArtifact {
  jobId: string;
  kind: 'pdf';
  storagePath: string;
  sizeBytes: number;
  sha256: string;
}

export interface NotificationRecord {
  delivered: boolean;
  at: Date;
  error?: string;
}

export function questionKey(answer: {
  questionType: string;
  questionId: number;
}): string {
  return `${answer.questionType}:${answer.questionId}`;
}
