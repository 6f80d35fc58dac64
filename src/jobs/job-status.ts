import { JobStatus, TerminalJobStatus } from './interfaces/grading-job.interface';

const ALLOWED_TRANSITIONS: Readonly<Record<JobStatus, readonly JobStatus[]>> = {
  queued: ['processing'],
  processing: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export class IllegalTransitionError extends Error {
  constructor(
    readonly from: JobStatus,
    readonly to: JobStatus,
  ) {
    super(`Illegal job status transition: ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export function isTerminal(status: JobStatus): status is TerminalJobStatus {
  return status === 'completed' || status === 'failed';
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function assertTransition(from: JobStatus, to: JobStatus): void {
  if (!canTransition(from, to)) {
    throw new IllegalTransitionError(from, to);
  }
}
