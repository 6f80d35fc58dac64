/**
 * A failure in an external collaborator (Gemini, Cloud Tasks, Supabase, GCS,
 * the webhook receiver) that may succeed when tried again.
 */
export class TransientExternalError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransientExternalError';
  }
}

/** Ends a grading job in the `failed` state. */
export class UnrecoverableJobError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UnrecoverableJobError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
