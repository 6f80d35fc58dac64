import {
  AnswerOutcome,
  AnswerSubmission,
  OverallResult,
  SectionMap,
  UsageTotals,
} from '../jobs/interfaces/grading-job.interface';
import { GraderMode } from '../config/configuration';

// Gemini Flash list prices, USD per million tokens.
export const INPUT_USD_PER_MILLION = 0.15;
export const OUTPUT_USD_PER_MILLION = 0.6;

export function lookupSection(
  sectionMap: SectionMap,
  answer: Pick<AnswerSubmission, 'questionType' | 'questionId'>,
): string | null {
  // Maps stored before label validation may hold non-string values.
  const label: unknown = sectionMap[answer.questionType]?.[String(answer.questionId)];
  return typeof label === 'string' ? label : null;
}

export function fallbackOutcome(
  answer: AnswerSubmission,
  section: string | null,
  reason: string,
): AnswerOutcome {
  return {
    questionType: answer.questionType,
    questionId: answer.questionId,
    section,
    score: 0,
    rationale: `Grading failed: ${reason}`,
    tags: ['api_error'],
    fallback: true,
    usage: { inputTokens: 0, outputTokens: 0 },
  };
}

export function summarize(
  outcomes: readonly AnswerOutcome[],
  passThreshold: number,
  mode: GraderMode,
): OverallResult {
  const total = outcomes.reduce((sum, o) => sum + o.score, 0);
  const score = total / Math.max(1, outcomes.length);
  const fallbacks = outcomes.filter((o) => o.fallback).length;

  const notes = [mode === 'dummy' ? 'Auto-graded (dummy).' : 'Gemini auto-grade'];
  if (fallbacks > 0) {
    notes.push(`${fallbacks} of ${outcomes.length} answers could not be graded.`);
  }

  return {
    score,
    band: score >= passThreshold ? 'Pass' : 'Fail',
    notes: notes.join(' '),
  };
}

export function computeUsage(outcomes: readonly AnswerOutcome[]): UsageTotals {
  const inputTokens = outcomes.reduce((sum, o) => sum + o.usage.inputTokens, 0);
  const outputTokens = outcomes.reduce((sum, o) => sum + o.usage.outputTokens, 0);
  const usd =
    (inputTokens / 1_000_000) * INPUT_USD_PER_MILLION +
    (outputTokens / 1_000_000) * OUTPUT_USD_PER_MILLION;
  return { inputTokens, outputTokens, usd };
}
