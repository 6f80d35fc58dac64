import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GraderMode } from '../config/configuration';
import { withTimeout } from '../common/utils/timeout.util';
import { AnswerSubmission } from '../jobs/interfaces/grading-job.interface';
import { GeminiService } from './gemini/gemini.service';
import { GradedAnswer } from './interfaces/grading.interface';

export const DUMMY_SCORE = 0.8;
export const DUMMY_RATIONALE = 'Meets most criteria.';
export const PARSE_FAILURE_RATIONALE =
  'Grading failed - unable to parse AI response';

const MAX_RATIONALE_LENGTH = 500;

const SCORE_KEYS = ['score', 'grade', 'rating'] as const;
const RATIONALE_KEYS = ['rationale', 'explanation', 'feedback', 'comment'] as const;

export interface ParsedGrade {
  score: number;
  rationale: string;
  parsed: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Reads a score and rationale out of a model reply. Accepts a bare JSON
 * object or one embedded in surrounding prose, and a few synonymous keys.
 * Scores are clamped to [0, 1].
 */
export function parseGradeResponse(raw: string): ParsedGrade {
  let json = tryParseJson(raw);
  if (json === undefined) {
    const embedded = /\{[\s\S]*\}/.exec(raw);
    json = embedded ? tryParseJson(embedded[0]) : undefined;
  }
  if (!isRecord(json)) {
    return { score: 0, rationale: PARSE_FAILURE_RATIONALE, parsed: false };
  }

  let score: number | undefined;
  for (const key of SCORE_KEYS) {
    const value = json[key];
    const numeric =
      typeof value === 'number' ? value : typeof value === 'string' ? parseFloat(value) : NaN;
    if (Number.isFinite(numeric)) {
      score = Math.max(0, Math.min(1, numeric));
      break;
    }
  }

  let rationale: string | undefined;
  for (const key of RATIONALE_KEYS) {
    const value = json[key];
    if (typeof value === 'string' && value.length > 0) {
      rationale = value.slice(0, MAX_RATIONALE_LENGTH);
      break;
    }
  }

  return {
    score: score ?? 0,
    rationale: rationale ?? PARSE_FAILURE_RATIONALE,
    parsed: score !== undefined,
  };
}

@Injectable()
export class AnswerGraderService {
  private readonly logger = new Logger(AnswerGraderService.name);
  private readonly mode: GraderMode;
  private readonly timeoutMs: number;

  constructor(
    private readonly geminiService: GeminiService,
    configService: ConfigService,
  ) {
    this.mode = configService.get<GraderMode>('grading.mode', 'gemini');
    this.timeoutMs = configService.get<number>('grading.answerTimeoutMs', 60000);
  }

  get gradingMode(): GraderMode {
    return this.mode;
  }

  /**
   * One grading attempt for one answer. Throws on failure; retries and
   * fallbacks belong to the caller.
   */
  async grade(
    answer: AnswerSubmission,
    rubric: Record<string, unknown>,
  ): Promise<GradedAnswer> {
    if (this.mode === 'dummy') {
      return {
        score: DUMMY_SCORE,
        rationale: DUMMY_RATIONALE,
        tags: [],
        usage: { inputTokens: 0, outputTokens: 0 },
      };
    }

    const label = `${answer.questionType}:${answer.questionId}`;
    const result = await withTimeout(
      this.geminiService.generateContent(this.buildPrompt(answer, rubric)),
      this.timeoutMs,
      `Grading ${label}`,
    );

    const parsed = parseGradeResponse(result.text);
    if (!parsed.parsed) {
      this.logger.warn(`Unparseable grading reply for ${label}`);
    }
    return {
      score: parsed.score,
      rationale: parsed.rationale,
      tags: parsed.parsed ? [] : ['parse_error'],
      usage: result.usage,
    };
  }

  private buildPrompt(
    answer: AnswerSubmission,
    rubric: Record<string, unknown>,
  ): string {
    return `You are a strict grader. Rubric (JSON): ${JSON.stringify(rubric)}
Question identifier: ${answer.questionType}:${answer.questionId}
Student answer:
${answer.answerText}

Return a JSON object with:
- "score": a float from 0 to 1
- "rationale": a short sentence explaining the score`;
  }
}
