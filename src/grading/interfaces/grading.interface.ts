import { TokenUsage } from '../../jobs/interfaces/grading-job.interface';

export interface GradedAnswer {
  score: number;
  rationale: string;
  tags: string[];
  usage: TokenUsage;
}
