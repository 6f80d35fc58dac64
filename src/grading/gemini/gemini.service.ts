import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  GenerativeModel,
  GoogleGenerativeAI,
  GoogleGenerativeAIFetchError,
} from '@google/generative-ai';
import {
  errorMessage,
  TransientExternalError,
} from '../../common/errors/grading.errors';
import { TokenUsage } from '../../jobs/interfaces/grading-job.interface';

export interface GenerationResult {
  text: string;
  usage: TokenUsage;
}

const RETRYABLE_STATUSES = new Set([408, 429, 500, 502, 503, 504]);

@Injectable()
export class GeminiService {
  private readonly logger = new Logger(GeminiService.name);
  private readonly modelName: string;
  private readonly apiKey: string | undefined;
  private model: GenerativeModel | null = null;

  constructor(private configService: ConfigService) {
    this.apiKey = configService.get<string>('gemini.apiKey');
    this.modelName = configService.get<string>('gemini.model', 'gemini-2.0-flash');
  }

  async generateContent(prompt: string): Promise<GenerationResult> {
    try {
      const result = await this.getModel().generateContent({
        contents: [{ role: 'user', parts: [{ text: prompt }] }],
        generationConfig: {
          temperature: 0.2,
          maxOutputTokens: 300,
          responseMimeType: 'application/json',
        },
      });

      const usage = result.response.usageMetadata;
      return {
        text: result.response.text(),
        usage: {
          inputTokens: usage?.promptTokenCount ?? 0,
          outputTokens: usage?.candidatesTokenCount ?? 0,
        },
      };
    } catch (error) {
      this.logger.error(`Gemini API call failed: ${errorMessage(error)}`);
      throw this.classify(error);
    }
  }

  // Created on first use so that dummy mode runs without an API key.
  private getModel(): GenerativeModel {
    if (!this.model) {
      if (!this.apiKey) {
        throw new Error('GEMINI_API_KEY is not configured');
      }
      this.model = new GoogleGenerativeAI(this.apiKey).getGenerativeModel({
        model: this.modelName,
      });
    }
    return this.model;
  }

  private classify(error: unknown): unknown {
    if (error instanceof GoogleGenerativeAIFetchError) {
      if (error.status === undefined || RETRYABLE_STATUSES.has(error.status)) {
        return new TransientExternalError(error.message, { cause: error });
      }
      return error;
    }
    if (error instanceof TypeError) {
      // fetch() reports network failures as TypeError.
      return new TransientExternalError(error.message, { cause: error });
    }
    return error;
  }
}
