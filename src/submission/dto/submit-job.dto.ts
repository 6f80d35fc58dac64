import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayNotEmpty,
  IsArray,
  IsInt,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  IsUrl,
  IsUUID,
  Min,
  ValidateNested,
} from 'class-validator';
import { SectionMap } from '../../jobs/interfaces/grading-job.interface';
import { AnswerSubmissionDto } from './answer-submission.dto';
import { IsSectionMap } from './is-section-map.validator';

export class CallbackDto {
  @IsUrl({ protocols: ['http', 'https'], require_tld: false })
  url!: string;
}

/** Fields shared by the public submission body and the queued task body. */
export class JobPayloadDto {
  @IsString()
  @IsNotEmpty()
  attemptId!: string;

  @IsString()
  @IsNotEmpty()
  userId!: string;

  @IsOptional()
  @IsString()
  examId?: string;

  @IsInt()
  @Min(1)
  attemptNo!: number;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  purpose?: string;

  @IsArray()
  @ArrayNotEmpty()
  @ArrayMaxSize(500)
  @ValidateNested({ each: true })
  @Type(() => AnswerSubmissionDto)
  answers!: AnswerSubmissionDto[];

  @IsOptional()
  @IsObject()
  rubric?: Record<string, unknown>;

  @IsOptional()
  @IsSectionMap()
  sectionMap?: SectionMap;

  @IsOptional()
  @ValidateNested()
  @Type(() => CallbackDto)
  callback?: CallbackDto;

  @IsOptional()
  @IsObject()
  metadata?: Record<string, unknown>;
}

export class SubmitJobDto extends JobPayloadDto {
  @IsOptional()
  @IsUUID()
  jobId?: string;
}
