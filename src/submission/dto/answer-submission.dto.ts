import { IsInt, IsNotEmpty, IsString, MaxLength, Min } from 'class-validator';

export class AnswerSubmissionDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  questionType!: string;

  @IsInt()
  @Min(0)
  questionId!: number;

  @IsString()
  @MaxLength(50000)
  answerText!: string;
}
