import { IsUUID } from 'class-validator';
import { JobPayloadDto } from '../../submission/dto/submit-job.dto';

export class GradeTaskDto extends JobPayloadDto {
  @IsUUID()
  jobId!: string;
}
