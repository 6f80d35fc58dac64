import {
  Body,
  Controller,
  Headers,
  HttpCode,
  Logger,
  Post,
  UseGuards,
} from '@nestjs/common';
import {
  parseRetryCount,
  RETRY_COUNT_HEADER,
  TaskQueueGuard,
} from '../common/guards/task-queue.guard';
import { GradingService } from './grading.service';
import { GradeTaskDto } from './dto/grade-task.dto';
import { GradeTaskResponseDto } from './dto/grade-task-response.dto';

/**
 * Cloud Tasks target. A 2xx response acknowledges the task. 409 and 503 ask
 * the queue to redeliver.
 */
@Controller('internal/tasks')
@UseGuards(TaskQueueGuard)
export class GradingController {
  private readonly logger = new Logger(GradingController.name);

  constructor(private readonly gradingService: GradingService) {}

  @Post('grade')
  @HttpCode(200)
  async grade(
    @Body() task: GradeTaskDto,
    @Headers(RETRY_COUNT_HEADER) retryCount?: string,
  ): Promise<GradeTaskResponseDto> {
    this.logger.log(`Grading task received: ${task.jobId}`);
    return this.gradingService.process(task, {
      retryCount: parseRetryCount(retryCount),
    });
  }
}
