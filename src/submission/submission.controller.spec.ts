import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { mockConfigService } from '../../test/config.mock';
import { SubmissionController } from './submission.controller';
import { SubmissionService } from './submission.service';
import { SubmitJobDto } from './dto/submit-job.dto';

describe('SubmissionController', () => {
  let controller: SubmissionController;
  const service = {
    submit: jest.fn(),
    getStatus: jest.fn(),
  };

  const request: SubmitJobDto = {
    attemptId: 'attempt-1',
    userId: 'user-1',
    attemptNo: 1,
    answers: [{ questionType: 'essay', questionId: 1, answerText: 'An answer' }],
  };

  beforeEach(async () => {
    jest.clearAllMocks();

    const module: TestingModule = await Test.createTestingModule({
      controllers: [SubmissionController],
      providers: [
        { provide: SubmissionService, useValue: service },
        { provide: ConfigService, useValue: mockConfigService() },
      ],
    }).compile();

    controller = module.get<SubmissionController>(SubmissionController);
  });

  it('should be defined', () => {
    expect(controller).toBeDefined();
  });

  describe('submit', () => {
    it('should return the queued job', async () => {
      const queued = { jobId: '550e8400-e29b-41d4-a716-446655440000', status: 'queued' };
      service.submit.mockResolvedValue(queued);

      const result = await controller.submit(request);

      expect(result).toEqual(queued);
      expect(service.submit).toHaveBeenCalledWith(request);
    });
  });

  describe('getStatus', () => {
    it('should delegate to the service', async () => {
      const jobId = '550e8400-e29b-41d4-a716-446655440000';
      service.getStatus.mockResolvedValue({ jobId, status: 'processing' });

      const result = await controller.getStatus(jobId);

      expect(result).toEqual({ jobId, status: 'processing' });
      expect(service.getStatus).toHaveBeenCalledWith(jobId);
    });
  });
});
