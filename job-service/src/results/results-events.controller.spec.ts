import { Test, TestingModule } from '@nestjs/testing';
import { Logger } from '@nestjs/common';
import { ClsService } from 'nestjs-cls';
import { ResultsEventsController } from './results-events.controller';
import { ResultsIngestService } from './results-ingest.service';
import { bucket, quantiles, record } from '../../test/fixtures';

describe('ResultsEventsController', () => {
  let controller: ResultsEventsController;
  let ingestService: jest.Mocked<Pick<ResultsIngestService, 'ingest'>>;
  let clsService: jest.Mocked<Pick<ClsService, 'run' | 'set'>>;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [ResultsEventsController],
      providers: [
        {
          provide: ResultsIngestService,
          useValue: { ingest: jest.fn() },
        },
        {
          provide: ClsService,
          useValue: {
            run: jest.fn().mockImplementation(async (callback: () => Promise<void>) => {
              await callback();
            }),
            set: jest.fn(),
          },
        },
      ],
    }).compile();

    controller = module.get<ResultsEventsController>(ResultsEventsController);

    ingestService = module.get(ResultsIngestService) as unknown as jest.Mocked<Pick<ResultsIngestService, 'ingest'>>;
    clsService = module.get(ClsService) as unknown as jest.Mocked<Pick<ClsService, 'run' | 'set'>>;

    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => { });
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('handleJobResults', () => {
    it('should set the correlationId and ingest the parsed message (Happy Path)', async () => {
      // Arrange
      ingestService.ingest.mockResolvedValue({ jobId: 'web-farm', batchedDocuments: 2, failedWrites: 0, committed: true });
      const { records: _records, bucketInfluencers: _influencers, ...bareBucket } = bucket();

      // Act
      await controller.handleJobResults({
        jobId: 'web-farm',
        correlationId: 'corr-abc',
        buckets: [bareBucket],
        records: [record('r1')],
        commit: true,
      });

      // Assert
      expect(clsService.run).toHaveBeenCalledTimes(1);
      expect(clsService.set).toHaveBeenCalledWith('correlationId', 'corr-abc');
      expect(ingestService.ingest).toHaveBeenCalledWith({
        jobId: 'web-farm',
        correlationId: 'corr-abc',
        buckets: [bucket()],
        records: [record('r1')],
        commit: true,
      });
    });

    it('should default commit to false', async () => {
      await controller.handleJobResults({ jobId: 'web-farm', quantiles: quantiles() });

      expect(clsService.set).not.toHaveBeenCalled();
      expect(ingestService.ingest).toHaveBeenCalledWith({ jobId: 'web-farm', quantiles: quantiles(), commit: false });
    });

    it('should log and drop a malformed message (Edge Case)', async () => {
      await controller.handleJobResults({ jobId: 'web-farm', records: [{ resultType: 'record' }] });

      expect(ingestService.ingest).not.toHaveBeenCalled();
      expect(Logger.prototype.error).toHaveBeenCalledWith(
        expect.objectContaining({ error: expect.any(String) }),
        'Dropping malformed results message',
      );
    });

    it('should drop a message carrying results of another job (Edge Case)', async () => {
      await controller.handleJobResults({ jobId: 'other-job', records: [record('r1')] });

      expect(ingestService.ingest).not.toHaveBeenCalled();
    });

    it('should log and rethrow when ingestion fails (Edge Case)', async () => {
      // Arrange
      ingestService.ingest.mockRejectedValue(new Error('cluster unavailable'));

      // Act & Assert
      await expect(controller.handleJobResults({ jobId: 'web-farm', records: [record('r1')] })).rejects.toThrow(
        'cluster unavailable',
      );
      expect(Logger.prototype.error).toHaveBeenCalledWith(
        { jobId: 'web-farm', error: 'cluster unavailable' },
        'Failed to persist results',
      );
    });
  });
});
