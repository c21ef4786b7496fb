import { Test, TestingModule } from '@nestjs/testing';
import { Logger } from '@nestjs/common';
import { JobResultsPersister } from './job-results.persister';
import { ResultsIngestService } from './results-ingest.service';
import {
  bucket,
  categoryDefinition,
  influencer,
  modelDebugOutput,
  modelSizeStats,
  modelSnapshot,
  partitionProbabilities,
  quantiles,
  record,
} from '../../test/fixtures';

describe('ResultsIngestService', () => {
  let service: ResultsIngestService;
  let persister: {
    bulkPersister: jest.Mock;
    persistCategoryDefinition: jest.Mock;
    persistModelSnapshot: jest.Mock;
    persistModelSizeStats: jest.Mock;
    persistModelDebugOutput: jest.Mock;
    persistQuantiles: jest.Mock;
    commitResultWrites: jest.Mock;
  };
  let batch: {
    size: number;
    addBucket: jest.Mock;
    addRecords: jest.Mock;
    addInfluencers: jest.Mock;
    addPartitionProbabilities: jest.Mock;
    execute: jest.Mock;
  };
  let calls: string[];

  beforeEach(async () => {
    calls = [];
    const track = (name: string, result: unknown) => jest.fn(async () => {
      calls.push(name);
      return result;
    });

    batch = {
      size: 4,
      addBucket: jest.fn(),
      addRecords: jest.fn(),
      addInfluencers: jest.fn(),
      addPartitionProbabilities: jest.fn(),
      execute: track('execute', undefined),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ResultsIngestService,
        {
          provide: JobResultsPersister,
          useValue: {
            bulkPersister: jest.fn().mockReturnValue(batch),
            persistCategoryDefinition: track('category', true),
            persistModelSnapshot: track('snapshot', true),
            persistModelSizeStats: track('sizeStats', true),
            persistModelDebugOutput: track('debug', true),
            persistQuantiles: track('quantiles', true),
            commitResultWrites: track('commit', undefined),
          },
        },
      ],
    }).compile();

    service = module.get<ResultsIngestService>(ResultsIngestService);
    persister = module.get(JobResultsPersister) as unknown as typeof persister;

    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => { });
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should batch the bucket results, then write the other kinds, then commit (Happy Path)', async () => {
    // Arrange
    const message = {
      jobId: 'web-farm',
      buckets: [bucket()],
      records: [record('r1')],
      influencers: [influencer('i1')],
      partitionProbabilities: [partitionProbabilities('pp1')],
      categoryDefinitions: [categoryDefinition(1)],
      modelSnapshots: [modelSnapshot()],
      quantiles: quantiles(),
      modelSizeStats: [modelSizeStats()],
      modelDebugOutput: [modelDebugOutput()],
      commit: true,
    };

    // Act
    const summary = await service.ingest(message);

    // Assert
    expect(persister.bulkPersister).toHaveBeenCalledWith('web-farm');
    expect(batch.addBucket).toHaveBeenCalledWith(message.buckets[0]);
    expect(batch.addRecords).toHaveBeenCalledWith(message.records);
    expect(batch.addInfluencers).toHaveBeenCalledWith(message.influencers);
    expect(batch.addPartitionProbabilities).toHaveBeenCalledWith(message.partitionProbabilities[0]);
    expect(calls).toEqual(['execute', 'category', 'snapshot', 'sizeStats', 'debug', 'quantiles', 'commit']);
    expect(summary).toEqual({ jobId: 'web-farm', batchedDocuments: 4, failedWrites: 0, committed: true });
    expect(Logger.prototype.log).toHaveBeenCalledWith(summary, 'Results persisted');
  });

  it('should not commit unless the message asks for it', async () => {
    await service.ingest({ jobId: 'web-farm', records: [record('r1')], commit: false });

    expect(persister.commitResultWrites).not.toHaveBeenCalled();
    expect(batch.execute).toHaveBeenCalledTimes(1);
  });

  it('should count the single-document writes that were dropped (Edge Case)', async () => {
    // Arrange
    persister.persistModelSizeStats.mockResolvedValue(false);
    persister.persistQuantiles.mockResolvedValue(false);

    // Act
    const summary = await service.ingest({
      jobId: 'web-farm',
      modelSizeStats: [modelSizeStats()],
      quantiles: quantiles(),
      commit: false,
    });

    // Assert
    expect(summary.failedWrites).toBe(2);
  });

  it('should stop before the other writes when the bulk call fails (Edge Case)', async () => {
    // Arrange
    batch.execute.mockRejectedValue(new Error('cluster unavailable'));

    // Act & Assert
    await expect(
      service.ingest({ jobId: 'web-farm', records: [record('r1')], quantiles: quantiles(), commit: true }),
    ).rejects.toThrow('cluster unavailable');
    expect(persister.persistQuantiles).not.toHaveBeenCalled();
    expect(persister.commitResultWrites).not.toHaveBeenCalled();
  });
});
