import { Detector, Job } from '../src/jobs/job.types';
import {
  AnomalyRecord,
  Bucket,
  BucketInfluencer,
  CategoryDefinition,
  Influencer,
  ModelDebugOutput,
  ModelSizeStats,
  ModelSnapshot,
  PerPartitionMaxProbabilities,
  Quantiles,
} from '../src/results/result.types';

export const JOB_ID = 'web-farm';
export const BUCKET_TIME = 1700000000000;
export const BUCKET_SPAN = 300;

export function detector(fn: string, description: string): Detector {
  return { detectorDescription: description, function: fn, fieldName: 'responsetime', detectorRules: [] };
}

export function job(overrides: Partial<Job> = {}): Job {
  return {
    jobId: JOB_ID,
    createTime: BUCKET_TIME,
    analysisConfig: {
      bucketSpan: BUCKET_SPAN,
      detectors: [detector('mean', 'd0'), detector('max', 'd1'), detector('min', 'd2')],
      influencers: ['host'],
    },
    ...overrides,
  };
}

export function bucketInfluencer(influencerFieldName: string): BucketInfluencer {
  return {
    resultType: 'bucket_influencer',
    jobId: JOB_ID,
    timestamp: BUCKET_TIME,
    bucketSpan: BUCKET_SPAN,
    influencerFieldName,
    initialAnomalyScore: 40,
    anomalyScore: 40,
    rawAnomalyScore: 1.5,
    probability: 0.01,
    isInterim: false,
  };
}

export function record(id: string): AnomalyRecord {
  return {
    resultType: 'record',
    jobId: JOB_ID,
    id,
    timestamp: BUCKET_TIME,
    bucketSpan: BUCKET_SPAN,
    detectorIndex: 0,
    sequenceNum: 1,
    probability: 0.001,
    anomalyScore: 80,
    normalizedProbability: 80,
    initialNormalizedProbability: 80,
    isInterim: false,
  };
}

export function bucket(overrides: Partial<Bucket> = {}): Bucket {
  return {
    resultType: 'bucket',
    jobId: JOB_ID,
    timestamp: BUCKET_TIME,
    bucketSpan: BUCKET_SPAN,
    anomalyScore: 80,
    initialAnomalyScore: 80,
    maxNormalizedProbability: 80,
    recordCount: 0,
    eventCount: 120,
    isInterim: false,
    processingTimeMs: 5,
    records: [],
    bucketInfluencers: [],
    ...overrides,
  };
}

export function influencer(id: string): Influencer {
  return {
    resultType: 'influencer',
    jobId: JOB_ID,
    id,
    timestamp: BUCKET_TIME,
    bucketSpan: BUCKET_SPAN,
    influencerFieldName: 'host',
    influencerFieldValue: 'web-01',
    probability: 0.02,
    anomalyScore: 60,
    initialAnomalyScore: 60,
    isInterim: false,
  };
}

export function partitionProbabilities(id: string): PerPartitionMaxProbabilities {
  return {
    resultType: 'partition_normalized_probs',
    jobId: JOB_ID,
    id,
    timestamp: BUCKET_TIME,
    bucketSpan: BUCKET_SPAN,
    perPartitionMaxProbabilities: [{ partitionValue: 'eu', maxRecordScore: 70 }],
  };
}

export function categoryDefinition(categoryId: number): CategoryDefinition {
  return {
    resultType: 'category_definition',
    jobId: JOB_ID,
    categoryId,
    terms: 'connection refused',
    regex: '.*?connection.+?refused.*',
    maxMatchingLength: 40,
    examples: ['connection refused by web-01'],
  };
}

export function quantiles(): Quantiles {
  return { resultType: 'quantiles', jobId: JOB_ID, timestamp: BUCKET_TIME, quantileState: 'q-state' };
}

export function modelSnapshot(overrides: Partial<ModelSnapshot> = {}): ModelSnapshot {
  return {
    resultType: 'model_snapshot',
    jobId: JOB_ID,
    snapshotId: '1700000000',
    timestamp: BUCKET_TIME,
    description: 'initial',
    snapshotDocCount: 2,
    retain: false,
    ...overrides,
  };
}

export function modelSizeStats(): ModelSizeStats {
  return {
    resultType: 'model_size_stats',
    jobId: JOB_ID,
    modelBytes: 2048,
    totalByFieldCount: 3,
    totalOverFieldCount: 0,
    totalPartitionFieldCount: 1,
    bucketAllocationFailuresCount: 0,
    memoryStatus: 'ok',
    logTime: BUCKET_TIME,
  };
}

export function modelDebugOutput(): ModelDebugOutput {
  return {
    resultType: 'model_debug_output',
    jobId: JOB_ID,
    timestamp: BUCKET_TIME,
    bucketSpan: BUCKET_SPAN,
    detectorIndex: 0,
    debugLower: 1,
    debugUpper: 9,
    debugMedian: 5,
    actual: 12,
  };
}
