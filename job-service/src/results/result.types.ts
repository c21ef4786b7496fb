export const RESULT_TYPES = {
    bucket: 'bucket',
    bucketInfluencer: 'bucket_influencer',
    record: 'record',
    influencer: 'influencer',
    partitionProbabilities: 'partition_normalized_probs',
    categoryDefinition: 'category_definition',
    modelSnapshot: 'model_snapshot',
    quantiles: 'quantiles',
    modelSizeStats: 'model_size_stats',
    modelDebugOutput: 'model_debug_output',
} as const;

export type ResultType = (typeof RESULT_TYPES)[keyof typeof RESULT_TYPES];

export interface BucketInfluencer {
    readonly resultType: 'bucket_influencer';
    readonly jobId: string;
    /** Epoch milliseconds of the bucket start. */
    readonly timestamp: number;
    readonly bucketSpan: number;
    readonly influencerFieldName: string;
    readonly initialAnomalyScore: number;
    readonly anomalyScore: number;
    readonly rawAnomalyScore: number;
    readonly probability: number;
    readonly isInterim: boolean;
}

export interface AnomalyCause {
    readonly function?: string;
    readonly fieldName?: string;
    readonly byFieldValue?: string;
    readonly overFieldValue?: string;
    readonly partitionFieldValue?: string;
    readonly probability: number;
    readonly actual?: readonly number[];
    readonly typical?: readonly number[];
}

export interface RecordInfluence {
    readonly influencerFieldName: string;
    readonly influencerFieldValues: readonly string[];
}

export interface AnomalyRecord {
    readonly resultType: 'record';
    readonly jobId: string;
    /** Assigned by the producer and kept across renormalization. */
    readonly id: string;
    readonly timestamp: number;
    readonly bucketSpan: number;
    readonly detectorIndex: number;
    readonly sequenceNum: number;
    readonly probability: number;
    readonly anomalyScore: number;
    readonly normalizedProbability: number;
    readonly initialNormalizedProbability: number;
    readonly isInterim: boolean;
    readonly function?: string;
    readonly fieldName?: string;
    readonly byFieldName?: string;
    readonly byFieldValue?: string;
    readonly overFieldName?: string;
    readonly overFieldValue?: string;
    readonly partitionFieldName?: string;
    readonly partitionFieldValue?: string;
    readonly actual?: readonly number[];
    readonly typical?: readonly number[];
    readonly causes?: readonly AnomalyCause[];
    readonly influencers?: readonly RecordInfluence[];
}

export interface PartitionScore {
    readonly partitionFieldName: string;
    readonly partitionFieldValue: string;
    readonly anomalyScore: number;
    readonly probability: number;
}

export interface Bucket {
    readonly resultType: 'bucket';
    readonly jobId: string;
    readonly timestamp: number;
    readonly bucketSpan: number;
    readonly anomalyScore: number;
    readonly initialAnomalyScore: number;
    readonly maxNormalizedProbability: number;
    readonly recordCount: number;
    readonly eventCount: number;
    readonly isInterim: boolean;
    readonly processingTimeMs: number;
    /** Carried in memory for the pipeline; never written with the bucket. */
    readonly records: readonly AnomalyRecord[];
    readonly bucketInfluencers: readonly BucketInfluencer[];
    readonly partitionScores?: readonly PartitionScore[];
}

export interface Influencer {
    readonly resultType: 'influencer';
    readonly jobId: string;
    readonly id: string;
    readonly timestamp: number;
    readonly bucketSpan: number;
    readonly influencerFieldName: string;
    readonly influencerFieldValue: string;
    readonly probability: number;
    readonly anomalyScore: number;
    readonly initialAnomalyScore: number;
    readonly isInterim: boolean;
}

export interface PartitionProbability {
    readonly partitionValue: string;
    readonly maxRecordScore: number;
}

export interface PerPartitionMaxProbabilities {
    readonly resultType: 'partition_normalized_probs';
    readonly jobId: string;
    readonly id: string;
    readonly timestamp: number;
    readonly bucketSpan: number;
    readonly perPartitionMaxProbabilities: readonly PartitionProbability[];
}

export interface CategoryDefinition {
    readonly resultType: 'category_definition';
    readonly jobId: string;
    readonly categoryId: number;
    readonly terms: string;
    readonly regex: string;
    readonly maxMatchingLength: number;
    readonly examples: readonly string[];
}

export type MemoryStatus = 'ok' | 'soft_limit' | 'hard_limit';

export interface ModelSizeStats {
    readonly resultType: 'model_size_stats';
    readonly jobId: string;
    readonly modelBytes: number;
    readonly totalByFieldCount: number;
    readonly totalOverFieldCount: number;
    readonly totalPartitionFieldCount: number;
    readonly bucketAllocationFailuresCount: number;
    readonly memoryStatus: MemoryStatus;
    readonly logTime: number;
    readonly timestamp?: number;
}

export interface ModelSnapshot {
    readonly resultType: 'model_snapshot';
    readonly jobId: string;
    readonly snapshotId: string;
    readonly timestamp: number;
    readonly description?: string;
    readonly snapshotDocCount: number;
    readonly latestRecordTimeStamp?: number;
    readonly latestResultTimeStamp?: number;
    readonly retain: boolean;
    readonly modelSizeStats?: ModelSizeStats;
}

export interface Quantiles {
    readonly resultType: 'quantiles';
    readonly jobId: string;
    readonly timestamp: number;
    readonly quantileState: string;
}

export interface ModelDebugOutput {
    readonly resultType: 'model_debug_output';
    readonly jobId: string;
    readonly timestamp: number;
    readonly bucketSpan: number;
    readonly detectorIndex: number;
    readonly partitionFieldName?: string;
    readonly partitionFieldValue?: string;
    readonly overFieldName?: string;
    readonly overFieldValue?: string;
    readonly byFieldName?: string;
    readonly byFieldValue?: string;
    readonly debugFeature?: string;
    readonly debugLower: number;
    readonly debugUpper: number;
    readonly debugMedian: number;
    readonly actual: number;
}

export type ResultDocument =
    | Bucket
    | BucketInfluencer
    | AnomalyRecord
    | Influencer
    | PerPartitionMaxProbabilities
    | CategoryDefinition
    | ModelSnapshot
    | Quantiles
    | ModelSizeStats
    | ModelDebugOutput;
