import { z } from 'zod';
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
} from './result.types';

const epochMillis = z.number().int().nonnegative();
const bucketSpan = z.number().int().positive();
const score = z.number().nonnegative();
const probability = z.number().min(0).max(1);

const bucketInfluencerSchema: z.ZodType<BucketInfluencer> = z.object({
    resultType: z.literal('bucket_influencer'),
    jobId: z.string().min(1),
    timestamp: epochMillis,
    bucketSpan,
    influencerFieldName: z.string().min(1),
    initialAnomalyScore: score,
    anomalyScore: score,
    rawAnomalyScore: score,
    probability,
    isInterim: z.boolean(),
});

const anomalyRecordSchema: z.ZodType<AnomalyRecord> = z.object({
    resultType: z.literal('record'),
    jobId: z.string().min(1),
    id: z.string().min(1),
    timestamp: epochMillis,
    bucketSpan,
    detectorIndex: z.number().int().nonnegative(),
    sequenceNum: z.number().int().nonnegative(),
    probability,
    anomalyScore: score,
    normalizedProbability: score,
    initialNormalizedProbability: score,
    isInterim: z.boolean(),
    function: z.string().optional(),
    fieldName: z.string().optional(),
    byFieldName: z.string().optional(),
    byFieldValue: z.string().optional(),
    overFieldName: z.string().optional(),
    overFieldValue: z.string().optional(),
    partitionFieldName: z.string().optional(),
    partitionFieldValue: z.string().optional(),
    actual: z.array(z.number()).optional(),
    typical: z.array(z.number()).optional(),
    causes: z
        .array(
            z.object({
                function: z.string().optional(),
                fieldName: z.string().optional(),
                byFieldValue: z.string().optional(),
                overFieldValue: z.string().optional(),
                partitionFieldValue: z.string().optional(),
                probability,
                actual: z.array(z.number()).optional(),
                typical: z.array(z.number()).optional(),
            }),
        )
        .optional(),
    influencers: z
        .array(
            z.object({
                influencerFieldName: z.string().min(1),
                influencerFieldValues: z.array(z.string()),
            }),
        )
        .optional(),
});

const bucketSchema: z.ZodType<Bucket> = z.object({
    resultType: z.literal('bucket'),
    jobId: z.string().min(1),
    timestamp: epochMillis,
    bucketSpan,
    anomalyScore: score,
    initialAnomalyScore: score,
    maxNormalizedProbability: score,
    recordCount: z.number().int().nonnegative(),
    eventCount: z.number().int().nonnegative(),
    isInterim: z.boolean(),
    processingTimeMs: z.number().nonnegative(),
    records: z.array(anomalyRecordSchema).optional().default([]),
    bucketInfluencers: z.array(bucketInfluencerSchema).optional().default([]),
    partitionScores: z
        .array(
            z.object({
                partitionFieldName: z.string().min(1),
                partitionFieldValue: z.string(),
                anomalyScore: score,
                probability,
            }),
        )
        .optional(),
});

const influencerSchema: z.ZodType<Influencer> = z.object({
    resultType: z.literal('influencer'),
    jobId: z.string().min(1),
    id: z.string().min(1),
    timestamp: epochMillis,
    bucketSpan,
    influencerFieldName: z.string().min(1),
    influencerFieldValue: z.string(),
    probability,
    anomalyScore: score,
    initialAnomalyScore: score,
    isInterim: z.boolean(),
});

const partitionProbabilitiesSchema: z.ZodType<PerPartitionMaxProbabilities> = z.object({
    resultType: z.literal('partition_normalized_probs'),
    jobId: z.string().min(1),
    id: z.string().min(1),
    timestamp: epochMillis,
    bucketSpan,
    perPartitionMaxProbabilities: z.array(
        z.object({
            partitionValue: z.string(),
            maxRecordScore: score,
        }),
    ),
});

const categoryDefinitionSchema: z.ZodType<CategoryDefinition> = z.object({
    resultType: z.literal('category_definition'),
    jobId: z.string().min(1),
    categoryId: z.number().int().nonnegative(),
    terms: z.string(),
    regex: z.string(),
    maxMatchingLength: z.number().int().nonnegative(),
    examples: z.array(z.string()),
});

export const modelSizeStatsSchema: z.ZodType<ModelSizeStats> = z.object({
    resultType: z.literal('model_size_stats'),
    jobId: z.string().min(1),
    modelBytes: z.number().int().nonnegative(),
    totalByFieldCount: z.number().int().nonnegative(),
    totalOverFieldCount: z.number().int().nonnegative(),
    totalPartitionFieldCount: z.number().int().nonnegative(),
    bucketAllocationFailuresCount: z.number().int().nonnegative(),
    memoryStatus: z.enum(['ok', 'soft_limit', 'hard_limit']),
    logTime: epochMillis,
    timestamp: epochMillis.optional(),
});

export const modelSnapshotSchema: z.ZodType<ModelSnapshot> = z.object({
    resultType: z.literal('model_snapshot'),
    jobId: z.string().min(1),
    snapshotId: z.string().min(1),
    timestamp: epochMillis,
    description: z.string().optional(),
    snapshotDocCount: z.number().int().nonnegative(),
    latestRecordTimeStamp: epochMillis.optional(),
    latestResultTimeStamp: epochMillis.optional(),
    retain: z.boolean(),
    modelSizeStats: modelSizeStatsSchema.optional(),
});

const quantilesSchema: z.ZodType<Quantiles> = z.object({
    resultType: z.literal('quantiles'),
    jobId: z.string().min(1),
    timestamp: epochMillis,
    quantileState: z.string(),
});

const modelDebugOutputSchema: z.ZodType<ModelDebugOutput> = z.object({
    resultType: z.literal('model_debug_output'),
    jobId: z.string().min(1),
    timestamp: epochMillis,
    bucketSpan,
    detectorIndex: z.number().int().nonnegative(),
    partitionFieldName: z.string().optional(),
    partitionFieldValue: z.string().optional(),
    overFieldName: z.string().optional(),
    overFieldValue: z.string().optional(),
    byFieldName: z.string().optional(),
    byFieldValue: z.string().optional(),
    debugFeature: z.string().optional(),
    debugLower: z.number(),
    debugUpper: z.number(),
    debugMedian: z.number(),
    actual: z.number(),
});

/** A message from the analysis pipeline carrying the output of one cycle. */
export const resultsMessageSchema = z
    .object({
        jobId: z.string().min(1),
        correlationId: z.string().optional(),
        buckets: z.array(bucketSchema).optional(),
        records: z.array(anomalyRecordSchema).optional(),
        influencers: z.array(influencerSchema).optional(),
        partitionProbabilities: z.array(partitionProbabilitiesSchema).optional(),
        categoryDefinitions: z.array(categoryDefinitionSchema).optional(),
        modelSnapshots: z.array(modelSnapshotSchema).optional(),
        quantiles: quantilesSchema.optional(),
        modelSizeStats: z.array(modelSizeStatsSchema).optional(),
        modelDebugOutput: z.array(modelDebugOutputSchema).optional(),
        commit: z.boolean().optional().default(false),
    })
    .superRefine((message, ctx) => {
        const documents: { jobId: string }[] = [
            ...(message.buckets ?? []),
            ...(message.records ?? []),
            ...(message.influencers ?? []),
            ...(message.partitionProbabilities ?? []),
            ...(message.categoryDefinitions ?? []),
            ...(message.modelSnapshots ?? []),
            ...(message.quantiles ? [message.quantiles] : []),
            ...(message.modelSizeStats ?? []),
            ...(message.modelDebugOutput ?? []),
        ];
        const foreign = documents.filter((document) => document.jobId !== message.jobId);
        if (foreign.length > 0) {
            ctx.addIssue({
                code: 'custom',
                path: ['jobId'],
                message: `${foreign.length} document(s) belong to a job other than ${message.jobId}`,
            });
        }

        (message.buckets ?? []).forEach((bucket, bucketIndex) => {
            bucket.bucketInfluencers.forEach((influencer, influencerIndex) => {
                if (
                    influencer.jobId !== bucket.jobId
                    || influencer.timestamp !== bucket.timestamp
                    || influencer.bucketSpan !== bucket.bucketSpan
                ) {
                    ctx.addIssue({
                        code: 'custom',
                        path: ['buckets', bucketIndex, 'bucketInfluencers', influencerIndex],
                        message: 'Bucket influencer must have the jobId, timestamp and bucketSpan of its bucket',
                    });
                }
            });
        });
    });

export type ResultsMessage = z.infer<typeof resultsMessageSchema>;

/** Fields of a persisted model snapshot that may be changed after the fact. */
export const modelSnapshotUpdateSchema = z
    .strictObject({
        description: z.string().optional(),
        retain: z.boolean().optional(),
    })
    .refine((update) => update.description !== undefined || update.retain !== undefined, {
        message: 'At least one of description or retain must be given',
    });

export type ModelSnapshotUpdate = z.infer<typeof modelSnapshotUpdateSchema>;
