import { z } from 'zod';
import {
    AnalysisConfig,
    AnalysisLimits,
    CustomSettingValue,
    DetectionRule,
    Detector,
    DetectorUpdate,
    Job,
    JobUpdate,
    ModelDebugConfig,
} from './job.types';

export const customSettingValueSchema: z.ZodType<CustomSettingValue> = z.lazy(() =>
    z.union([
        z.string(),
        z.number(),
        z.boolean(),
        z.array(customSettingValueSchema),
        z.record(z.string(), customSettingValueSchema),
    ]),
);

const customSettingsSchema = z.record(z.string(), customSettingValueSchema);

const ruleConditionSchema = z.strictObject({
    conditionType: z.enum(['categorical', 'numerical_actual', 'numerical_typical', 'numerical_diff_abs']),
    fieldName: z.string().min(1).optional(),
    fieldValue: z.string().optional(),
    condition: z
        .strictObject({
            operator: z.enum(['lt', 'lte', 'gt', 'gte']),
            value: z.string().min(1),
        })
        .optional(),
    valueFilter: z.string().min(1).optional(),
});

export const detectionRuleSchema: z.ZodType<DetectionRule> = z.strictObject({
    ruleAction: z.literal('filter_results').optional().default('filter_results'),
    targetFieldName: z.string().min(1).optional(),
    targetFieldValue: z.string().optional(),
    conditionsConnective: z.enum(['or', 'and']).optional().default('or'),
    ruleConditions: z.array(ruleConditionSchema).min(1),
});

const detectorSchema: z.ZodType<Detector> = z.strictObject({
    detectorDescription: z.string().optional(),
    function: z.string().min(1),
    fieldName: z.string().min(1).optional(),
    byFieldName: z.string().min(1).optional(),
    overFieldName: z.string().min(1).optional(),
    partitionFieldName: z.string().min(1).optional(),
    useNull: z.boolean().optional(),
    excludeFrequent: z.enum(['all', 'none', 'by', 'over']).optional(),
    detectorRules: z.array(detectionRuleSchema).optional().default([]),
});

const analysisConfigSchema: z.ZodType<AnalysisConfig> = z.strictObject({
    bucketSpan: z.number().int().positive(),
    detectors: z.array(detectorSchema).min(1, 'At least one detector is required'),
    influencers: z.array(z.string().min(1)).optional().default([]),
    categorizationFieldName: z.string().min(1).optional(),
    categorizationFilters: z.array(z.string().min(1)).optional(),
    summaryCountFieldName: z.string().min(1).optional(),
    latency: z.number().int().nonnegative().optional(),
});

const analysisLimitsSchema: z.ZodType<AnalysisLimits> = z.strictObject({
    modelMemoryLimit: z.number().int().positive().optional(),
    categorizationExamplesLimit: z.number().int().nonnegative().optional(),
});

const modelDebugConfigSchema: z.ZodType<ModelDebugConfig> = z.strictObject({
    boundsPercentile: z.number().min(0).max(100).optional(),
    terms: z.string().optional(),
});

const days = z.number().int().nonnegative();

/** Body of a job creation request; the id and create time are assigned by the service. */
export type JobDefinition = Omit<Job, 'jobId' | 'createTime'>;

const jobDefinitionShape = {
    description: z.string().optional(),
    analysisConfig: analysisConfigSchema,
    analysisLimits: analysisLimitsSchema.optional(),
    modelDebugConfig: modelDebugConfigSchema.optional(),
    renormalizationWindowDays: days.optional(),
    backgroundPersistInterval: z.number().int().positive().optional(),
    modelSnapshotRetentionDays: days.optional(),
    resultsRetentionDays: days.optional(),
    customSettings: customSettingsSchema.optional(),
    modelSnapshotId: z.string().min(1).optional(),
};

export const jobDefinitionSchema: z.ZodType<JobDefinition> = z.strictObject(jobDefinitionShape);

/** A stored job document read back from the configuration index. */
export const jobSchema: z.ZodType<Job> = z.strictObject({
    jobId: z.string().min(1),
    createTime: z.number().int().nonnegative(),
    ...jobDefinitionShape,
});

const detectorUpdateSchema: z.ZodType<DetectorUpdate> = z.strictObject({
    index: z.number().int().nonnegative(),
    description: z.string().optional(),
    rules: z.array(detectionRuleSchema).optional(),
});

export const jobUpdateSchema: z.ZodType<JobUpdate> = z.strictObject({
    description: z.string().optional(),
    detectors: z.array(detectorUpdateSchema).optional(),
    modelDebugConfig: modelDebugConfigSchema.optional(),
    analysisLimits: analysisLimitsSchema.optional(),
    renormalizationWindowDays: days.optional(),
    backgroundPersistInterval: z.number().int().positive().optional(),
    modelSnapshotRetentionDays: days.optional(),
    resultsRetentionDays: days.optional(),
    categorizationFilters: z.array(z.string().min(1)).optional(),
    customSettings: customSettingsSchema.optional(),
    modelSnapshotId: z.string().min(1).optional(),
});
