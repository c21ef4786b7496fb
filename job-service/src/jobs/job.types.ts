/** Free-form value held in a job's custom settings. */
export type CustomSettingValue =
    | string
    | number
    | boolean
    | CustomSettingValue[]
    | { [key: string]: CustomSettingValue };

export type CustomSettings = { readonly [key: string]: CustomSettingValue };

export type RuleConditionType =
    | 'categorical'
    | 'numerical_actual'
    | 'numerical_typical'
    | 'numerical_diff_abs';

export interface RuleCondition {
    readonly conditionType: RuleConditionType;
    readonly fieldName?: string;
    readonly fieldValue?: string;
    readonly condition?: {
        readonly operator: 'lt' | 'lte' | 'gt' | 'gte';
        readonly value: string;
    };
    readonly valueFilter?: string;
}

export interface DetectionRule {
    readonly ruleAction: 'filter_results';
    readonly targetFieldName?: string;
    readonly targetFieldValue?: string;
    readonly conditionsConnective: 'or' | 'and';
    readonly ruleConditions: readonly RuleCondition[];
}

export interface Detector {
    readonly detectorDescription?: string;
    readonly function: string;
    readonly fieldName?: string;
    readonly byFieldName?: string;
    readonly overFieldName?: string;
    readonly partitionFieldName?: string;
    readonly useNull?: boolean;
    readonly excludeFrequent?: 'all' | 'none' | 'by' | 'over';
    readonly detectorRules: readonly DetectionRule[];
}

export interface AnalysisConfig {
    /** Seconds. */
    readonly bucketSpan: number;
    readonly detectors: readonly Detector[];
    readonly influencers: readonly string[];
    readonly categorizationFieldName?: string;
    readonly categorizationFilters?: readonly string[];
    readonly summaryCountFieldName?: string;
    readonly latency?: number;
}

export interface AnalysisLimits {
    /** Megabytes. */
    readonly modelMemoryLimit?: number;
    readonly categorizationExamplesLimit?: number;
}

export interface ModelDebugConfig {
    readonly boundsPercentile?: number;
    readonly terms?: string;
}

/**
 * Published job configuration. A snapshot is never changed once published;
 * updates produce a new one.
 */
export interface Job {
    readonly jobId: string;
    readonly description?: string;
    /** Epoch milliseconds. */
    readonly createTime: number;
    readonly analysisConfig: AnalysisConfig;
    readonly analysisLimits?: AnalysisLimits;
    readonly modelDebugConfig?: ModelDebugConfig;
    readonly renormalizationWindowDays?: number;
    /** Seconds. */
    readonly backgroundPersistInterval?: number;
    readonly modelSnapshotRetentionDays?: number;
    readonly resultsRetentionDays?: number;
    readonly customSettings?: CustomSettings;
    readonly modelSnapshotId?: string;
}

export interface DetectorUpdate {
    readonly index: number;
    readonly description?: string;
    readonly rules?: readonly DetectionRule[];
}

/** Sparse change to a job: a present field replaces the job's value. */
export interface JobUpdate {
    readonly description?: string;
    readonly detectors?: readonly DetectorUpdate[];
    readonly modelDebugConfig?: ModelDebugConfig;
    readonly analysisLimits?: AnalysisLimits;
    readonly renormalizationWindowDays?: number;
    readonly backgroundPersistInterval?: number;
    readonly modelSnapshotRetentionDays?: number;
    readonly resultsRetentionDays?: number;
    readonly categorizationFilters?: readonly string[];
    readonly customSettings?: CustomSettings;
    readonly modelSnapshotId?: string;
}
