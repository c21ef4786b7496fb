import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

/** Detection rule attached to a detector */
export class DetectionRuleDto {
    @ApiProperty({ example: 'filter_results', default: 'filter_results' })
    ruleAction!: string;

    @ApiPropertyOptional()
    targetFieldName?: string;

    @ApiPropertyOptional()
    targetFieldValue?: string;

    @ApiProperty({ enum: ['or', 'and'], default: 'or' })
    conditionsConnective!: string;

    @ApiProperty({
        description: 'At least one condition, e.g. { "conditionType": "numerical_actual", "condition": { "operator": "lt", "value": "5" } }',
        type: 'array',
        items: { type: 'object' },
    })
    ruleConditions!: object[];
}

export class DetectorDto {
    @ApiPropertyOptional({ example: 'mean response time by host' })
    detectorDescription?: string;

    @ApiProperty({ example: 'mean' })
    function!: string;

    @ApiPropertyOptional({ example: 'responsetime' })
    fieldName?: string;

    @ApiPropertyOptional({ example: 'host' })
    byFieldName?: string;

    @ApiPropertyOptional()
    overFieldName?: string;

    @ApiPropertyOptional()
    partitionFieldName?: string;

    @ApiProperty({ type: [DetectionRuleDto], default: [] })
    detectorRules!: DetectionRuleDto[];
}

export class AnalysisConfigDto {
    @ApiProperty({ example: 300, description: 'Bucket span in seconds' })
    bucketSpan!: number;

    @ApiProperty({ type: [DetectorDto] })
    detectors!: DetectorDto[];

    @ApiProperty({ type: [String], default: [] })
    influencers!: string[];

    @ApiPropertyOptional()
    categorizationFieldName?: string;

    @ApiPropertyOptional({ type: [String] })
    categorizationFilters?: string[];
}

/** Body of a job creation request */
export class JobDefinitionDto {
    @ApiPropertyOptional({ example: 'Web farm response times' })
    description?: string;

    @ApiProperty({ type: AnalysisConfigDto })
    analysisConfig!: AnalysisConfigDto;

    @ApiPropertyOptional({ example: { modelMemoryLimit: 512 } })
    analysisLimits?: object;

    @ApiPropertyOptional({ example: { boundsPercentile: 95 } })
    modelDebugConfig?: object;

    @ApiPropertyOptional()
    renormalizationWindowDays?: number;

    @ApiPropertyOptional({ description: 'Seconds' })
    backgroundPersistInterval?: number;

    @ApiPropertyOptional()
    modelSnapshotRetentionDays?: number;

    @ApiPropertyOptional()
    resultsRetentionDays?: number;

    @ApiPropertyOptional({ type: 'object', additionalProperties: true })
    customSettings?: object;

    @ApiPropertyOptional()
    modelSnapshotId?: string;
}

/** A published job */
export class JobDto extends JobDefinitionDto {
    @ApiProperty({ example: 'web-farm' })
    jobId!: string;

    @ApiProperty({ example: 1700000000000, description: 'Epoch milliseconds' })
    createTime!: number;
}

export class DetectorUpdateDto {
    @ApiProperty({ example: 0, description: 'Position of the detector in the analysis config' })
    index!: number;

    @ApiPropertyOptional()
    description?: string;

    @ApiPropertyOptional({ type: [DetectionRuleDto] })
    rules?: DetectionRuleDto[];
}

/** Sparse job update: only the given fields change */
export class JobUpdateDto {
    @ApiPropertyOptional()
    description?: string;

    @ApiPropertyOptional({ type: [DetectorUpdateDto] })
    detectors?: DetectorUpdateDto[];

    @ApiPropertyOptional({ example: { boundsPercentile: 95 } })
    modelDebugConfig?: object;

    @ApiPropertyOptional({ example: { modelMemoryLimit: 512 } })
    analysisLimits?: object;

    @ApiPropertyOptional()
    renormalizationWindowDays?: number;

    @ApiPropertyOptional()
    backgroundPersistInterval?: number;

    @ApiPropertyOptional()
    modelSnapshotRetentionDays?: number;

    @ApiPropertyOptional()
    resultsRetentionDays?: number;

    @ApiPropertyOptional({ type: [String] })
    categorizationFilters?: string[];

    @ApiPropertyOptional({ type: 'object', additionalProperties: true })
    customSettings?: object;

    @ApiPropertyOptional()
    modelSnapshotId?: string;
}
