import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

/** At least one field is required */
export class ModelSnapshotUpdateDto {
    @ApiPropertyOptional({ example: 'Before the holiday traffic' })
    description?: string;

    @ApiPropertyOptional({ description: 'Keep the snapshot past the retention period' })
    retain?: boolean;
}

export class ModelSnapshotDto {
    @ApiProperty({ example: 'model_snapshot' })
    resultType!: string;

    @ApiProperty()
    jobId!: string;

    @ApiProperty({ example: '1700000000' })
    snapshotId!: string;

    @ApiProperty({ description: 'Epoch milliseconds' })
    timestamp!: number;

    @ApiPropertyOptional()
    description?: string;

    @ApiProperty()
    snapshotDocCount!: number;

    @ApiPropertyOptional()
    latestRecordTimeStamp?: number;

    @ApiPropertyOptional()
    latestResultTimeStamp?: number;

    @ApiProperty()
    retain!: boolean;
}
