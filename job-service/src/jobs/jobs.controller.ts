import {
    Body, Controller, Get, HttpCode, HttpStatus, Param, Post, Put, UseFilters
} from '@nestjs/common';
import { ApiBody, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ModelSnapshot } from '../results/result.types';
import { ModelSnapshotUpdate, modelSnapshotUpdateSchema } from '../results/results.schema';
import { InvalidJobUpdateFilter } from './invalid-job-update.filter';
import { JobDefinition, jobDefinitionSchema, jobUpdateSchema } from './job.schema';
import { Job, JobUpdate } from './job.types';
import { JobsService } from './jobs.service';
import { ZodValidationPipe } from './zod-validation.pipe';
import { JobDefinitionDto, JobDto, JobUpdateDto } from './dto/job.dto';
import { ModelSnapshotDto, ModelSnapshotUpdateDto } from './dto/model-snapshot.dto';

@ApiTags('jobs')
@Controller('jobs')
@UseFilters(InvalidJobUpdateFilter)
export class JobsController {
    constructor(private readonly jobsService: JobsService) { }

    @Put(':jobId')
    @HttpCode(HttpStatus.CREATED)
    @ApiOperation({ summary: 'Create a job' })
    @ApiBody({ type: JobDefinitionDto })
    @ApiResponse({ status: 201, description: 'Job created', type: JobDto })
    @ApiResponse({ status: 400, description: 'Invalid job definition' })
    @ApiResponse({ status: 409, description: 'A job with this id already exists' })
    async createJob(
        @Param('jobId') jobId: string,
        @Body(new ZodValidationPipe(jobDefinitionSchema)) definition: JobDefinition,
    ): Promise<Job> {
        return this.jobsService.createJob(jobId, definition);
    }

    @Get(':jobId')
    @ApiOperation({ summary: 'Get a job' })
    @ApiResponse({ status: 200, description: 'The published job', type: JobDto })
    @ApiResponse({ status: 404, description: 'Unknown job' })
    async getJob(@Param('jobId') jobId: string): Promise<Job> {
        return this.jobsService.getJob(jobId);
    }

    @Post(':jobId/_update')
    @HttpCode(HttpStatus.OK)
    @ApiOperation({ summary: 'Apply a sparse update to a job' })
    @ApiBody({ type: JobUpdateDto })
    @ApiResponse({ status: 200, description: 'The updated job', type: JobDto })
    @ApiResponse({ status: 400, description: 'Invalid update or detector index out of bounds' })
    @ApiResponse({ status: 404, description: 'Unknown job' })
    async updateJob(
        @Param('jobId') jobId: string,
        @Body(new ZodValidationPipe(jobUpdateSchema)) update: JobUpdate,
    ): Promise<Job> {
        return this.jobsService.updateJob(jobId, update);
    }

    @Post(':jobId/model_snapshots/:snapshotId/_update')
    @HttpCode(HttpStatus.OK)
    @ApiOperation({ summary: 'Change the description or retention of a model snapshot' })
    @ApiBody({ type: ModelSnapshotUpdateDto })
    @ApiResponse({ status: 200, description: 'The updated snapshot', type: ModelSnapshotDto })
    @ApiResponse({ status: 404, description: 'Unknown job or snapshot' })
    async updateModelSnapshot(
        @Param('jobId') jobId: string,
        @Param('snapshotId') snapshotId: string,
        @Body(new ZodValidationPipe(modelSnapshotUpdateSchema)) changes: ModelSnapshotUpdate,
    ): Promise<ModelSnapshot> {
        return this.jobsService.updateModelSnapshot(jobId, snapshotId, changes);
    }
}
