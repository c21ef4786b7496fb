import { StoredDocument } from '../store/document-store.interface';
import { serializeDocument } from '../store/document-serializer';
import { Detector, DetectorUpdate, Job, JobUpdate } from './job.types';

export class InvalidJobUpdateError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidJobUpdateError';
    }
}

type JobDraft = { -readonly [K in keyof Job]: Job[K] };

/**
 * Applies `update` to `source` and returns the resulting job.
 *
 * Detector indices are checked before anything is applied, so a rejected
 * update never yields a partially merged job. `source` is left untouched.
 *
 * @throws InvalidJobUpdateError when a detector update targets an index the
 * source job does not have.
 */
export function mergeJobUpdate(source: Job, update: JobUpdate): Job {
    const detectorCount = source.analysisConfig.detectors.length;
    for (const detectorUpdate of update.detectors ?? []) {
        const { index } = detectorUpdate;
        if (!Number.isInteger(index) || index < 0 || index >= detectorCount) {
            throw new InvalidJobUpdateError(
                `Detector index ${index} is out of bounds for job [${source.jobId}] with ${detectorCount} detector(s)`,
            );
        }
    }

    const draft: JobDraft = { ...source };

    if (update.description !== undefined) {
        draft.description = update.description;
    }

    // Detector edits and categorization filters share one analysis config
    const hasDetectorUpdates = update.detectors !== undefined && update.detectors.length > 0;
    if (hasDetectorUpdates || update.categorizationFilters !== undefined) {
        draft.analysisConfig = {
            ...source.analysisConfig,
            detectors: hasDetectorUpdates
                ? applyDetectorUpdates(source.analysisConfig.detectors, update.detectors ?? [])
                : source.analysisConfig.detectors,
            ...(update.categorizationFilters !== undefined
                ? { categorizationFilters: update.categorizationFilters }
                : {}),
        };
    }

    if (update.modelDebugConfig !== undefined) {
        draft.modelDebugConfig = update.modelDebugConfig;
    }
    if (update.analysisLimits !== undefined) {
        draft.analysisLimits = update.analysisLimits;
    }
    if (update.renormalizationWindowDays !== undefined) {
        draft.renormalizationWindowDays = update.renormalizationWindowDays;
    }
    if (update.backgroundPersistInterval !== undefined) {
        draft.backgroundPersistInterval = update.backgroundPersistInterval;
    }
    if (update.modelSnapshotRetentionDays !== undefined) {
        draft.modelSnapshotRetentionDays = update.modelSnapshotRetentionDays;
    }
    if (update.resultsRetentionDays !== undefined) {
        draft.resultsRetentionDays = update.resultsRetentionDays;
    }
    if (update.customSettings !== undefined) {
        draft.customSettings = update.customSettings;
    }
    if (update.modelSnapshotId !== undefined) {
        draft.modelSnapshotId = update.modelSnapshotId;
    }

    return draft;
}

function applyDetectorUpdates(
    detectors: readonly Detector[],
    updates: readonly DetectorUpdate[],
): Detector[] {
    const updated = [...detectors];
    for (const detectorUpdate of updates) {
        updated[detectorUpdate.index] = {
            ...updated[detectorUpdate.index],
            ...(detectorUpdate.description !== undefined
                ? { detectorDescription: detectorUpdate.description }
                : {}),
            ...(detectorUpdate.rules !== undefined ? { detectorRules: detectorUpdate.rules } : {}),
        };
    }
    return updated;
}

/** Whether a running analysis process has to be told about this update. */
export function isProcessUpdate(update: JobUpdate): boolean {
    return update.modelDebugConfig !== undefined || update.detectors !== undefined;
}

/** Sparse document form of an update; absent fields are left out. */
export function toJobUpdateDocument(update: JobUpdate): StoredDocument {
    return serializeDocument(update);
}
