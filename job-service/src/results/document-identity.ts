import { ResultDocument, ResultType } from './result.types';

/**
 * How a document kind gets its id.
 *
 * - `deterministic`: derived from stable fields, so rewriting the same
 *   result (renormalization) overwrites the earlier document.
 * - `caller_assigned`: the producer puts a stable id on the document.
 * - `generated`: a fresh UUID per write, append-only.
 * - `deterministic_and_generated`: written twice, once to an overwritable
 *   "latest" slot and once as an append-only history entry.
 */
export type IdentityPolicy =
    | 'deterministic'
    | 'caller_assigned'
    | 'generated'
    | 'deterministic_and_generated';

export const IDENTITY_POLICIES: Readonly<Record<ResultType, IdentityPolicy>> = {
    bucket: 'deterministic',
    bucket_influencer: 'deterministic',
    record: 'caller_assigned',
    influencer: 'caller_assigned',
    partition_normalized_probs: 'caller_assigned',
    category_definition: 'deterministic',
    quantiles: 'deterministic',
    model_snapshot: 'deterministic',
    // The generated-id copy has no known reader; kept for compatibility.
    model_size_stats: 'deterministic_and_generated',
    model_debug_output: 'generated',
};

export function modelSnapshotDocumentId(jobId: string, snapshotId: string): string {
    return `${jobId}_model_snapshot_${snapshotId}`;
}

/** The id a document is always written under, or `undefined` for generated-only kinds. */
export function deterministicId(document: ResultDocument): string | undefined {
    switch (document.resultType) {
        case 'bucket':
            return `${document.jobId}_bucket_${document.timestamp}_${document.bucketSpan}`;
        case 'bucket_influencer':
            return `${document.jobId}_bucket_influencer_${document.timestamp}_${document.bucketSpan}_${document.influencerFieldName}`;
        case 'record':
        case 'influencer':
        case 'partition_normalized_probs':
            return document.id;
        case 'category_definition':
            return `${document.jobId}_category_definition_${document.categoryId}`;
        case 'quantiles':
            return `${document.jobId}_quantiles`;
        case 'model_snapshot':
            return modelSnapshotDocumentId(document.jobId, document.snapshotId);
        case 'model_size_stats':
            return `${document.jobId}_model_size_stats`;
        case 'model_debug_output':
            return undefined;
    }
}

/**
 * Ids to write `document` under, one write per entry, following the
 * identity policy of its kind. `undefined` asks the writer for a generated id.
 */
export function documentIds(document: ResultDocument): (string | undefined)[] {
    const policy = IDENTITY_POLICIES[document.resultType];
    const fixedId = deterministicId(document);

    switch (policy) {
        case 'deterministic':
        case 'caller_assigned':
            if (fixedId === undefined) {
                throw new Error(`No stable id for ${document.resultType} of job [${document.jobId}]`);
            }
            return [fixedId];
        case 'generated':
            return [undefined];
        case 'deterministic_and_generated':
            if (fixedId === undefined) {
                throw new Error(`No stable id for ${document.resultType} of job [${document.jobId}]`);
            }
            return [fixedId, undefined];
    }
}
