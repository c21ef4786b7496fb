import { Logger } from '@nestjs/common';
import {
    BulkItemResult,
    BulkResponse,
    DocumentExistsError,
    DocumentStore,
    IndexAction,
    StoredDocument,
} from './document-store.interface';

interface IndexState {
    visible: Map<string, StoredDocument>;
    pending: Map<string, StoredDocument>;
    kinds: Map<string, string>;
    rejections: Map<string, string>;
}

/**
 * Process-local document store. Writes land in a pending area and are only
 * published to readers by `refresh`, which mirrors the visibility model of a
 * search-backed store.
 */
export class InMemoryDocumentStore implements DocumentStore {
    private readonly logger = new Logger(InMemoryDocumentStore.name);
    private readonly indices = new Map<string, IndexState>();

    async index(action: IndexAction): Promise<void> {
        const rejection = this.rejectionOf(action);
        if (rejection) {
            throw new Error(rejection);
        }
        this.put(action);
    }

    async create(action: IndexAction): Promise<void> {
        const state = this.state(action.index);
        if (state.visible.has(action.id) || state.pending.has(action.id)) {
            throw new DocumentExistsError(action.index, action.id);
        }
        await this.index(action);
    }

    async bulk(actions: IndexAction[]): Promise<BulkResponse> {
        const items: BulkItemResult[] = actions.map((action) => {
            const rejection = this.rejectionOf(action);
            if (rejection) {
                return { index: action.index, id: action.id, ok: false, error: rejection };
            }
            this.put(action);
            return { index: action.index, id: action.id, ok: true };
        });

        return { hasFailures: items.some((item) => !item.ok), items };
    }

    async refresh(index: string): Promise<void> {
        const state = this.state(index);
        for (const [id, document] of state.pending) {
            state.visible.set(id, document);
        }
        this.logger.verbose({ index, published: state.pending.size }, 'Refreshed index');
        state.pending.clear();
    }

    async get(index: string, id: string): Promise<StoredDocument | null> {
        return this.indices.get(index)?.visible.get(id) ?? null;
    }

    /** Makes every later write of `id` to `index` fail with `message`. */
    rejectWrites(index: string, id: string, message: string): void {
        this.state(index).rejections.set(id, message);
    }

    /** Visible and pending documents of an index, pending ones winning. */
    documents(index: string): Map<string, StoredDocument> {
        const state = this.indices.get(index);
        if (!state) {
            return new Map();
        }
        return new Map([...state.visible, ...state.pending]);
    }

    kindOf(index: string, id: string): string | undefined {
        return this.indices.get(index)?.kinds.get(id);
    }

    pendingCount(index: string): number {
        return this.indices.get(index)?.pending.size ?? 0;
    }

    private rejectionOf(action: IndexAction): string | undefined {
        return this.indices.get(action.index)?.rejections.get(action.id);
    }

    private put(action: IndexAction): void {
        const state = this.state(action.index);
        state.pending.set(action.id, action.document);
        state.kinds.set(action.id, action.kind);
    }

    private state(index: string): IndexState {
        let state = this.indices.get(index);
        if (!state) {
            state = { visible: new Map(), pending: new Map(), kinds: new Map(), rejections: new Map() };
            this.indices.set(index, state);
        }
        return state;
    }
}
