import { produce, freeze } from 'immer';
import type { Draft } from 'immer';
import type { AccountID, Allocation, AllocationID, AllocationStatus } from '../L0/Ontology.js';
import { ErrorCode, KernelError } from '../Errors.js';

// --- Identifier Allocator ---
export class IdentifierAllocator {
    private last: AllocationID = 0;

    public get lastIssued(): AllocationID { return this.last; }

    /** Next identifier. Does not advance the counter. */
    public peek(): AllocationID {
        return this.last + 1;
    }

    /** Advances the counter once the creation that used `id` has succeeded. */
    public commit(id: AllocationID): void {
        if (id !== this.last + 1) {
            throw new KernelError(ErrorCode.COMMIT_CONFLICT, `Identifier ${id} is not next after ${this.last}`);
        }
        this.last = id;
    }

    public restore(last: AllocationID): void {
        if (!Number.isSafeInteger(last) || last < this.last) {
            throw new KernelError(ErrorCode.COMMIT_CONFLICT, `Cannot rewind allocator from ${this.last} to ${last}`);
        }
        this.last = last;
    }
}

// --- Allocation Store ---
export interface AllocationFilter {
    party?: AccountID;
    status?: AllocationStatus;
}

/**
 * Derives a full replacement record. The base is never mutated and the result is frozen.
 */
export function deriveAllocation(base: Allocation, recipe: (draft: Draft<Allocation>) => void): Allocation {
    return produce(base, recipe);
}

export class AllocationStore {
    private records: Map<AllocationID, Allocation> = new Map();

    public get(id: AllocationID): Allocation | undefined {
        return this.records.get(id);
    }

    public get size(): number { return this.records.size; }

    public list(filter: AllocationFilter = {}): Allocation[] {
        return [...this.records.values()]
            .filter(a => filter.status === undefined || a.status === filter.status)
            .filter(a => filter.party === undefined || a.originator === filter.party || a.beneficiary === filter.party)
            .sort((a, b) => a.id - b.id);
    }

    public insert(record: Allocation): void {
        if (this.records.has(record.id)) {
            throw new KernelError(ErrorCode.COMMIT_CONFLICT, `Allocation ${record.id} already exists`);
        }
        this.records.set(record.id, freeze(record, true));
    }

    /**
     * Compare-and-commit: replaces the record only if it is still the one that was read.
     */
    public commit(expected: Allocation, next: Allocation): void {
        const current = this.records.get(expected.id);
        if (current !== expected || next.id !== expected.id) {
            throw new KernelError(ErrorCode.COMMIT_CONFLICT, `Allocation ${expected.id} changed since it was read`);
        }
        this.records.set(next.id, freeze(next, true));
    }
}
