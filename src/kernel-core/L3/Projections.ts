import type { Evidence } from '../L5/Audit.js';
import type { AccountID, Allocation, AllocationID, Quantity } from '../L0/Ontology.js';
import { fromView } from '../L0/Ontology.js';
import { AllocationStore, IdentifierAllocator } from '../L2/State.js';
import type { KernelLogger } from '../L2/Settlement.js';

/**
 * Projections are read-models derived purely from the audit trail.
 * They must be deterministic and idempotent.
 */
export interface Projection<T> {
    name: string;
    version: string;

    /**
     * Resets the internal state of the projection to its zero value.
     */
    reset(): void;

    /**
     * Applies a single piece of evidence to the projection.
     * This must be a pure function of the current state + evidence.
     */
    apply(evidence: Evidence): void;

    getState(): T;
}

export class ProjectionEngine {
    private projections: Map<string, Projection<unknown>> = new Map();

    constructor(private logger: KernelLogger = console) { }

    public register<T>(projection: Projection<T>): Projection<T> {
        if (this.projections.has(projection.name)) {
            this.logger.warn(`[ProjectionEngine] Overwriting projection: ${projection.name}`);
        }
        this.projections.set(projection.name, projection);
        return projection;
    }

    /**
     * Feeds a single event to all registered projections.
     * A failing projection is logged and the others still receive the event.
     */
    public apply(evidence: Evidence): void {
        for (const projection of this.projections.values()) {
            try {
                projection.apply(evidence);
            } catch (e: unknown) {
                this.logger.error(`[ProjectionEngine] Projection '${projection.name}' failed on evidence ${evidence.evidenceId}:`, e);
            }
        }
    }

    public reset(): void {
        for (const projection of this.projections.values()) {
            projection.reset();
        }
    }

    public replay(history: readonly Evidence[]): void {
        this.reset();
        for (const evidence of history) this.apply(evidence);
    }
}

// --- Allocation records ---

export interface AllocationSnapshot {
    allocations: Map<AllocationID, Allocation>;
    lastIdentifier: AllocationID;
}

/**
 * Each event carries the full post-operation record, so the latest event per
 * allocation is its current state.
 */
export class AllocationProjection implements Projection<AllocationSnapshot> {
    public readonly name = 'allocations';
    public readonly version = '1';

    private allocations = new Map<AllocationID, Allocation>();
    private lastIdentifier: AllocationID = 0;

    public reset(): void {
        this.allocations = new Map();
        this.lastIdentifier = 0;
    }

    public apply(evidence: Evidence): void {
        const { event } = evidence;
        if (event.operation === 'create') {
            this.lastIdentifier = Math.max(this.lastIdentifier, event.allocationId);
        }
        this.allocations.set(event.allocationId, fromView(event.allocation));
    }

    public getState(): AllocationSnapshot {
        return { allocations: new Map(this.allocations), lastIdentifier: this.lastIdentifier };
    }
}

// --- Custody conservation ---

export interface CustodyBalance {
    deposited: Quantity;
    released: Quantity;
}

/**
 * Tracks what each allocation moved into and out of the custodian account.
 * For every allocation, deposited - released equals its recorded quantity.
 */
export class CustodyProjection implements Projection<Map<AllocationID, CustodyBalance>> {
    public readonly name = 'custody';
    public readonly version = '1';

    private balances = new Map<AllocationID, CustodyBalance>();

    constructor(private custodian: AccountID) { }

    public reset(): void {
        this.balances = new Map();
    }

    public apply(evidence: Evidence): void {
        const { event } = evidence;
        const balance = this.balances.get(event.allocationId) ?? { deposited: 0n, released: 0n };
        let { deposited, released } = balance;

        for (const movement of event.movements) {
            const amount = BigInt(movement.amount);
            if (movement.to === this.custodian) deposited += amount;
            if (movement.from === this.custodian) released += amount;
        }
        this.balances.set(event.allocationId, { deposited, released });
    }

    public getState(): Map<AllocationID, CustodyBalance> {
        return new Map(this.balances);
    }
}

// --- Rebuild & Reconcile ---

export interface Discrepancy {
    allocationId: AllocationID;
    reason: string;
}

/**
 * Restores a store and allocator from an audit trail, e.g. one read back from SQLite.
 */
export function rebuildState(history: readonly Evidence[]): { store: AllocationStore, allocator: IdentifierAllocator } {
    const projection = new AllocationProjection();
    for (const evidence of history) projection.apply(evidence);
    const { allocations, lastIdentifier } = projection.getState();

    const store = new AllocationStore();
    for (const id of [...allocations.keys()].sort((a, b) => a - b)) {
        const record = allocations.get(id);
        if (record) store.insert(record);
    }
    const allocator = new IdentifierAllocator();
    allocator.restore(lastIdentifier);
    return { store, allocator };
}

/**
 * Compares the live store against what the audit trail implies.
 */
export function reconcile(store: AllocationStore, history: readonly Evidence[], custodian: AccountID): Discrepancy[] {
    const engine = new ProjectionEngine();
    const allocations = engine.register(new AllocationProjection());
    const custody = engine.register(new CustodyProjection(custodian));
    engine.replay(history);

    const projected = allocations.getState().allocations;
    const balances = custody.getState();
    const discrepancies: Discrepancy[] = [];

    for (const live of store.list()) {
        const expected = projected.get(live.id);
        if (!expected) {
            discrepancies.push({ allocationId: live.id, reason: 'No audit record' });
            continue;
        }
        for (const key of ['originator', 'beneficiary', 'resourceId', 'quantity', 'status', 'genesisBlock', 'terminationBlock'] as const) {
            if (live[key] !== expected[key]) {
                discrepancies.push({ allocationId: live.id, reason: `${key} differs: store ${live[key]}, audit ${expected[key]}` });
            }
        }
        const balance = balances.get(live.id) ?? { deposited: 0n, released: 0n };
        if (balance.deposited - balance.released !== live.quantity) {
            discrepancies.push({
                allocationId: live.id,
                reason: `Custody imbalance: deposited ${balance.deposited}, released ${balance.released}, quantity ${live.quantity}`
            });
        }
    }

    for (const id of projected.keys()) {
        if (!store.get(id)) discrepancies.push({ allocationId: id, reason: 'Missing from store' });
    }

    return discrepancies.sort((a, b) => a.allocationId - b.allocationId);
}
