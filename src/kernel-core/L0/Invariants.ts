// src/kernel-core/L0/Invariants.ts
import type { AccountID, Allocation, AllocationID } from './Ontology.js';
import { isTerminalStatus } from './Ontology.js';
import { ErrorCode } from '../Errors.js';
import type { GuardResult } from './Guards.js';

export interface Invariant {
    id: string;
    boundary: string; // The named boundary (e.g. "Temporal Integrity")
    description: string;
    permits: string; // "What would make this permissible?"
    predicate: (context: InvariantContext) => boolean;
    violation: ErrorCode;
}

export interface InvariantContext {
    previous: Allocation | null; // null on creation
    next: Allocation;
    custodian: AccountID;
    maxIdentifier: AllocationID;
}

// I. Identity Integrity
export const INV_ALC_01: Invariant = {
    id: 'INV-ALC-01',
    boundary: 'Identity Integrity',
    description: 'Identifier must be issued by the allocator',
    permits: 'Identifier must be a positive integer no greater than the last issued identifier.',
    predicate: ({ next, maxIdentifier }) => Number.isSafeInteger(next.id) && next.id >= 1 && next.id <= maxIdentifier,
    violation: ErrorCode.INTEGRITY_BREACH
};

export const INV_ALC_02: Invariant = {
    id: 'INV-ALC-02',
    boundary: 'Identity Integrity',
    description: 'Creation fields are immutable',
    permits: 'Identifier, resource and genesis block must match the stored record.',
    predicate: ({ previous, next }) => previous === null || (
        previous.id === next.id &&
        previous.resourceId === next.resourceId &&
        previous.genesisBlock === next.genesisBlock
    ),
    violation: ErrorCode.INTEGRITY_BREACH
};

// II. Party Separation
export const INV_ALC_03: Invariant = {
    id: 'INV-ALC-03',
    boundary: 'Party Separation',
    description: 'Originator, beneficiary and custodian must be distinct',
    permits: 'Beneficiary must differ from the originator and from the custodian account.',
    predicate: ({ next, custodian }) =>
        next.beneficiary !== next.originator &&
        next.beneficiary !== custodian &&
        next.originator !== custodian,
    violation: ErrorCode.INTEGRITY_BREACH
};

// III. Temporal Integrity
export const INV_ALC_04: Invariant = {
    id: 'INV-ALC-04',
    boundary: 'Temporal Integrity',
    description: 'Termination block precedes genesis block',
    permits: 'Termination block must be at or after the genesis block.',
    predicate: ({ next }) => next.terminationBlock >= next.genesisBlock,
    violation: ErrorCode.INTEGRITY_BREACH
};

export const INV_ALC_05: Invariant = {
    id: 'INV-ALC-05',
    boundary: 'Temporal Integrity',
    description: 'Termination block decreased',
    permits: 'Deadlines may only be extended.',
    predicate: ({ previous, next }) => previous === null || next.terminationBlock >= previous.terminationBlock,
    violation: ErrorCode.INTEGRITY_BREACH
};

// IV. Conservation
export const INV_ALC_06: Invariant = {
    id: 'INV-ALC-06',
    boundary: 'Conservation',
    description: 'Quantity is negative',
    permits: 'Escrowed quantity must never drop below zero.',
    predicate: ({ next }) => next.quantity >= 0n,
    violation: ErrorCode.INTEGRITY_BREACH
};

export const INV_ALC_07: Invariant = {
    id: 'INV-ALC-07',
    boundary: 'Conservation',
    description: 'Terminal status and remaining quantity disagree',
    permits: 'Terminal allocations hold nothing; live allocations hold a positive quantity.',
    predicate: ({ next }) => isTerminalStatus(next.status) ? next.quantity === 0n : next.quantity > 0n,
    violation: ErrorCode.INTEGRITY_BREACH
};

export const ALLOCATION_INVARIANTS: Invariant[] = [
    INV_ALC_01, INV_ALC_02, INV_ALC_03, INV_ALC_04, INV_ALC_05, INV_ALC_06, INV_ALC_07
];

export function checkInvariants(context: InvariantContext): GuardResult {
    for (const inv of ALLOCATION_INVARIANTS) {
        if (!inv.predicate(context)) {
            return {
                ok: false,
                code: inv.violation,
                violation: `Invariant Violation: ${inv.description}`,
                details: {
                    invariantId: inv.id,
                    boundary: inv.boundary,
                    permissible: inv.permits
                }
            };
        }
    }
    return { ok: true };
}
