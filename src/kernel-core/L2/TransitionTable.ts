/**
 * Allocation Transition Table
 *
 * The whole lifecycle ruleset as one auditable artifact: for each operation,
 * the statuses it may act on, the status it leaves behind, who may call it and
 * which side of the deadline it must run on.
 */

import type { AllocationStatus, OperationName, Role } from '../L0/Ontology.js';
import { ACTIVE_STATUSES, NON_TERMINAL_STATUSES, OPERATION_NAMES } from '../L0/Ontology.js';
import type { TemporalWindow } from '../L0/Guards.js';

export type TransitionOperation = Exclude<OperationName, 'create'>;

export interface TransitionRule {
    from: readonly AllocationStatus[];
    /** null keeps the current status */
    to: AllocationStatus | null;
    actors: readonly Role[];
    window: TemporalWindow;
}

const ALL_PARTIES: readonly Role[] = ['supervisor', 'originator', 'beneficiary'];
const except = (excluded: AllocationStatus): readonly AllocationStatus[] =>
    NON_TERMINAL_STATUSES.filter(s => s !== excluded);

export const INITIAL_STATUS: AllocationStatus = 'pending';

export const TRANSITION_TABLE: Record<TransitionOperation, TransitionRule> = {
    // Lifecycle
    accept: { from: ['pending'], to: 'accepted', actors: ['beneficiary'], window: 'active' },
    finalize: { from: ACTIVE_STATUSES, to: 'completed', actors: ['supervisor', 'originator'], window: 'active' },
    revert: { from: ['pending'], to: 'reverted', actors: ['supervisor'], window: 'any' },
    terminate: { from: ['pending'], to: 'terminated', actors: ['originator'], window: 'active' },
    reclaimLapsed: { from: ACTIVE_STATUSES, to: 'expired', actors: ['originator', 'supervisor'], window: 'lapsed' },
    emergencyFreeze: { from: except('frozen'), to: 'frozen', actors: ALL_PARTIES, window: 'any' },
    lockForInvestigation: { from: NON_TERMINAL_STATUSES, to: 'locked', actors: ['supervisor', 'originator'], window: 'any' },
    challenge: { from: ACTIVE_STATUSES, to: 'challenged', actors: ['originator', 'beneficiary'], window: 'active' },
    arbitrate: { from: ['challenged'], to: 'arbitrated', actors: ['supervisor'], window: 'any' },
    pause: { from: ACTIVE_STATUSES, to: 'paused', actors: ALL_PARTIES, window: 'any' },
    addSecurityHold: { from: ['pending'], to: 'held', actors: ['supervisor'], window: 'any' },
    establishTimelock: { from: ['pending'], to: 'timelocked', actors: ['originator'], window: 'any' },

    // Leaving holding states
    unfreeze: { from: ['frozen'], to: 'pending', actors: ['supervisor'], window: 'any' },
    closeInvestigation: { from: ['locked'], to: 'pending', actors: ['supervisor'], window: 'any' },
    releaseHold: { from: ['held'], to: 'pending', actors: ['supervisor'], window: 'any' },
    resume: { from: ['paused'], to: 'pending', actors: ['supervisor', 'originator'], window: 'any' },
    releaseTimelock: { from: ['timelocked'], to: 'pending', actors: ['supervisor'], window: 'any' },
    retrieve: { from: ['timelocked'], to: 'retrieved', actors: ['beneficiary'], window: 'lapsed' },

    // Quantity & control
    topUp: { from: ACTIVE_STATUSES, to: null, actors: ['originator'], window: 'active' },
    partialRelease: { from: ACTIVE_STATUSES, to: null, actors: ['originator', 'supervisor'], window: 'active' },
    releaseTranche: { from: ACTIVE_STATUSES, to: null, actors: ['originator', 'supervisor'], window: 'active' },
    transferControl: { from: ACTIVE_STATUSES, to: null, actors: ['originator'], window: 'active' },
    extendDeadline: { from: ACTIVE_STATUSES, to: null, actors: ['originator'], window: 'active' },

    // Audit-only
    verifyTwoFactor: { from: ACTIVE_STATUSES, to: null, actors: ['originator', 'beneficiary'], window: 'active' },
    registerMultisig: { from: ACTIVE_STATUSES, to: null, actors: ['originator'], window: 'active' },
    approveMultisig: { from: ACTIVE_STATUSES, to: null, actors: ALL_PARTIES, window: 'active' },
    addDocumentation: { from: NON_TERMINAL_STATUSES, to: null, actors: ['originator', 'beneficiary'], window: 'any' },
    submitAttestation: { from: NON_TERMINAL_STATUSES, to: null, actors: ['originator', 'beneficiary'], window: 'any' },
    configureRateLimit: { from: NON_TERMINAL_STATUSES, to: null, actors: ['originator', 'supervisor'], window: 'any' },
    registerOversight: { from: NON_TERMINAL_STATUSES, to: null, actors: ['supervisor'], window: 'any' },
    setPriority: { from: ACTIVE_STATUSES, to: null, actors: ['originator', 'supervisor'], window: 'active' },
};

export const TRANSITION_OPERATIONS: TransitionOperation[] =
    OPERATION_NAMES.filter((op): op is TransitionOperation => op !== 'create');

/**
 * Operations that can act on an allocation in the given status.
 */
export function operationsFrom(status: AllocationStatus): TransitionOperation[] {
    return TRANSITION_OPERATIONS.filter(op => TRANSITION_TABLE[op].from.includes(status));
}

/**
 * Statuses reachable in one step from the given status.
 */
export function successorsOf(status: AllocationStatus): AllocationStatus[] {
    const next = new Set<AllocationStatus>();
    for (const op of operationsFrom(status)) {
        next.add(TRANSITION_TABLE[op].to ?? status);
    }
    return [...next];
}

export function isValidTransition(from: AllocationStatus, to: AllocationStatus): boolean {
    return successorsOf(from).includes(to);
}
