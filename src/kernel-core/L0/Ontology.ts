/**
 * ESCROW ONTOLOGY
 * The single source of truth for the kernel's primitives.
 */

// --- 1. Accounts & Heights ---
export type AccountID = string;
export type AllocationID = number;
export type ResourceID = number;
export type BlockHeight = number;
export type Quantity = bigint;

// --- 2. Lifecycle ---
export const ALLOCATION_STATUSES = [
    'pending',
    'accepted',
    'completed',
    'reverted',
    'terminated',
    'expired',
    'frozen',
    'challenged',
    'arbitrated',
    'locked',
    'held',
    'paused',
    'timelocked',
    'retrieved',
] as const;

export type AllocationStatus = typeof ALLOCATION_STATUSES[number];

export const TERMINAL_STATUSES: readonly AllocationStatus[] = [
    'completed', 'reverted', 'terminated', 'expired', 'arbitrated', 'retrieved'
];

export const ACTIVE_STATUSES: readonly AllocationStatus[] = ['pending', 'accepted'];

export const NON_TERMINAL_STATUSES: readonly AllocationStatus[] =
    ALLOCATION_STATUSES.filter(s => !TERMINAL_STATUSES.includes(s));

export function isTerminalStatus(status: AllocationStatus): boolean {
    return TERMINAL_STATUSES.includes(status);
}

// --- 3. Allocation (the sole persisted entity) ---
export interface Allocation {
    readonly id: AllocationID;
    readonly originator: AccountID;
    readonly beneficiary: AccountID;
    readonly resourceId: ResourceID;
    readonly quantity: Quantity;
    readonly status: AllocationStatus;
    readonly genesisBlock: BlockHeight;
    readonly terminationBlock: BlockHeight;
}

/**
 * JSON-safe rendering of an allocation, used in audit events.
 */
export interface AllocationView {
    id: AllocationID;
    originator: AccountID;
    beneficiary: AccountID;
    resourceId: ResourceID;
    quantity: string;
    status: AllocationStatus;
    genesisBlock: BlockHeight;
    terminationBlock: BlockHeight;
}

export function toView(a: Allocation): AllocationView {
    return { ...a, quantity: a.quantity.toString() };
}

export function fromView(v: AllocationView): Allocation {
    return { ...v, quantity: BigInt(v.quantity) };
}

// --- 4. Roles ---
export type Role = 'supervisor' | 'originator' | 'beneficiary';

// --- 5. Operations ---
export const OPERATION_NAMES = [
    'create',
    'accept',
    'finalize',
    'revert',
    'terminate',
    'reclaimLapsed',
    'emergencyFreeze',
    'lockForInvestigation',
    'challenge',
    'arbitrate',
    'pause',
    'addSecurityHold',
    'establishTimelock',
    'unfreeze',
    'closeInvestigation',
    'releaseHold',
    'resume',
    'releaseTimelock',
    'retrieve',
    'topUp',
    'partialRelease',
    'releaseTranche',
    'transferControl',
    'extendDeadline',
    'verifyTwoFactor',
    'registerMultisig',
    'approveMultisig',
    'addDocumentation',
    'submitAttestation',
    'configureRateLimit',
    'registerOversight',
    'setPriority',
] as const;

export type OperationName = typeof OPERATION_NAMES[number];

// --- 6. Movement ---
export interface Movement {
    from: AccountID;
    to: AccountID;
    amount: Quantity;
}

export interface MovementView {
    from: AccountID;
    to: AccountID;
    amount: string;
}

// --- 7. Audit Event ---
export type AuditValue = string | number | boolean | null | readonly string[];

export interface AuditEvent {
    operation: OperationName;
    allocationId: AllocationID;
    actor: AccountID;
    height: BlockHeight;
    previousStatus: AllocationStatus | null; // null on creation
    status: AllocationStatus;
    allocation: AllocationView;
    movements: MovementView[];
    fields: Record<string, AuditValue>;
}
