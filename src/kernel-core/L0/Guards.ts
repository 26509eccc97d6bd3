// src/kernel-core/L0/Guards.ts
import type {
    AccountID, Allocation, AllocationID, AllocationStatus, BlockHeight, OperationName, Quantity, Role
} from './Ontology.js';
import { ErrorCode, reject } from '../Errors.js';
import type { Rejected } from '../Errors.js';

// --- Predicates (pure, side-effect free) ---

export function identifierValid(id: number): boolean {
    return Number.isSafeInteger(id) && id >= 1;
}

export function identifierExists(
    id: AllocationID,
    lastIssued: AllocationID,
    record: Allocation | undefined
): record is Allocation {
    return id <= lastIssued && record !== undefined && record.id === id;
}

export function isActorIn(held: readonly Role[], allowed: readonly Role[]): boolean {
    return held.some(role => allowed.includes(role));
}

export function statusIn(status: AllocationStatus, allowed: readonly AllocationStatus[]): boolean {
    return allowed.includes(status);
}

export function withinDeadline(now: BlockHeight, deadline: BlockHeight): boolean {
    return now <= deadline;
}

export function isExpired(now: BlockHeight, deadline: BlockHeight): boolean {
    return now > deadline;
}

export function validAccount(candidate: unknown): candidate is AccountID {
    return typeof candidate === 'string' && /^\S{1,128}$/.test(candidate);
}

export function validBeneficiary(candidate: unknown, caller: AccountID, custodian: AccountID): candidate is AccountID {
    return validAccount(candidate) && candidate !== caller && candidate !== custodian;
}

export function positiveQuantity(q: Quantity): boolean {
    return q > 0n;
}

export function integerInRange(value: number, min: number, max: number): boolean {
    return Number.isSafeInteger(value) && value >= min && value <= max;
}

export function percentageInRange(p: number, min: number = 0, max: number = 100): boolean {
    return integerInRange(p, Math.max(min, 0), Math.min(max, 100));
}

/**
 * Within `window` blocks of now, and not in the future.
 */
export function recentTimestamp(now: BlockHeight, issuedAt: BlockHeight, window: number): boolean {
    return Number.isSafeInteger(issuedAt) && issuedAt <= now && now - issuedAt <= window;
}

export function hexDigest(value: string): boolean {
    return /^[0-9a-fA-F]{64}$/.test(value);
}

// --- Guard Pattern ---
export type GuardResult = { ok: true } | Rejected;
export type Guard<T> = (input: T) => GuardResult;

const OK: GuardResult = { ok: true };
const FAIL = reject;

export type TemporalWindow = 'active' | 'lapsed' | 'any';

// 1. Identifier validity
export const IdentifierGuard: Guard<{ id: number }> = ({ id }) => {
    if (!identifierValid(id)) return FAIL(ErrorCode.INVALID_IDENTIFIER, `Invalid identifier: ${id}`);
    return OK;
};

// 2. Authorization
export const AuthorityGuard: Guard<{ operation: OperationName, caller: AccountID, held: readonly Role[], allowed: readonly Role[] }> = ({ operation, caller, held, allowed }) => {
    if (!isActorIn(held, allowed)) {
        return FAIL(ErrorCode.UNAUTHORIZED, `${caller} may not ${operation}; requires one of ${allowed.join(', ')}`, { held: [...held] });
    }
    return OK;
};

// 3. Status membership
export const StatusGuard: Guard<{ operation: OperationName, status: AllocationStatus, allowed: readonly AllocationStatus[] }> = ({ operation, status, allowed }) => {
    if (!statusIn(status, allowed)) {
        return FAIL(ErrorCode.ALREADY_PROCESSED, `Cannot ${operation} an allocation in status ${status}`, { status, allowed: [...allowed] });
    }
    return OK;
};

// 4. Temporal validity
export const WindowGuard: Guard<{ window: TemporalWindow, now: BlockHeight, deadline: BlockHeight }> = ({ window, now, deadline }) => {
    if (window === 'active' && !withinDeadline(now, deadline)) {
        return FAIL(ErrorCode.LAPSED, `Deadline ${deadline} passed at height ${now}`);
    }
    if (window === 'lapsed' && !isExpired(now, deadline)) {
        return FAIL(ErrorCode.NOT_MATURED, `Deadline ${deadline} not yet passed at height ${now}`);
    }
    return OK;
};

// 5. Recency (signed payloads)
export const RecencyGuard: Guard<{ now: BlockHeight, issuedAt: BlockHeight, window: number }> = ({ now, issuedAt, window }) => {
    if (!recentTimestamp(now, issuedAt, window)) {
        return FAIL(ErrorCode.STALE_TIMESTAMP, `Timestamp ${issuedAt} outside [${now - window}, ${now}]`);
    }
    return OK;
};
