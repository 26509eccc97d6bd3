/**
 * Escrow Kernel Error Taxonomy
 * Centralized error codes for guard rejections and internal failures.
 */

export enum ErrorCode {
    // I. Identity & Authority
    UNAUTHORIZED = 'UNAUTHORIZED',
    INVALID_PARTY = 'INVALID_PARTY',
    VERIFICATION_FAILED = 'VERIFICATION_FAILED',

    // II. Addressing
    INVALID_IDENTIFIER = 'INVALID_IDENTIFIER',
    NOT_FOUND = 'NOT_FOUND',

    // III. Lifecycle
    ALREADY_PROCESSED = 'ALREADY_PROCESSED',

    // IV. Temporal
    LAPSED = 'LAPSED',
    NOT_MATURED = 'NOT_MATURED',
    STALE_TIMESTAMP = 'STALE_TIMESTAMP',

    // V. Value & Input
    INVALID_QUANTITY = 'INVALID_QUANTITY',
    MALFORMED_INPUT = 'MALFORMED_INPUT',
    MOVEMENT_FAILED = 'MOVEMENT_FAILED',

    // VI. Kernel Internal
    INTEGRITY_BREACH = 'INTEGRITY_BREACH',
    COMMIT_CONFLICT = 'COMMIT_CONFLICT',
}

export type Details = Record<string, unknown>;

export interface Rejected {
    ok: false;
    code: ErrorCode;
    violation: string;
    details?: Details;
}

/**
 * Every kernel operation returns an Outcome. Rejections are values, never thrown.
 */
export type Outcome<T> = { ok: true; value: T } | Rejected;

export const success = <T>(value: T): Outcome<T> => ({ ok: true, value });

export const reject = (code: ErrorCode, violation: string, details?: Details): Rejected =>
    details ? { ok: false, code, violation, details } : { ok: false, code, violation };

export class KernelError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly metadata?: Details
    ) {
        super(`[Escrow:${code}] ${message}`);
        this.name = 'KernelError';
    }
}

/**
 * Unwraps an Outcome for callers that prefer exceptions.
 */
export function unwrap<T>(outcome: Outcome<T>): T {
    if (outcome.ok) return outcome.value;
    throw new KernelError(outcome.code, outcome.violation, outcome.details);
}
