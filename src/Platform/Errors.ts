/**
 * Escrow Platform: Domain Error Taxonomy
 * Translates kernel rejections into exceptions for callers that prefer them.
 */

import { ErrorCode } from '../kernel-core/Errors.js';
import type { Details, Rejected } from '../kernel-core/Errors.js';

export abstract class PlatformError extends Error {
    constructor(message: string, public readonly code: string, public readonly metadata?: Details) {
        super(message);
        this.name = this.constructor.name;
    }
}

/**
 * Thrown when lifecycle, deadline or quantity rules prevent execution.
 */
export class PolicyViolationError extends PlatformError {
    constructor(message: string, operation: string, details?: Details) {
        super(message, 'POLICY_VIOLATION', { operation, ...details });
    }
}

/**
 * Thrown when authorization, party or signature checks fail.
 */
export class SecurityViolationError extends PlatformError {
    constructor(message: string, actorId: string, details?: Details) {
        super(message, 'SECURITY_VIOLATION', { actorId, ...details });
    }
}

/**
 * Thrown when a record invariant would be breached.
 */
export class DataIntegrityError extends PlatformError {
    constructor(message: string, details?: Details) {
        super(message, 'DATA_INTEGRITY_BREACH', details);
    }
}

/**
 * Thrown when the ledger rejects a movement.
 */
export class InfrastructureError extends PlatformError {
    constructor(message: string, details?: Details) {
        super(message, 'INFRASTRUCTURE_FAILURE', details);
    }
}

/**
 * Thrown when engine configuration fails validation.
 */
export class ConfigurationError extends PlatformError {
    constructor(message: string, issues: string[]) {
        super(message, 'CONFIGURATION_INVALID', { issues });
    }
}

export function translateRejection(rejection: Rejected, operation: string, actorId: string): PlatformError {
    const details: Details = { kernelCode: rejection.code, ...rejection.details };

    switch (rejection.code) {
        case ErrorCode.UNAUTHORIZED:
        case ErrorCode.INVALID_PARTY:
        case ErrorCode.VERIFICATION_FAILED:
            return new SecurityViolationError(rejection.violation, actorId, details);
        case ErrorCode.MOVEMENT_FAILED:
            return new InfrastructureError(rejection.violation, details);
        case ErrorCode.INTEGRITY_BREACH:
        case ErrorCode.COMMIT_CONFLICT:
            return new DataIntegrityError(rejection.violation, details);
        default:
            return new PolicyViolationError(rejection.violation, operation, details);
    }
}
