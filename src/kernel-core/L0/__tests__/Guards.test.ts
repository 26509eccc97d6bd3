import { describe, test, expect } from '@jest/globals';
import {
    AuthorityGuard, IdentifierGuard, RecencyGuard, StatusGuard, WindowGuard,
    hexDigest, identifierExists, identifierValid, integerInRange, isActorIn, isExpired,
    percentageInRange, recentTimestamp, validAccount, validBeneficiary, withinDeadline
} from '../Guards.js';
import type { Allocation } from '../Ontology.js';
import { ErrorCode } from '../../Errors.js';

const record: Allocation = {
    id: 3,
    originator: 'alice',
    beneficiary: 'bob',
    resourceId: 1,
    quantity: 10n,
    status: 'pending',
    genesisBlock: 0,
    terminationBlock: 10
};

describe('Guard Library', () => {

    describe('Predicates', () => {
        test('identifiers are positive safe integers', () => {
            expect(identifierValid(1)).toBe(true);
            expect(identifierValid(0)).toBe(false);
            expect(identifierValid(-4)).toBe(false);
            expect(identifierValid(2.5)).toBe(false);
            expect(identifierValid(Number.MAX_SAFE_INTEGER + 1)).toBe(false);
        });

        test('existence requires an issued identifier with a stored record', () => {
            expect(identifierExists(3, 3, record)).toBe(true);
            expect(identifierExists(3, 2, record)).toBe(false);
            expect(identifierExists(3, 5, undefined)).toBe(false);
            expect(identifierExists(4, 5, record)).toBe(false);
        });

        test('deadline boundary belongs to the active window', () => {
            expect(withinDeadline(10, 10)).toBe(true);
            expect(isExpired(10, 10)).toBe(false);
            expect(withinDeadline(11, 10)).toBe(false);
            expect(isExpired(11, 10)).toBe(true);
        });

        test('roles intersect', () => {
            expect(isActorIn(['originator'], ['supervisor', 'originator'])).toBe(true);
            expect(isActorIn([], ['supervisor'])).toBe(false);
        });

        test('accounts are non-empty and whitespace free', () => {
            expect(validAccount('alice')).toBe(true);
            expect(validAccount('')).toBe(false);
            expect(validAccount('al ice')).toBe(false);
            expect(validAccount('x'.repeat(129))).toBe(false);
            expect(validAccount(42)).toBe(false);
        });

        test('beneficiary differs from caller and custodian', () => {
            expect(validBeneficiary('bob', 'alice', 'custodian')).toBe(true);
            expect(validBeneficiary('alice', 'alice', 'custodian')).toBe(false);
            expect(validBeneficiary('custodian', 'alice', 'custodian')).toBe(false);
        });

        test('numeric ranges are inclusive integers', () => {
            expect(integerInRange(5, 5, 5)).toBe(true);
            expect(integerInRange(5.5, 0, 10)).toBe(false);
            expect(percentageInRange(0)).toBe(true);
            expect(percentageInRange(100)).toBe(true);
            expect(percentageInRange(101)).toBe(false);
            expect(percentageInRange(100, 1, 99)).toBe(false);
        });

        test('recent timestamps are within the window and not in the future', () => {
            expect(recentTimestamp(100, 90, 10)).toBe(true);
            expect(recentTimestamp(100, 89, 10)).toBe(false);
            expect(recentTimestamp(100, 101, 10)).toBe(false);
        });

        test('hex digests are 32 bytes', () => {
            expect(hexDigest('ab'.repeat(32))).toBe(true);
            expect(hexDigest('AB'.repeat(32))).toBe(true);
            expect(hexDigest('ab'.repeat(31))).toBe(false);
            expect(hexDigest('zz'.repeat(32))).toBe(false);
        });
    });

    describe('Guards', () => {
        test('IdentifierGuard', () => {
            expect(IdentifierGuard({ id: 1 })).toEqual({ ok: true });
            expect(IdentifierGuard({ id: 0 })).toEqual({
                ok: false,
                code: ErrorCode.INVALID_IDENTIFIER,
                violation: 'Invalid identifier: 0'
            });
        });

        test('AuthorityGuard reports the roles held', () => {
            const result = AuthorityGuard({ operation: 'arbitrate', caller: 'bob', held: ['beneficiary'], allowed: ['supervisor'] });
            expect(result).toEqual({
                ok: false,
                code: ErrorCode.UNAUTHORIZED,
                violation: 'bob may not arbitrate; requires one of supervisor',
                details: { held: ['beneficiary'] }
            });
        });

        test('StatusGuard', () => {
            expect(StatusGuard({ operation: 'accept', status: 'pending', allowed: ['pending'] })).toEqual({ ok: true });
            const result = StatusGuard({ operation: 'accept', status: 'completed', allowed: ['pending'] });
            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.code).toBe(ErrorCode.ALREADY_PROCESSED);
                expect(result.violation).toBe('Cannot accept an allocation in status completed');
            }
        });

        test('WindowGuard', () => {
            expect(WindowGuard({ window: 'active', now: 10, deadline: 10 })).toEqual({ ok: true });
            expect(WindowGuard({ window: 'any', now: 99, deadline: 10 })).toEqual({ ok: true });

            const lapsed = WindowGuard({ window: 'active', now: 11, deadline: 10 });
            expect(lapsed.ok === false && lapsed.code).toBe(ErrorCode.LAPSED);

            const early = WindowGuard({ window: 'lapsed', now: 10, deadline: 10 });
            expect(early.ok === false && early.code).toBe(ErrorCode.NOT_MATURED);
        });

        test('RecencyGuard', () => {
            expect(RecencyGuard({ now: 50, issuedAt: 45, window: 10 })).toEqual({ ok: true });
            expect(RecencyGuard({ now: 50, issuedAt: 30, window: 10 })).toEqual({
                ok: false,
                code: ErrorCode.STALE_TIMESTAMP,
                violation: 'Timestamp 30 outside [40, 50]'
            });
        });
    });
});
