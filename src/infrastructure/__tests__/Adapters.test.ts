import { describe, test, expect } from '@jest/globals';
import { InMemoryLedger } from '../ledger/InMemoryLedger.js';
import { ManualClock } from '../clock/ManualClock.js';
import { Ed25519SignatureVerifier, publicKeyOf, signDigest } from '../crypto/Ed25519SignatureVerifier.js';
import { digestOf } from '../../kernel-core/L0/Crypto.js';
import { ErrorCode } from '../../kernel-core/Errors.js';

describe('In-Memory Ledger', () => {
    test('transfers move balances', () => {
        const ledger = new InMemoryLedger();
        ledger.fund('alice', 100n);

        expect(ledger.custodianAccount()).toBe('custodian');
        expect(ledger.transfer(40n, 'alice', 'bob')).toEqual({ ok: true });
        expect(ledger.balanceOf('alice')).toBe(60n);
        expect(ledger.balanceOf('bob')).toBe(40n);
        expect(ledger.totalSupply()).toBe(100n);
    });

    test('refusals', () => {
        const ledger = new InMemoryLedger('vault');
        ledger.fund('alice', 10n);

        expect(ledger.transfer(11n, 'alice', 'bob')).toEqual({ ok: false, reason: 'insufficient balance (10)' });
        expect(ledger.transfer(0n, 'alice', 'bob')).toEqual({ ok: false, reason: 'non-positive amount' });

        ledger.block('bob');
        expect(ledger.transfer(1n, 'alice', 'bob')).toEqual({ ok: false, reason: 'account blocked' });
        ledger.unblock('bob');
        expect(ledger.transfer(1n, 'alice', 'bob')).toEqual({ ok: true });

        expect(() => ledger.fund('alice', -1n)).toThrow('Cannot fund a negative amount: -1');
    });
});

describe('Manual Clock', () => {
    test('only moves forward', () => {
        const clock = new ManualClock(5);
        expect(clock.advance()).toBe(6);
        expect(clock.advance(4)).toBe(10);
        clock.setHeight(10);
        expect(clock.currentHeight()).toBe(10);
        expect(() => clock.setHeight(9)).toThrow('Clock only moves forward: 10 -> 9');
        expect(() => clock.advance(-1)).toThrow('Clock only moves forward, got -1');
    });
});

describe('Ed25519 Signature Verifier', () => {
    const aliceKey = new Uint8Array(32).fill(7);
    const bobKey = new Uint8Array(32).fill(8);
    const digest = digestOf({ purpose: 'test' });

    test('recovers the registered signer', () => {
        const verifier = new Ed25519SignatureVerifier();
        verifier.register('alice', publicKeyOf(aliceKey));
        verifier.register('bob', Buffer.from(publicKeyOf(bobKey)).toString('hex'));

        expect(verifier.recoverSigner(digest, signDigest(digest, bobKey))).toEqual({ ok: true, value: 'bob' });
        expect(verifier.recoverSigner(digest, signDigest(digest, aliceKey))).toEqual({ ok: true, value: 'alice' });
    });

    test('a signature over another digest is not recovered', () => {
        const verifier = new Ed25519SignatureVerifier();
        verifier.register('alice', publicKeyOf(aliceKey));
        const other = digestOf({ purpose: 'other' });

        expect(verifier.recoverSigner(digest, signDigest(other, aliceKey))).toEqual({
            ok: false,
            code: ErrorCode.VERIFICATION_FAILED,
            violation: 'Signature does not match any registered account'
        });
    });

    test('malformed input is a failed verification', () => {
        const verifier = new Ed25519SignatureVerifier();
        verifier.register('alice', publicKeyOf(aliceKey));
        expect(verifier.recoverSigner(digest, 'not-hex').ok).toBe(false);
        expect(verifier.recoverSigner(digest, new Uint8Array(3)).ok).toBe(false);
    });

    test('registration validates keys and accounts', () => {
        const verifier = new Ed25519SignatureVerifier();
        expect(() => verifier.register('alice', 'abcd')).toThrow('Public key for alice must be 32 bytes of hex');
        expect(() => verifier.register('', publicKeyOf(aliceKey))).toThrow('Invalid account id: ');
    });
});
