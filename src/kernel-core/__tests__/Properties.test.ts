import { describe, test, expect } from '@jest/globals';
import fc from 'fast-check';
import type { Outcome } from '../Errors.js';
import { ErrorCode } from '../Errors.js';
import type { AccountID, Allocation, AllocationID, Role } from '../L0/Ontology.js';
import { isTerminalStatus } from '../L0/Ontology.js';
import { sumQuantities } from '../L0/Primitives.js';
import { TRANSITION_OPERATIONS, TRANSITION_TABLE } from '../L2/TransitionTable.js';
import type { TransitionOperation } from '../L2/TransitionTable.js';
import { ALICE, BOB, INITIAL_BALANCE, MALLORY, SUPERVISOR, createHarness, open } from './harness.js';
import type { Harness } from './harness.js';

type Invoker = (h: Harness, caller: AccountID, id: AllocationID) => Outcome<Allocation>;

const signed = { digest: '00'.repeat(32), signature: '00'.repeat(64), issuedAt: 100 };

const INVOKE: Record<TransitionOperation, Invoker> = {
    accept: (h, c, id) => h.kernel.accept(c, id),
    finalize: (h, c, id) => h.kernel.finalize(c, id),
    revert: (h, c, id) => h.kernel.revert(c, id),
    terminate: (h, c, id) => h.kernel.terminate(c, id),
    reclaimLapsed: (h, c, id) => h.kernel.reclaimLapsed(c, id),
    emergencyFreeze: (h, c, id) => h.kernel.emergencyFreeze(c, id),
    lockForInvestigation: (h, c, id) => h.kernel.lockForInvestigation(c, id),
    challenge: (h, c, id) => h.kernel.challenge(c, id),
    arbitrate: (h, c, id) => h.kernel.arbitrate(c, id, 50),
    pause: (h, c, id) => h.kernel.pause(c, id),
    addSecurityHold: (h, c, id) => h.kernel.addSecurityHold(c, id),
    establishTimelock: (h, c, id) => h.kernel.establishTimelock(c, id, 120),
    unfreeze: (h, c, id) => h.kernel.unfreeze(c, id),
    closeInvestigation: (h, c, id) => h.kernel.closeInvestigation(c, id),
    releaseHold: (h, c, id) => h.kernel.releaseHold(c, id),
    resume: (h, c, id) => h.kernel.resume(c, id),
    releaseTimelock: (h, c, id) => h.kernel.releaseTimelock(c, id),
    retrieve: (h, c, id) => h.kernel.retrieve(c, id),
    topUp: (h, c, id) => h.kernel.topUp(c, id, 10n),
    partialRelease: (h, c, id) => h.kernel.partialRelease(c, id, 10n),
    releaseTranche: (h, c, id) => h.kernel.releaseTranche(c, id, 10),
    transferControl: (h, c, id) => h.kernel.transferControl(c, id, 'carol'),
    extendDeadline: (h, c, id) => h.kernel.extendDeadline(c, id, 10),
    verifyTwoFactor: (h, c, id) => h.kernel.verifyTwoFactor(c, id, signed),
    registerMultisig: (h, c, id) => h.kernel.registerMultisig(c, id, { signers: [ALICE, BOB], threshold: 2 }),
    approveMultisig: (h, c, id) => h.kernel.approveMultisig(c, id, { digest: signed.digest, signatures: [signed.signature] }),
    addDocumentation: (h, c, id) => h.kernel.addDocumentation(c, id, 'ab'.repeat(32)),
    submitAttestation: (h, c, id) => h.kernel.submitAttestation(c, id, signed),
    configureRateLimit: (h, c, id) => h.kernel.configureRateLimit(c, id, { maxOperations: 5, windowBlocks: 5 }),
    registerOversight: (h, c, id) => h.kernel.registerOversight(c, id, 'auditor'),
    setPriority: (h, c, id) => h.kernel.setPriority(c, id, 1),
};

const PARTIES: AccountID[] = [ALICE, BOB, SUPERVISOR];
const ACCOUNT_OF: Record<Role, AccountID> = { supervisor: SUPERVISOR, originator: ALICE, beneficiary: BOB };
const codeOf = <T>(outcome: Outcome<T>): ErrorCode | 'OK' => outcome.ok ? 'OK' : outcome.code;

describe('Kernel Properties', () => {

    test('PROP_01: Authorization Monotonicity (outsiders are always unauthorized)', () => {
        fc.assert(
            fc.property(
                fc.constantFrom(...TRANSITION_OPERATIONS),
                fc.string({ maxLength: 12 }).filter(s => !PARTIES.includes(s)),
                (op, outsider) => {
                    const h = createHarness();
                    open(h);
                    return codeOf(INVOKE[op](h, outsider, 1)) === ErrorCode.UNAUTHORIZED;
                }
            )
        );
    });

    test('PROP_02: Roles outside the rule are rejected regardless of status', () => {
        for (const op of TRANSITION_OPERATIONS) {
            const rule = TRANSITION_TABLE[op];
            for (const role of ['supervisor', 'originator', 'beneficiary'] as const) {
                if (rule.actors.includes(role)) continue;
                const h = createHarness();
                open(h);
                h.kernel.finalize(SUPERVISOR, 1);
                expect([op, role, codeOf(INVOKE[op](h, ACCOUNT_OF[role], 1))]).toEqual([op, role, ErrorCode.UNAUTHORIZED]);
            }
        }
    });

    test('PROP_03: Deadline Enforcement', () => {
        fc.assert(
            fc.property(fc.integer({ min: 0, max: 50 }), fc.integer({ min: 0, max: 100 }), (duration, elapsed) => {
                const lapsed = elapsed > duration;

                const reclaim = createHarness();
                open(reclaim, { duration });
                reclaim.clock.advance(elapsed);
                const reclaimed = reclaim.kernel.reclaimLapsed(ALICE, 1);

                const accept = createHarness();
                open(accept, { duration });
                accept.clock.advance(elapsed);
                const accepted = accept.kernel.accept(BOB, 1);

                return reclaimed.ok === lapsed &&
                    codeOf(reclaimed) === (lapsed ? 'OK' : ErrorCode.NOT_MATURED) &&
                    codeOf(accepted) === (lapsed ? ErrorCode.LAPSED : 'OK');
            })
        );
    });

    const ACTORS = [ALICE, BOB, SUPERVISOR, MALLORY];
    const STEPS = [
        'create', 'accept', 'finalize', 'revert', 'terminate', 'reclaimLapsed', 'challenge', 'arbitrate',
        'emergencyFreeze', 'unfreeze', 'pause', 'resume', 'topUp', 'partialRelease', 'releaseTranche', 'advance'
    ] as const;

    const step = fc.record({
        kind: fc.constantFrom(...STEPS),
        actor: fc.integer({ min: 0, max: ACTORS.length - 1 }),
        id: fc.integer({ min: 0, max: 6 }),
        n: fc.integer({ min: 0, max: 120 }),
    });

    interface Step {
        kind: typeof STEPS[number];
        actor: number;
        id: number;
        n: number;
    }

    const apply = (h: Harness, s: Step): void => {
        const caller = ACTORS[s.actor] ?? ALICE;
        const k = h.kernel;
        switch (s.kind) {
            case 'create':
                k.create(caller, { beneficiary: ACTORS[(s.actor + 1) % ACTORS.length] ?? BOB, resourceId: s.id, quantity: BigInt(s.n), duration: s.n % 30 });
                break;
            case 'arbitrate': k.arbitrate(caller, s.id, s.n); break;
            case 'topUp': k.topUp(caller, s.id, BigInt(s.n)); break;
            case 'partialRelease': k.partialRelease(caller, s.id, BigInt(s.n)); break;
            case 'releaseTranche': k.releaseTranche(caller, s.id, s.n); break;
            case 'advance': h.clock.advance(s.n % 20); break;
            default: INVOKE[s.kind](h, caller, s.id);
        }
    };

    test('PROP_04: Conservation (custody equals the sum of live quantities)', () => {
        fc.assert(
            fc.property(fc.array(step, { maxLength: 40 }), (steps) => {
                const h = createHarness();
                const supply = h.ledger.totalSupply();

                for (const s of steps) {
                    apply(h, s);
                    const escrowed = sumQuantities(h.kernel.listAllocations().map(a => a.quantity));
                    if (h.ledger.balanceOf(h.kernel.Custodian) !== escrowed) return false;
                    if (h.ledger.totalSupply() !== supply) return false;
                }
                return h.kernel.reconcile(h.audit.getHistory()).length === 0 && h.audit.verifyChain();
            })
        );
    });

    test('PROP_05: No Double Processing (at most one terminal event per allocation)', () => {
        fc.assert(
            fc.property(fc.array(step, { maxLength: 40 }), (steps) => {
                const h = createHarness();
                for (const s of steps) apply(h, s);

                const terminalEvents = new Map<number, number>();
                for (const { event } of h.audit.getHistory()) {
                    if (isTerminalStatus(event.status)) {
                        terminalEvents.set(event.allocationId, (terminalEvents.get(event.allocationId) ?? 0) + 1);
                    }
                }
                return [...terminalEvents.values()].every(count => count === 1);
            })
        );
    });

    test('initial balances are funded', () => {
        expect(createHarness().ledger.balanceOf(ALICE)).toBe(INITIAL_BALANCE);
    });
});
