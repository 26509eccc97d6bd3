import type { Draft } from 'immer';
import type {
    AccountID, Allocation, AllocationID, AuditEvent, AuditValue, BlockHeight, Movement, OperationName, Quantity, ResourceID, Role
} from './L0/Ontology.js';
import { ACTIVE_STATUSES, toView } from './L0/Ontology.js';
import {
    AuthorityGuard, IdentifierGuard, RecencyGuard, StatusGuard, WindowGuard,
    hexDigest, identifierExists, integerInRange, isExpired, percentageInRange, positiveQuantity, statusIn, validAccount, validBeneficiary
} from './L0/Guards.js';
import type { GuardResult } from './L0/Guards.js';
import { checkInvariants } from './L0/Invariants.js';
import { reconcile } from './L3/Projections.js';
import type { Discrepancy } from './L3/Projections.js';
import type { Evidence } from './L5/Audit.js';
import { splitByPercentage } from './L0/Primitives.js';
import { toHex } from './L0/Crypto.js';
import { partiesOf, rolesOf } from './L1/Roles.js';
import { AllocationStore, IdentifierAllocator, deriveAllocation } from './L2/State.js';
import type { AllocationFilter } from './L2/State.js';
import { INITIAL_STATUS, TRANSITION_TABLE } from './L2/TransitionTable.js';
import type { TransitionOperation } from './L2/TransitionTable.js';
import { Settlement } from './L2/Settlement.js';
import type { KernelLogger } from './L2/Settlement.js';
import { ErrorCode, reject, success } from './Errors.js';
import type { Outcome, Rejected } from './Errors.js';
import type { AuditSink, Clock, Hex, Ledger, SignatureVerifier } from '../Platform/Ports.js';
import { validateEngineConfig } from '../Platform/Config.js';
import type { EngineConfig } from '../Platform/Config.js';
import { ConfigurationError } from '../Platform/Errors.js';

// --- Operation Parameters ---
export interface CreateParams {
    beneficiary: AccountID;
    resourceId: ResourceID;
    quantity: Quantity;
    /** Blocks from now until the termination block */
    duration: number;
}

export interface SignedPayload {
    digest: Hex;
    signature: Hex;
    issuedAt: BlockHeight;
}

export interface MultisigRegistration {
    signers: AccountID[];
    threshold: number;
}

export interface MultisigApproval {
    digest: Hex;
    signatures: Hex[];
}

export interface RateLimit {
    maxOperations: number;
    windowBlocks: number;
}

export interface KernelDependencies {
    ledger: Ledger;
    clock: Clock;
    verifier: SignatureVerifier;
    audit: AuditSink;
    store?: AllocationStore;
    allocator?: IdentifierAllocator;
    logger?: KernelLogger;
}

// --- Transition Planning ---
interface PlanContext {
    allocation: Allocation;
    caller: AccountID;
    roles: readonly Role[];
    now: BlockHeight;
    custodian: AccountID;
}

interface Effect {
    update?: (draft: Draft<Allocation>) => void;
    movements?: Movement[];
    fields?: Record<string, AuditValue>;
}

type Planner = (ctx: PlanContext) => Outcome<Effect>;

const NO_EFFECT: Planner = () => success<Effect>({});
const MAX_REASON_LENGTH = 512;

const hexOf = (value: Hex): string => typeof value === 'string' ? value.toLowerCase() : toHex(value);

/**
 * Allocation Registry & Transition Engine.
 *
 * Every call runs synchronously and either completes in full (guards, ledger
 * movement, store write, audit emission) or leaves no trace.
 */
export class EscrowKernel {
    private readonly store: AllocationStore;
    private readonly allocator: IdentifierAllocator;
    private readonly settlement: Settlement;
    private readonly logger: KernelLogger;
    private readonly ledger: Ledger;
    private readonly clock: Clock;
    private readonly verifier: SignatureVerifier;
    private readonly audit: AuditSink;
    private readonly config: EngineConfig;
    private readonly custodian: AccountID;

    // Pressure Tracker: ErrorCode -> Count
    private rejectionTracker: Map<ErrorCode, number> = new Map();

    public constructor(config: EngineConfig, deps: KernelDependencies) {
        this.config = validateEngineConfig(config);
        this.ledger = deps.ledger;
        this.clock = deps.clock;
        this.verifier = deps.verifier;
        this.audit = deps.audit;
        this.store = deps.store ?? new AllocationStore();
        this.allocator = deps.allocator ?? new IdentifierAllocator();
        this.logger = deps.logger ?? console;
        this.settlement = new Settlement(this.ledger, this.logger);

        this.custodian = this.ledger.custodianAccount();
        if (this.custodian === this.config.supervisor) {
            throw new ConfigurationError('Supervisor cannot be the custodian account', ['supervisor: equals custodian']);
        }
    }

    public get Custodian(): AccountID { return this.custodian; }
    public get lastIdentifier(): AllocationID { return this.allocator.lastIssued; }

    // --- Queries ---

    public getAllocation(id: AllocationID): Outcome<Allocation> {
        const check = IdentifierGuard({ id });
        if (!check.ok) return check;
        const record = this.store.get(id);
        if (!identifierExists(id, this.allocator.lastIssued, record)) {
            return reject(ErrorCode.NOT_FOUND, `Allocation ${id} not found`);
        }
        return success(record);
    }

    public listAllocations(filter: AllocationFilter = {}): Allocation[] {
        return this.store.list(filter);
    }

    /**
     * True when the deadline has passed while the allocation is still active.
     */
    public isLapsed(id: AllocationID): Outcome<boolean> {
        const loaded = this.getAllocation(id);
        if (!loaded.ok) return loaded;
        const a = loaded.value;
        return success(statusIn(a.status, ACTIVE_STATUSES) && isExpired(this.clock.currentHeight(), a.terminationBlock));
    }

    /**
     * Differences between the live store and the state implied by `history`.
     */
    public reconcile(history: readonly Evidence[]): Discrepancy[] {
        return reconcile(this.store, history, this.custodian);
    }

    // --- Creation ---

    public create(caller: AccountID, params: CreateParams): Outcome<Allocation> {
        const now = this.clock.currentHeight();
        const { beneficiary, resourceId, quantity, duration } = params;

        if (!validAccount(caller) || caller === this.custodian) {
            return this.rejected('create', reject(ErrorCode.UNAUTHORIZED, `${caller} may not create allocations`));
        }
        if (!validBeneficiary(beneficiary, caller, this.custodian)) {
            return this.rejected('create', reject(ErrorCode.INVALID_PARTY, `Invalid beneficiary: ${beneficiary}`));
        }
        if (!Number.isSafeInteger(resourceId) || resourceId < 0) {
            return this.rejected('create', reject(ErrorCode.INVALID_IDENTIFIER, `Invalid resource identifier: ${resourceId}`));
        }
        if (!positiveQuantity(quantity)) {
            return this.rejected('create', reject(ErrorCode.INVALID_QUANTITY, `Quantity must be positive, got ${quantity}`));
        }
        if (!integerInRange(duration, 0, Number.MAX_SAFE_INTEGER - now)) {
            return this.rejected('create', reject(ErrorCode.INVALID_QUANTITY, `Invalid duration: ${duration}`));
        }

        const id = this.allocator.peek();
        const record: Allocation = {
            id,
            originator: caller,
            beneficiary,
            resourceId,
            quantity,
            status: INITIAL_STATUS,
            genesisBlock: now,
            terminationBlock: now + duration
        };

        const invariant = checkInvariants({ previous: null, next: record, custodian: this.custodian, maxIdentifier: id });
        if (!invariant.ok) return this.rejected('create', invariant);

        const settled = this.settlement.execute([{ from: caller, to: this.custodian, amount: quantity }]);
        if (!settled.ok) return this.rejected('create', settled);

        // ATOMIC COMMIT
        this.store.insert(record);
        this.allocator.commit(id);

        this.record({
            operation: 'create',
            allocationId: id,
            actor: caller,
            height: now,
            previousStatus: null,
            status: record.status,
            allocation: toView(record),
            movements: settled.value.map(m => ({ from: m.from, to: m.to, amount: m.amount.toString() })),
            fields: { duration }
        });

        return success(this.store.get(id) ?? record);
    }

    // --- Lifecycle ---

    public accept(caller: AccountID, id: AllocationID): Outcome<Allocation> {
        return this.transition('accept', caller, id);
    }

    public finalize(caller: AccountID, id: AllocationID): Outcome<Allocation> {
        return this.transition('finalize', caller, id, this.payout('beneficiary'));
    }

    public revert(caller: AccountID, id: AllocationID): Outcome<Allocation> {
        return this.transition('revert', caller, id, this.payout('originator'));
    }

    public terminate(caller: AccountID, id: AllocationID): Outcome<Allocation> {
        return this.transition('terminate', caller, id, this.payout('originator'));
    }

    public reclaimLapsed(caller: AccountID, id: AllocationID): Outcome<Allocation> {
        return this.transition('reclaimLapsed', caller, id, this.payout('originator'));
    }

    public emergencyFreeze(caller: AccountID, id: AllocationID, reason = ''): Outcome<Allocation> {
        return this.transition('emergencyFreeze', caller, id, this.annotated(reason));
    }

    public lockForInvestigation(caller: AccountID, id: AllocationID, reason = ''): Outcome<Allocation> {
        return this.transition('lockForInvestigation', caller, id, this.annotated(reason));
    }

    public challenge(caller: AccountID, id: AllocationID, reason = ''): Outcome<Allocation> {
        return this.transition('challenge', caller, id, this.annotated(reason));
    }

    /**
     * Splits the escrow: the originator receives floor(quantity * pct / 100),
     * the beneficiary the remainder. Both transfers land or neither does.
     */
    public arbitrate(caller: AccountID, id: AllocationID, originatorPercentage: number): Outcome<Allocation> {
        return this.transition('arbitrate', caller, id, ({ allocation, custodian }) => {
            if (!percentageInRange(originatorPercentage)) {
                return reject(ErrorCode.INVALID_QUANTITY, `Originator percentage must be an integer in [0, 100], got ${originatorPercentage}`);
            }
            const { share, remainder } = splitByPercentage(allocation.quantity, originatorPercentage);
            return success<Effect>({
                movements: [
                    { from: custodian, to: allocation.originator, amount: share },
                    { from: custodian, to: allocation.beneficiary, amount: remainder }
                ],
                update: draft => { draft.quantity = 0n; },
                fields: {
                    originatorPercentage,
                    originatorShare: share.toString(),
                    beneficiaryShare: remainder.toString()
                }
            });
        });
    }

    public pause(caller: AccountID, id: AllocationID): Outcome<Allocation> {
        return this.transition('pause', caller, id);
    }

    public addSecurityHold(caller: AccountID, id: AllocationID): Outcome<Allocation> {
        const holdDuration = this.config.holdDuration;
        return this.transition('addSecurityHold', caller, id, ({ allocation }) => {
            if (allocation.terminationBlock > Number.MAX_SAFE_INTEGER - holdDuration) {
                return reject(ErrorCode.INVALID_QUANTITY, 'Hold would overflow the termination block');
            }
            const terminationBlock = allocation.terminationBlock + holdDuration;
            return success<Effect>({
                update: draft => { draft.terminationBlock = terminationBlock; },
                fields: { holdDuration, terminationBlock }
            });
        });
    }

    /**
     * The unlock height is recorded in the audit trail only. Retrieval is
     * gated on the termination block; the supervisor may release earlier.
     */
    public establishTimelock(caller: AccountID, id: AllocationID, unlockHeight: BlockHeight): Outcome<Allocation> {
        return this.transition('establishTimelock', caller, id, ({ allocation }) => {
            if (!integerInRange(unlockHeight, 0, allocation.terminationBlock)) {
                return reject(
                    ErrorCode.INVALID_QUANTITY,
                    `Unlock height must be in [0, ${allocation.terminationBlock}], got ${unlockHeight}`
                );
            }
            return success<Effect>({ fields: { unlockHeight } });
        });
    }

    // --- Leaving holding states ---

    public unfreeze(caller: AccountID, id: AllocationID): Outcome<Allocation> {
        return this.transition('unfreeze', caller, id);
    }

    public closeInvestigation(caller: AccountID, id: AllocationID): Outcome<Allocation> {
        return this.transition('closeInvestigation', caller, id);
    }

    public releaseHold(caller: AccountID, id: AllocationID): Outcome<Allocation> {
        return this.transition('releaseHold', caller, id);
    }

    public resume(caller: AccountID, id: AllocationID): Outcome<Allocation> {
        return this.transition('resume', caller, id);
    }

    public releaseTimelock(caller: AccountID, id: AllocationID): Outcome<Allocation> {
        return this.transition('releaseTimelock', caller, id);
    }

    public retrieve(caller: AccountID, id: AllocationID): Outcome<Allocation> {
        return this.transition('retrieve', caller, id, this.payout('beneficiary'));
    }

    // --- Quantity & control ---

    public topUp(caller: AccountID, id: AllocationID, amount: Quantity): Outcome<Allocation> {
        return this.transition('topUp', caller, id, ({ allocation, custodian }) => {
            if (!positiveQuantity(amount)) {
                return reject(ErrorCode.INVALID_QUANTITY, `Top-up must be positive, got ${amount}`);
            }
            return success<Effect>({
                movements: [{ from: allocation.originator, to: custodian, amount }],
                update: draft => { draft.quantity = allocation.quantity + amount; },
                fields: { amount: amount.toString() }
            });
        });
    }

    public partialRelease(caller: AccountID, id: AllocationID, amount: Quantity): Outcome<Allocation> {
        return this.transition('partialRelease', caller, id, ctx => this.release(ctx, amount, {}));
    }

    /**
     * Releases floor(quantity * percentage / 100) to the beneficiary.
     */
    public releaseTranche(caller: AccountID, id: AllocationID, percentage: number): Outcome<Allocation> {
        return this.transition('releaseTranche', caller, id, ctx => {
            if (!percentageInRange(percentage, 1, 99)) {
                return reject(ErrorCode.INVALID_QUANTITY, `Tranche percentage must be an integer in [1, 99], got ${percentage}`);
            }
            const { share } = splitByPercentage(ctx.allocation.quantity, percentage);
            return this.release(ctx, share, { percentage });
        });
    }

    public transferControl(caller: AccountID, id: AllocationID, newOriginator: AccountID): Outcome<Allocation> {
        return this.transition('transferControl', caller, id, ({ allocation, custodian }) => {
            if (!validAccount(newOriginator) ||
                newOriginator === allocation.beneficiary ||
                newOriginator === allocation.originator ||
                newOriginator === custodian) {
                return reject(ErrorCode.INVALID_PARTY, `Invalid new originator: ${newOriginator}`);
            }
            return success<Effect>({
                update: draft => { draft.originator = newOriginator; },
                fields: { previousOriginator: allocation.originator, newOriginator }
            });
        });
    }

    public extendDeadline(caller: AccountID, id: AllocationID, blocks: number): Outcome<Allocation> {
        return this.transition('extendDeadline', caller, id, ({ allocation }) => {
            if (!integerInRange(blocks, 1, Number.MAX_SAFE_INTEGER - allocation.terminationBlock)) {
                return reject(ErrorCode.INVALID_QUANTITY, `Extension must be a positive number of blocks, got ${blocks}`);
            }
            const terminationBlock = allocation.terminationBlock + blocks;
            return success<Effect>({
                update: draft => { draft.terminationBlock = terminationBlock; },
                fields: { blocks, terminationBlock }
            });
        });
    }

    // --- Audit-only (validated, recorded, not persisted) ---

    public verifyTwoFactor(caller: AccountID, id: AllocationID, payload: SignedPayload): Outcome<Allocation> {
        return this.transition('verifyTwoFactor', caller, id, ({ now }) => {
            const recent = RecencyGuard({ now, issuedAt: payload.issuedAt, window: this.config.recentWindow });
            if (!recent.ok) return recent;

            const signer = this.recover(payload.digest, payload.signature);
            if (!signer.ok) return signer;
            if (signer.value !== caller) {
                return reject(ErrorCode.VERIFICATION_FAILED, `Second factor signed by ${signer.value}, expected ${caller}`);
            }
            return success<Effect>({ fields: { issuedAt: payload.issuedAt, digest: hexOf(payload.digest) } });
        });
    }

    public registerMultisig(caller: AccountID, id: AllocationID, registration: MultisigRegistration): Outcome<Allocation> {
        return this.transition('registerMultisig', caller, id, ({ custodian }) => {
            const { signers, threshold } = registration;
            if (!integerInRange(signers.length, 2, this.config.maxSigners)) {
                return reject(ErrorCode.INVALID_QUANTITY, `Signer count must be in [2, ${this.config.maxSigners}], got ${signers.length}`);
            }
            for (const signer of signers) {
                if (!validAccount(signer) || signer === custodian) {
                    return reject(ErrorCode.INVALID_PARTY, `Invalid signer: ${signer}`);
                }
            }
            if (new Set(signers).size !== signers.length) {
                return reject(ErrorCode.INVALID_PARTY, 'Duplicate signer');
            }
            if (!integerInRange(threshold, 1, signers.length)) {
                return reject(ErrorCode.INVALID_QUANTITY, `Threshold must be in [1, ${signers.length}], got ${threshold}`);
            }
            return success<Effect>({ fields: { signers: [...signers], threshold } });
        });
    }

    /**
     * Each signature must recover to a distinct party of the allocation;
     * the number of distinct approvers must reach the configured quorum.
     */
    public approveMultisig(caller: AccountID, id: AllocationID, approval: MultisigApproval): Outcome<Allocation> {
        return this.transition('approveMultisig', caller, id, ({ allocation }) => {
            const parties = partiesOf(allocation, this.config.supervisor);
            const approvers: AccountID[] = [];
            for (const signature of approval.signatures) {
                const signer = this.recover(approval.digest, signature);
                if (!signer.ok) return signer;
                if (!parties.has(signer.value)) {
                    return reject(ErrorCode.VERIFICATION_FAILED, `Signer ${signer.value} is not a party to allocation ${allocation.id}`);
                }
                if (approvers.includes(signer.value)) {
                    return reject(ErrorCode.VERIFICATION_FAILED, `Duplicate approval from ${signer.value}`);
                }
                approvers.push(signer.value);
            }
            if (approvers.length < this.config.multisigQuorum) {
                return reject(
                    ErrorCode.VERIFICATION_FAILED,
                    `Quorum not reached: ${approvers.length} of ${this.config.multisigQuorum} approvals`
                );
            }
            return success<Effect>({ fields: { approvers, digest: hexOf(approval.digest) } });
        });
    }

    public addDocumentation(caller: AccountID, id: AllocationID, documentHash: string): Outcome<Allocation> {
        return this.transition('addDocumentation', caller, id, () => {
            if (!hexDigest(documentHash)) {
                return reject(ErrorCode.MALFORMED_INPUT, 'Document hash must be 32 bytes of hex');
            }
            return success<Effect>({ fields: { documentHash: documentHash.toLowerCase() } });
        });
    }

    /**
     * Relays an attestation the supervisor signed off-line.
     */
    public submitAttestation(caller: AccountID, id: AllocationID, payload: SignedPayload): Outcome<Allocation> {
        return this.transition('submitAttestation', caller, id, ({ now }) => {
            const recent = RecencyGuard({ now, issuedAt: payload.issuedAt, window: this.config.recentWindow });
            if (!recent.ok) return recent;

            const signer = this.recover(payload.digest, payload.signature);
            if (!signer.ok) return signer;
            if (signer.value !== this.config.supervisor) {
                return reject(ErrorCode.VERIFICATION_FAILED, `Attestation signed by ${signer.value}, not the supervisor`);
            }
            return success<Effect>({ fields: { issuedAt: payload.issuedAt, digest: hexOf(payload.digest), attestor: signer.value } });
        });
    }

    public configureRateLimit(caller: AccountID, id: AllocationID, limit: RateLimit): Outcome<Allocation> {
        return this.transition('configureRateLimit', caller, id, () => {
            if (!integerInRange(limit.maxOperations, 1, this.config.maxRateLimit)) {
                return reject(ErrorCode.INVALID_QUANTITY, `maxOperations must be in [1, ${this.config.maxRateLimit}]`);
            }
            if (!integerInRange(limit.windowBlocks, 1, this.config.maxRateWindow)) {
                return reject(ErrorCode.INVALID_QUANTITY, `windowBlocks must be in [1, ${this.config.maxRateWindow}]`);
            }
            return success<Effect>({ fields: { maxOperations: limit.maxOperations, windowBlocks: limit.windowBlocks } });
        });
    }

    public registerOversight(caller: AccountID, id: AllocationID, monitor: AccountID): Outcome<Allocation> {
        return this.transition('registerOversight', caller, id, ({ allocation, custodian }) => {
            if (!validAccount(monitor) ||
                monitor === custodian ||
                rolesOf(monitor, allocation, this.config.supervisor).length > 0) {
                return reject(ErrorCode.INVALID_PARTY, `Invalid monitor: ${monitor}`);
            }
            return success<Effect>({ fields: { monitor } });
        });
    }

    public setPriority(caller: AccountID, id: AllocationID, level: number): Outcome<Allocation> {
        return this.transition('setPriority', caller, id, () => {
            if (!integerInRange(level, 0, this.config.maxPriority)) {
                return reject(ErrorCode.INVALID_QUANTITY, `Priority must be in [0, ${this.config.maxPriority}], got ${level}`);
            }
            return success<Effect>({ fields: { level } });
        });
    }

    // --- Transition Engine ---

    /**
     * Guard order: identifier -> existence -> authorization -> status ->
     * deadline -> operation checks -> invariants -> ledger -> commit -> audit.
     */
    private transition(
        operation: TransitionOperation,
        caller: AccountID,
        id: AllocationID,
        plan: Planner = NO_EFFECT
    ): Outcome<Allocation> {
        const rule = TRANSITION_TABLE[operation];
        const now = this.clock.currentHeight();

        // 1-2. Identifier validity & existence
        const loaded = this.getAllocation(id);
        if (!loaded.ok) return this.rejected(operation, loaded);
        const current = loaded.value;

        // 3. Authorization
        const roles = rolesOf(caller, current, this.config.supervisor);
        let check: GuardResult = AuthorityGuard({ operation, caller, held: roles, allowed: rule.actors });
        if (!check.ok) return this.rejected(operation, check);

        // 4. Status membership
        check = StatusGuard({ operation, status: current.status, allowed: rule.from });
        if (!check.ok) return this.rejected(operation, check);

        // 5. Temporal validity
        check = WindowGuard({ window: rule.window, now, deadline: current.terminationBlock });
        if (!check.ok) return this.rejected(operation, check);

        // 6. Operation-specific checks
        const planned = plan({ allocation: current, caller, roles, now, custodian: this.custodian });
        if (!planned.ok) return this.rejected(operation, planned);
        const effect = planned.value;

        const next = deriveAllocation(current, draft => {
            if (rule.to !== null) draft.status = rule.to;
            effect.update?.(draft);
        });

        // 7. Record invariants
        check = checkInvariants({
            previous: current,
            next,
            custodian: this.custodian,
            maxIdentifier: this.allocator.lastIssued
        });
        if (!check.ok) return this.rejected(operation, check);

        // 8. Ledger movement
        const settled = this.settlement.execute(effect.movements ?? []);
        if (!settled.ok) return this.rejected(operation, settled);

        // 9. ATOMIC COMMIT
        if (next !== current) this.store.commit(current, next);

        // 10. Audit
        this.record({
            operation,
            allocationId: id,
            actor: caller,
            height: now,
            previousStatus: current.status,
            status: next.status,
            allocation: toView(next),
            movements: settled.value.map(m => ({ from: m.from, to: m.to, amount: m.amount.toString() })),
            fields: effect.fields ?? {}
        });

        return success(next);
    }

    /**
     * Emits after commit. The operation has already taken effect, so a failing
     * sink is reported and the committed result still returned.
     */
    private record(event: AuditEvent): void {
        try {
            this.audit.emit(event);
        } catch (e: unknown) {
            this.logger.error(`[Escrow] Audit emission failed for ${event.operation} on allocation ${event.allocationId}:`, e);
        }
    }

    private payout(recipient: 'originator' | 'beneficiary'): Planner {
        return ({ allocation, custodian }) => success<Effect>({
            movements: [{ from: custodian, to: allocation[recipient], amount: allocation.quantity }],
            update: draft => { draft.quantity = 0n; },
            fields: { paidTo: allocation[recipient], amount: allocation.quantity.toString() }
        });
    }

    private release({ allocation, custodian }: PlanContext, amount: Quantity, fields: Record<string, AuditValue>): Outcome<Effect> {
        if (!positiveQuantity(amount) || amount >= allocation.quantity) {
            return reject(
                ErrorCode.INVALID_QUANTITY,
                `Partial release must be in (0, ${allocation.quantity}), got ${amount}`
            );
        }
        return success<Effect>({
            movements: [{ from: custodian, to: allocation.beneficiary, amount }],
            update: draft => { draft.quantity = allocation.quantity - amount; },
            fields: { ...fields, amount: amount.toString() }
        });
    }

    private annotated(reason: string): Planner {
        return () => {
            if (reason.length > MAX_REASON_LENGTH) {
                return reject(ErrorCode.MALFORMED_INPUT, `Reason exceeds ${MAX_REASON_LENGTH} characters`);
            }
            return success<Effect>({ fields: { reason } });
        };
    }

    private recover(digest: Hex, signature: Hex): Outcome<AccountID> {
        const signer = this.verifier.recoverSigner(digest, signature);
        if (signer.ok) return signer;
        return reject(ErrorCode.VERIFICATION_FAILED, signer.violation, signer.details);
    }

    private rejected(operation: OperationName, rejection: Rejected): Rejected {
        // Instrument Pressure
        const pressure = (this.rejectionTracker.get(rejection.code) ?? 0) + 1;
        this.rejectionTracker.set(rejection.code, pressure);

        if (pressure > this.config.pressureThreshold) {
            this.logger.warn(`[Escrow] Pressure Alert: ${rejection.code} rejected ${pressure} times (last: ${operation})`);
        }
        return rejection;
    }

    public rejectionPressure(code: ErrorCode): number {
        return this.rejectionTracker.get(code) ?? 0;
    }
}
