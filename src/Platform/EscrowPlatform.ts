import { z } from 'zod';
import { EscrowKernel } from '../kernel-core/Kernel.js';
import type { Allocation } from '../kernel-core/L0/Ontology.js';
import { ErrorCode, reject } from '../kernel-core/Errors.js';
import type { Outcome } from '../kernel-core/Errors.js';
import { AuditLog } from '../kernel-core/L5/Audit.js';
import { rebuildState } from '../kernel-core/L3/Projections.js';
import type { Discrepancy } from '../kernel-core/L3/Projections.js';
import type { KernelLogger } from '../kernel-core/L2/Settlement.js';
import type { EngineConfig } from './Config.js';
import type { Clock, IEventStore, Ledger, SignatureVerifier } from './Ports.js';
import { translateRejection } from './Errors.js';

// --- Command Schemas ---

const Amount = z.union([z.bigint(), z.number().int().nonnegative(), z.string()]).transform((value, ctx) => {
    if (typeof value === 'string' && !/^\d+$/.test(value)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'amount must be a decimal integer' });
        return z.NEVER;
    }
    return BigInt(value);
});
const HexInput = z.union([z.string(), z.instanceof(Uint8Array)]);
const SignedPayloadSchema = z.object({ digest: HexInput, signature: HexInput, issuedAt: z.number() });

const target = { caller: z.string(), id: z.number() };

export const CommandSchema = z.discriminatedUnion('operation', [
    z.object({
        operation: z.literal('create'),
        caller: z.string(),
        beneficiary: z.string(),
        resourceId: z.number(),
        quantity: Amount,
        duration: z.number(),
    }),
    z.object({
        operation: z.enum([
            'accept', 'finalize', 'revert', 'terminate', 'reclaimLapsed', 'pause', 'addSecurityHold',
            'unfreeze', 'closeInvestigation', 'releaseHold', 'resume', 'releaseTimelock', 'retrieve',
        ]),
        ...target,
    }),
    z.object({
        operation: z.enum(['emergencyFreeze', 'lockForInvestigation', 'challenge']),
        ...target,
        reason: z.string().optional(),
    }),
    z.object({ operation: z.literal('arbitrate'), ...target, originatorPercentage: z.number() }),
    z.object({ operation: z.literal('establishTimelock'), ...target, unlockHeight: z.number() }),
    z.object({ operation: z.enum(['topUp', 'partialRelease']), ...target, amount: Amount }),
    z.object({ operation: z.literal('releaseTranche'), ...target, percentage: z.number() }),
    z.object({ operation: z.literal('transferControl'), ...target, newOriginator: z.string() }),
    z.object({ operation: z.literal('extendDeadline'), ...target, blocks: z.number() }),
    z.object({ operation: z.enum(['verifyTwoFactor', 'submitAttestation']), ...target, payload: SignedPayloadSchema }),
    z.object({ operation: z.literal('registerMultisig'), ...target, signers: z.array(z.string()), threshold: z.number() }),
    z.object({ operation: z.literal('approveMultisig'), ...target, digest: HexInput, signatures: z.array(HexInput) }),
    z.object({ operation: z.literal('addDocumentation'), ...target, documentHash: z.string() }),
    z.object({ operation: z.literal('configureRateLimit'), ...target, maxOperations: z.number(), windowBlocks: z.number() }),
    z.object({ operation: z.literal('registerOversight'), ...target, monitor: z.string() }),
    z.object({ operation: z.literal('setPriority'), ...target, level: z.number() }),
]);

export type Command = z.input<typeof CommandSchema>;
type ParsedCommand = z.output<typeof CommandSchema>;

export interface PlatformOptions {
    config: EngineConfig;
    ledger: Ledger;
    clock: Clock;
    verifier: SignatureVerifier;
    eventStore?: IEventStore;
    logger?: KernelLogger;
}

/**
 * EscrowPlatform: the command interface in front of the kernel.
 * Accepts untyped input, validates its shape, and routes it to one operation.
 */
export class EscrowPlatform {
    public readonly kernel: EscrowKernel;
    public readonly audit: AuditLog;

    constructor(options: PlatformOptions) {
        this.audit = new AuditLog(options.eventStore);

        // Resume from a persisted trail
        const history = this.audit.getHistory();
        const restored = history.length > 0 ? rebuildState(history) : undefined;

        this.kernel = new EscrowKernel(options.config, {
            ledger: options.ledger,
            clock: options.clock,
            verifier: options.verifier,
            audit: this.audit,
            store: restored?.store,
            allocator: restored?.allocator,
            logger: options.logger,
        });
    }

    /**
     * Returns the kernel's Outcome; malformed commands are rejected without reaching it.
     */
    public dispatch(input: unknown): Outcome<Allocation> {
        const parsed = CommandSchema.safeParse(input);
        if (!parsed.success) {
            const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
            return reject(ErrorCode.MALFORMED_INPUT, `Malformed command: ${issues.join('; ')}`, { issues });
        }
        return this.route(parsed.data);
    }

    /**
     * Standard execution entry: returns the resulting record or throws a PlatformError.
     */
    public execute(input: unknown): Allocation {
        const outcome = this.dispatch(input);
        if (outcome.ok) return outcome.value;

        const { operation, caller } = describe(input);
        throw translateRejection(outcome, operation, caller);
    }

    public verifyAuditTrail(): boolean {
        return this.audit.verifyChain();
    }

    public reconcile(): Discrepancy[] {
        return this.kernel.reconcile(this.audit.getHistory());
    }

    private route(command: ParsedCommand): Outcome<Allocation> {
        const k = this.kernel;
        switch (command.operation) {
            case 'create':
                return k.create(command.caller, {
                    beneficiary: command.beneficiary,
                    resourceId: command.resourceId,
                    quantity: command.quantity,
                    duration: command.duration,
                });
            case 'accept':
            case 'finalize':
            case 'revert':
            case 'terminate':
            case 'reclaimLapsed':
            case 'pause':
            case 'addSecurityHold':
            case 'unfreeze':
            case 'closeInvestigation':
            case 'releaseHold':
            case 'resume':
            case 'releaseTimelock':
            case 'retrieve':
                return k[command.operation](command.caller, command.id);
            case 'emergencyFreeze':
            case 'lockForInvestigation':
            case 'challenge':
                return k[command.operation](command.caller, command.id, command.reason);
            case 'arbitrate':
                return k.arbitrate(command.caller, command.id, command.originatorPercentage);
            case 'establishTimelock':
                return k.establishTimelock(command.caller, command.id, command.unlockHeight);
            case 'topUp':
            case 'partialRelease':
                return k[command.operation](command.caller, command.id, command.amount);
            case 'releaseTranche':
                return k.releaseTranche(command.caller, command.id, command.percentage);
            case 'transferControl':
                return k.transferControl(command.caller, command.id, command.newOriginator);
            case 'extendDeadline':
                return k.extendDeadline(command.caller, command.id, command.blocks);
            case 'verifyTwoFactor':
            case 'submitAttestation':
                return k[command.operation](command.caller, command.id, command.payload);
            case 'registerMultisig':
                return k.registerMultisig(command.caller, command.id, { signers: command.signers, threshold: command.threshold });
            case 'approveMultisig':
                return k.approveMultisig(command.caller, command.id, { digest: command.digest, signatures: command.signatures });
            case 'addDocumentation':
                return k.addDocumentation(command.caller, command.id, command.documentHash);
            case 'configureRateLimit':
                return k.configureRateLimit(command.caller, command.id, {
                    maxOperations: command.maxOperations,
                    windowBlocks: command.windowBlocks,
                });
            case 'registerOversight':
                return k.registerOversight(command.caller, command.id, command.monitor);
            case 'setPriority':
                return k.setPriority(command.caller, command.id, command.level);
        }
    }
}

function describe(input: unknown): { operation: string, caller: string } {
    const Envelope = z.object({ operation: z.string().catch('unknown'), caller: z.string().catch('unknown') });
    const parsed = Envelope.safeParse(input);
    return parsed.success ? parsed.data : { operation: 'unknown', caller: 'unknown' };
}
