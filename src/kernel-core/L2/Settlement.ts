import type { Movement } from '../L0/Ontology.js';
import { ErrorCode, reject, success } from '../Errors.js';
import type { Outcome } from '../Errors.js';
import type { Ledger } from '../../Platform/Ports.js';

export type KernelLogger = Pick<Console, 'warn' | 'error'>;

/**
 * Executes an operation's ledger movements as one unit.
 * Zero-amount legs are skipped. When a leg is rejected, the legs already
 * executed are reversed in reverse order before the failure is returned.
 */
export class Settlement {
    constructor(
        private ledger: Ledger,
        private logger: KernelLogger = console
    ) { }

    public execute(movements: readonly Movement[]): Outcome<Movement[]> {
        const executed: Movement[] = [];

        for (const leg of movements) {
            if (leg.amount === 0n) continue;

            const result = this.ledger.transfer(leg.amount, leg.from, leg.to);
            if (!result.ok) {
                this.logger.warn(`[Escrow] Movement rejected: ${leg.amount} ${leg.from} -> ${leg.to} (${result.reason})`);
                const compensated = this.compensate(executed);
                return reject(
                    ErrorCode.MOVEMENT_FAILED,
                    `Transfer of ${leg.amount} from ${leg.from} to ${leg.to} failed: ${result.reason}`,
                    { reason: result.reason, executedLegs: executed.length, compensated }
                );
            }
            executed.push(leg);
        }

        return success(executed);
    }

    private compensate(executed: readonly Movement[]): boolean {
        let intact = true;
        for (const leg of [...executed].reverse()) {
            const result = this.ledger.transfer(leg.amount, leg.to, leg.from);
            if (!result.ok) {
                intact = false;
                this.logger.error(`[Escrow] Compensation failed: ${leg.amount} ${leg.to} -> ${leg.from} (${result.reason}). Manual reconciliation required.`);
            }
        }
        return intact;
    }
}
