import type { AccountID, Quantity } from '../../kernel-core/L0/Ontology.js';
import type { Ledger, TransferResult } from '../../Platform/Ports.js';

/**
 * Balance-tracking ledger held in process memory.
 * Accounts can be blocked to simulate a counterparty that refuses value.
 */
export class InMemoryLedger implements Ledger {
    private balances: Map<AccountID, Quantity> = new Map();
    private blocked: Set<AccountID> = new Set();

    constructor(private custodian: AccountID = 'custodian') { }

    public custodianAccount(): AccountID {
        return this.custodian;
    }

    public fund(account: AccountID, amount: Quantity): void {
        if (amount < 0n) throw new Error(`Cannot fund a negative amount: ${amount}`);
        this.balances.set(account, this.balanceOf(account) + amount);
    }

    public balanceOf(account: AccountID): Quantity {
        return this.balances.get(account) ?? 0n;
    }

    public block(account: AccountID): void {
        this.blocked.add(account);
    }

    public unblock(account: AccountID): void {
        this.blocked.delete(account);
    }

    public transfer(amount: Quantity, from: AccountID, to: AccountID): TransferResult {
        if (amount <= 0n) return { ok: false, reason: 'non-positive amount' };
        if (this.blocked.has(from) || this.blocked.has(to)) return { ok: false, reason: 'account blocked' };

        const available = this.balanceOf(from);
        if (available < amount) return { ok: false, reason: `insufficient balance (${available})` };

        this.balances.set(from, available - amount);
        this.balances.set(to, this.balanceOf(to) + amount);
        return { ok: true };
    }

    /** Sum over all accounts; constant across transfers. */
    public totalSupply(): Quantity {
        let total = 0n;
        for (const balance of this.balances.values()) total += balance;
        return total;
    }
}
