import type { AccountID, AuditEvent, BlockHeight, Quantity } from '../kernel-core/L0/Ontology.js';
import type { Outcome } from '../kernel-core/Errors.js';
import type { Evidence } from '../kernel-core/L5/Audit.js';

export type TransferResult = { ok: true } | { ok: false; reason: string };

/**
 * Settlement Port: Ledger
 * Moves value between accounts. The registry's escrow sits in the custodian account.
 */
export interface Ledger {
    transfer(amount: Quantity, from: AccountID, to: AccountID): TransferResult;
    custodianAccount(): AccountID;
}

/**
 * Environment Port: Block Clock
 * Monotonically increasing, externally driven.
 */
export interface Clock {
    currentHeight(): BlockHeight;
}

export type Hex = Uint8Array | string;

/**
 * Cryptography Port: Signature Recovery
 * Resolves the account that produced `signature` over `digest`.
 */
export interface SignatureVerifier {
    recoverSigner(digest: Hex, signature: Hex): Outcome<AccountID>;
}

/**
 * Audit Port: Event Sink
 * Fire-and-forget; called once per successful operation, after commit.
 */
export interface AuditSink {
    emit(event: AuditEvent): void;
}

/**
 * Persistence Port: Event Store
 * Append-only log behind the audit chain.
 */
export interface IEventStore {
    append(evidence: Evidence): void;
    getHistory(): Evidence[];
    getLatest(): Evidence | null;
}
