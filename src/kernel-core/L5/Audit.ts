// src/kernel-core/L5/Audit.ts
import { hash, canonicalize, GENESIS_HASH } from '../L0/Crypto.js';
import type { AuditEvent } from '../L0/Ontology.js';
import type { AuditSink, IEventStore } from '../../Platform/Ports.js';

// --- Evidence (the audit trail's unit of truth) ---
export interface Evidence {
    sequence: number;
    evidenceId: string; // The identifying hash
    previousEvidenceId: string; // Chain linkage
    event: AuditEvent;
}

export class AuditLog implements AuditSink {
    private localChain: Evidence[] = [];

    constructor(private store?: IEventStore) { }

    public emit(event: AuditEvent): void {
        this.append(event);
    }

    public append(event: AuditEvent): Evidence {
        const latest = this.getTip();
        const previousHash = latest ? latest.evidenceId : GENESIS_HASH;
        const sequence = latest ? latest.sequence + 1 : 1;

        const evidence: Evidence = {
            sequence,
            evidenceId: this.calculateHash(previousHash, sequence, event),
            previousEvidenceId: previousHash,
            event
        };

        // Immutability
        Object.freeze(evidence);

        if (this.store) {
            this.store.append(evidence);
        }

        this.localChain.push(evidence);
        return evidence;
    }

    public getHistory(): Evidence[] {
        if (this.store) {
            return this.store.getHistory();
        }
        return [...this.localChain];
    }

    public verifyChain(): boolean {
        let prev = GENESIS_HASH;
        let expectedSequence = 1;

        for (const entry of this.getHistory()) {
            // 1. Linkage
            if (entry.previousEvidenceId !== prev) return false;
            if (entry.sequence !== expectedSequence) return false;

            // 2. Content
            if (this.calculateHash(prev, entry.sequence, entry.event) !== entry.evidenceId) return false;

            prev = entry.evidenceId;
            expectedSequence++;
        }
        return true;
    }

    public getTip(): Evidence | null {
        const local = this.localChain[this.localChain.length - 1];
        if (local) return local;
        return this.store ? this.store.getLatest() : null;
    }

    private calculateHash(prevHash: string, sequence: number, event: AuditEvent): string {
        // [PreviousHash, Sequence, EventHash]
        const canonical: [string, number, string] = [prevHash, sequence, hash(canonicalize(event))];
        return hash(canonicalize(canonical));
    }
}
