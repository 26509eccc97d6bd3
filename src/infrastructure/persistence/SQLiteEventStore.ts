import Database from 'better-sqlite3';
import { z } from 'zod';
import { ALLOCATION_STATUSES, OPERATION_NAMES } from '../../kernel-core/L0/Ontology.js';
import type { Evidence } from '../../kernel-core/L5/Audit.js';
import type { IEventStore } from '../../Platform/Ports.js';

const AllocationViewSchema = z.object({
    id: z.number().int(),
    originator: z.string(),
    beneficiary: z.string(),
    resourceId: z.number().int(),
    quantity: z.string().regex(/^\d+$/),
    status: z.enum(ALLOCATION_STATUSES),
    genesisBlock: z.number().int(),
    terminationBlock: z.number().int(),
});

const AuditEventSchema = z.object({
    operation: z.enum(OPERATION_NAMES),
    allocationId: z.number().int(),
    actor: z.string(),
    height: z.number().int(),
    previousStatus: z.enum(ALLOCATION_STATUSES).nullable(),
    status: z.enum(ALLOCATION_STATUSES),
    allocation: AllocationViewSchema,
    movements: z.array(z.object({ from: z.string(), to: z.string(), amount: z.string().regex(/^\d+$/) })),
    fields: z.record(z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(z.string())])),
});

const EvidenceRowSchema = z.object({
    sequence: z.number().int(),
    evidenceId: z.string(),
    previousEvidenceId: z.string(),
    event: z.string(),
});

export class SQLiteEventStore implements IEventStore {
    private db: Database.Database;

    constructor(dbPath: string = 'escrow.db') {
        this.db = new Database(dbPath);
        this.initialize();
    }

    private initialize(): void {
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS audit_log (
                sequence INTEGER PRIMARY KEY,
                evidenceId TEXT UNIQUE NOT NULL,
                previousEvidenceId TEXT NOT NULL,
                operation TEXT NOT NULL,
                allocationId INTEGER NOT NULL,
                actor TEXT NOT NULL,
                height INTEGER NOT NULL,
                event TEXT NOT NULL
            )
        `);
    }

    public append(evidence: Evidence): void {
        const stmt = this.db.prepare(`
            INSERT INTO audit_log (
                sequence, evidenceId, previousEvidenceId, operation, allocationId, actor, height, event
            ) VALUES (
                ?, ?, ?, ?, ?, ?, ?, ?
            )
        `);

        const { event } = evidence;
        stmt.run(
            evidence.sequence,
            evidence.evidenceId,
            evidence.previousEvidenceId,
            event.operation,
            event.allocationId,
            event.actor,
            event.height,
            JSON.stringify(event)
        );
    }

    public getHistory(): Evidence[] {
        const stmt = this.db.prepare('SELECT sequence, evidenceId, previousEvidenceId, event FROM audit_log ORDER BY sequence ASC');
        return stmt.all().map(row => this.mapRowToEvidence(row));
    }

    public getLatest(): Evidence | null {
        const stmt = this.db.prepare('SELECT sequence, evidenceId, previousEvidenceId, event FROM audit_log ORDER BY sequence DESC LIMIT 1');
        const row = stmt.get();

        if (row === undefined) return null;
        return this.mapRowToEvidence(row);
    }

    /** Events touching one allocation, oldest first. */
    public historyOf(allocationId: number): Evidence[] {
        const stmt = this.db.prepare('SELECT sequence, evidenceId, previousEvidenceId, event FROM audit_log WHERE allocationId = ? ORDER BY sequence ASC');
        return stmt.all(allocationId).map(row => this.mapRowToEvidence(row));
    }

    private mapRowToEvidence(row: unknown): Evidence {
        const parsed = EvidenceRowSchema.parse(row);
        return {
            sequence: parsed.sequence,
            evidenceId: parsed.evidenceId,
            previousEvidenceId: parsed.previousEvidenceId,
            event: AuditEventSchema.parse(JSON.parse(parsed.event))
        };
    }

    public close(): void {
        this.db.close();
    }
}
