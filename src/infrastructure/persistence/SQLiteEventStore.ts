import Database from 'better-sqlite3';
import { z } from 'zod';
import { AUDIT_EVENT_TYPES, EVIDENCE_STATUSES } from '../../kernel-core/L5/Audit.js';
import type { IEventStore, Evidence } from '../../kernel-core/L5/Audit.js';
import { JsonObjectSchema } from '../../kernel-core/L0/Schemas.js';

const AuditEventSchema = z.object({
    type: z.enum(AUDIT_EVENT_TYPES),
    subject: z.string(),
    orgId: z.string().optional(),
    actor: z.string().optional(),
    detail: JsonObjectSchema
});

const AuditRow = z.object({
    evidenceId: z.string(),
    previousEvidenceId: z.string(),
    event: z.string(),
    status: z.enum(EVIDENCE_STATUSES),
    timestamp: z.number(),
    reason: z.string().nullable(),
    metadata: z.string().nullable()
});

export class SQLiteEventStore implements IEventStore {
    private db: Database.Database;

    constructor(db: Database.Database | string = 'pao.db') {
        this.db = typeof db === 'string' ? new Database(db) : db;
        this.initialize();
    }

    private initialize() {
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS audit_log (
                sequence INTEGER PRIMARY KEY AUTOINCREMENT,
                evidenceId TEXT UNIQUE NOT NULL,
                previousEvidenceId TEXT NOT NULL,
                eventType TEXT NOT NULL,
                subject TEXT NOT NULL,
                event TEXT NOT NULL,
                status TEXT NOT NULL,
                timestamp INTEGER NOT NULL,
                reason TEXT,
                metadata TEXT
            )
        `);
    }

    async append(evidence: Evidence): Promise<void> {
        const stmt = this.db.prepare(`
            INSERT INTO audit_log (
                evidenceId, previousEvidenceId, eventType, subject, event, status, timestamp, reason, metadata
            ) VALUES (
                ?, ?, ?, ?, ?, ?, ?, ?, ?
            )
        `);

        stmt.run(
            evidence.evidenceId,
            evidence.previousEvidenceId,
            evidence.event.type,
            evidence.event.subject,
            JSON.stringify(evidence.event),
            evidence.status,
            evidence.timestamp,
            evidence.reason ?? null,
            evidence.metadata ? JSON.stringify(evidence.metadata) : null
        );
    }

    async getHistory(): Promise<Evidence[]> {
        const rows = this.db.prepare('SELECT * FROM audit_log ORDER BY sequence ASC').all();
        return rows.map(row => this.mapRowToEvidence(row));
    }

    async getLatest(): Promise<Evidence | null> {
        const row = this.db.prepare('SELECT * FROM audit_log ORDER BY sequence DESC LIMIT 1').get();
        if (row === undefined) return null;
        return this.mapRowToEvidence(row);
    }

    // Absent optionals stay absent so recomputed hashes match
    private mapRowToEvidence(raw: unknown): Evidence {
        const row = AuditRow.parse(raw);
        return {
            evidenceId: row.evidenceId,
            previousEvidenceId: row.previousEvidenceId,
            event: AuditEventSchema.parse(JSON.parse(row.event)),
            status: row.status,
            timestamp: row.timestamp,
            ...(row.reason !== null ? { reason: row.reason } : {}),
            ...(row.metadata !== null ? { metadata: JsonObjectSchema.parse(JSON.parse(row.metadata)) } : {})
        };
    }

    public close() {
        this.db.close();
    }
}
