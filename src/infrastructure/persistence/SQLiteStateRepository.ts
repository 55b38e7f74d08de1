import Database from 'better-sqlite3';
import { z } from 'zod';
import type { IStateRepository } from '../../kernel-core/L0/Ports.js';
import type {
    ActionRecord, Invite, OrganizationId, OrganizationRecord, Signer, TransitionRecord
} from '../../kernel-core/L0/Ontology.js';
import {
    ActionRecordSchema, InviteSchema, OrganizationRecordSchema, SignerSchema, TransitionRecordSchema
} from '../../kernel-core/L0/Schemas.js';
import { ErrorCode, KernelError } from '../../kernel-core/Errors.js';

const BodyRow = z.object({ body: z.string() });
const IdRow = z.object({ id: z.string() });

type Table = 'organizations' | 'transitions' | 'actions' | 'signers' | 'invites';

/**
 * State repository over better-sqlite3. Each row holds one record as a JSON
 * body; rows are validated on the way back in.
 */
export class SQLiteStateRepository implements IStateRepository {
    private db: Database.Database;

    constructor(db: Database.Database | string = 'pao.db') {
        this.db = typeof db === 'string' ? new Database(db) : db;
        this.initialize();
    }

    private initialize() {
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS organizations (id TEXT PRIMARY KEY, body TEXT NOT NULL);
            CREATE TABLE IF NOT EXISTS retired_ids (id TEXT PRIMARY KEY);
            CREATE TABLE IF NOT EXISTS transitions (id TEXT PRIMARY KEY, body TEXT NOT NULL);
            CREATE TABLE IF NOT EXISTS actions (id TEXT PRIMARY KEY, body TEXT NOT NULL);
            CREATE TABLE IF NOT EXISTS signers (id TEXT PRIMARY KEY, body TEXT NOT NULL);
            CREATE TABLE IF NOT EXISTS invites (id TEXT PRIMARY KEY, body TEXT NOT NULL);
        `);
    }

    loadOrganizations(): OrganizationRecord[] {
        return this.loadAll('organizations', OrganizationRecordSchema);
    }

    saveOrganization(record: OrganizationRecord): void {
        this.upsert('organizations', record.id, record);
    }

    deleteOrganization(id: OrganizationId): void {
        this.db.prepare('DELETE FROM organizations WHERE id = ?').run(id);
    }

    loadRetiredIds(): OrganizationId[] {
        return this.db.prepare('SELECT id FROM retired_ids').all().map(row => IdRow.parse(row).id);
    }

    retireId(id: OrganizationId): void {
        this.db.prepare('INSERT OR IGNORE INTO retired_ids (id) VALUES (?)').run(id);
    }

    loadTransitions(): TransitionRecord[] {
        return this.loadAll('transitions', TransitionRecordSchema);
    }

    saveTransition(record: TransitionRecord): void {
        this.upsert('transitions', record.transitionId, record);
    }

    loadActions(): ActionRecord[] {
        return this.loadAll('actions', ActionRecordSchema);
    }

    saveAction(record: ActionRecord): void {
        this.upsert('actions', record.actionId, record);
    }

    loadSigners(): Signer[] {
        return this.loadAll('signers', SignerSchema);
    }

    saveSigner(signer: Signer): void {
        this.upsert('signers', signer.id, signer);
    }

    loadInvites(): Invite[] {
        return this.loadAll('invites', InviteSchema);
    }

    saveInvite(invite: Invite): void {
        this.upsert('invites', invite.inviteId, invite);
    }

    public close() {
        this.db.close();
    }

    private upsert(table: Table, id: string, body: object): void {
        this.db
            .prepare(`INSERT INTO ${table} (id, body) VALUES (?, ?) ON CONFLICT(id) DO UPDATE SET body = excluded.body`)
            .run(id, JSON.stringify(body));
    }

    private loadAll<T>(table: Table, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
        const rows = this.db.prepare(`SELECT body FROM ${table} ORDER BY rowid ASC`).all();
        return rows.map(row => {
            const parsed = schema.safeParse(JSON.parse(BodyRow.parse(row).body));
            if (!parsed.success) {
                throw new KernelError(ErrorCode.INTEGRITY_BREACH, `Corrupt row in ${table}: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
            }
            return parsed.data;
        });
    }
}
