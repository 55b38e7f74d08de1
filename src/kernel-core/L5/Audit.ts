// src/kernel-core/L5/Audit.ts
import { hash, canonicalize } from '../L0/Crypto.js';
import type { JsonObject, OrganizationId, SignerId } from '../L0/Ontology.js';

/**
 * Event Store Port
 */
export interface IEventStore {
    append(evidence: Evidence): Promise<void>;
    getHistory(): Promise<Evidence[]>;
    getLatest(): Promise<Evidence | null>;
}

export const AUDIT_EVENT_TYPES = [
    'ORGANIZATION_REGISTERED',
    'ORGANIZATION_DEREGISTERED',
    'TRANSITION_REQUESTED',
    'TRANSITION_STAGED',
    'TRANSITION_COMMITTED',
    'TRANSITION_ABORTED',
    'ACTION_SUBMITTED',
    'ACTION_RESOLVED',
    'BALLOT_CAST',
    'SIGNER_REGISTERED',
    'SIGNER_REVOKED',
    'INVITE_ISSUED',
    'INVITE_REDEEMED'
] as const;

export type AuditEventType = typeof AUDIT_EVENT_TYPES[number];

export interface AuditEvent {
    type: AuditEventType;
    subject: string; // Id of the organization, action, transition, signer or invite
    orgId?: OrganizationId;
    actor?: SignerId;
    detail: JsonObject;
}

export const EVIDENCE_STATUSES = ['SUCCESS', 'PENDING', 'REJECT', 'ABORTED'] as const;

export type EvidenceStatus = typeof EVIDENCE_STATUSES[number];

// --- Evidence (the institutional truth substrate) ---
export interface Evidence {
    evidenceId: string; // The identifying hash
    previousEvidenceId: string; // Chain linkage
    event: AuditEvent;
    status: EvidenceStatus;
    reason?: string;
    metadata?: JsonObject; // Structured diagnostics, e.g. rejection codes
    timestamp: number;
}

export const GENESIS_HASH = '0000000000000000000000000000000000000000000000000000000000000000';

export class AuditLog {
    private localChain: Evidence[] = [];
    private tip: string = GENESIS_HASH;

    constructor(private store?: IEventStore) { }

    /**
     * Resumes the chain from the persisted tip.
     */
    public async hydrate(): Promise<void> {
        const latest = this.store ? await this.store.getLatest() : null;
        this.tip = latest ? latest.evidenceId : GENESIS_HASH;
    }

    public async append(
        event: AuditEvent,
        status: EvidenceStatus,
        timestamp: number,
        reason?: string,
        metadata?: JsonObject
    ): Promise<Evidence> {
        // Link synchronously so interleaved appends never fork the chain
        const previousHash = this.tip;
        const entryHash = this.calculateHash(previousHash, event, status, timestamp, reason, metadata);
        this.tip = entryHash;

        const evidence: Evidence = {
            evidenceId: entryHash,
            previousEvidenceId: previousHash,
            event,
            status,
            timestamp,
            ...(reason ? { reason } : {}),
            ...(metadata ? { metadata } : {})
        };

        // Immutability Law
        Object.freeze(evidence);

        if (!this.store) {
            this.localChain.push(evidence);
            return evidence;
        }
        try {
            await this.store.append(evidence);
        } catch (e) {
            // Unlink the unpersisted entry unless a later append already chained onto it
            if (this.tip === entryHash) this.tip = previousHash;
            throw e;
        }
        return evidence;
    }

    public async getHistory(): Promise<Evidence[]> {
        if (this.store) {
            return await this.store.getHistory();
        }
        return [...this.localChain];
    }

    // Historical Legitimacy
    public async verifyChain(): Promise<boolean> {
        const history = await this.getHistory();
        let prev = GENESIS_HASH;

        for (const entry of history) {
            if (entry.previousEvidenceId !== prev) return false;

            const h = this.calculateHash(prev, entry.event, entry.status, entry.timestamp, entry.reason, entry.metadata);
            if (h !== entry.evidenceId) return false;

            prev = entry.evidenceId;
        }
        return true;
    }

    public getTip(): string {
        return this.tip;
    }

    private calculateHash(prevHash: string, event: AuditEvent, status: string, timestamp: number, reason?: string, metadata?: JsonObject): string {
        // [PreviousHash, EventHash, Status, Timestamp, ReasonHash, MetadataHash]
        const reasonHash = reason ? hash(reason) : hash('');
        const metaHash = metadata ? hash(canonicalize(metadata)) : hash('{}');

        const canonical: [string, string, string, number, string, string] = [
            prevHash,
            hash(canonicalize(event)),
            status,
            timestamp,
            reasonHash,
            metaHash
        ];

        return hash(canonicalize(canonical));
    }
}
