// src/kernel-core/L2/Registry.ts
import { randomNonce } from '../L0/Crypto.js';
import type { JsonObject, OrganizationId, OrganizationKind, OrganizationRecord } from '../L0/Ontology.js';
import { checkRecordInvariants } from '../L0/Invariants.js';
import { enforce, StatusGuard } from '../L0/Guards.js';
import type { ISystemClock } from '../L0/Clock.js';
import type { GovernanceModuleRegistry } from '../L4/Governance.js';
import type { AuditLog } from '../L5/Audit.js';
import { OrganizationStore } from './State.js';
import { ErrorCode, KernelError } from '../Errors.js';

export interface RegisterOptions {
    /** Explicit id; generated when absent. */
    id?: OrganizationId;
    data?: JsonObject;
}

/**
 * Registry of primary (PAO) and secondary (SAO) organizations.
 *
 * Parents are fixed at registration and must already exist, so the parent
 * graph stays a forest without any cycle check.
 */
export class Registry {
    constructor(
        private store: OrganizationStore,
        private modules: GovernanceModuleRegistry,
        private audit: AuditLog,
        private clock: ISystemClock
    ) { }

    public async register(
        kind: OrganizationKind,
        parent: OrganizationId | undefined,
        config: unknown,
        options: RegisterOptions = {}
    ): Promise<OrganizationId> {
        if (kind === 'PAO' && parent !== undefined) {
            throw new KernelError(ErrorCode.INVALID_PARENT, 'A PAO cannot have a parent');
        }
        if (kind === 'SAO') {
            if (parent === undefined) {
                throw new KernelError(ErrorCode.INVALID_PARENT, 'An SAO requires a parent');
            }
            const p = this.store.get(parent);
            if (!p) throw new KernelError(ErrorCode.INVALID_PARENT, `Parent ${parent} does not exist`);
            if (p.status !== 'Active') {
                throw new KernelError(ErrorCode.INVALID_PARENT, `Parent ${parent} is ${p.status}`);
            }
        }

        const governance = this.modules.validate(config);
        if (kind === 'PAO' && this.modules.delegates(governance)) {
            throw new KernelError(ErrorCode.INVALID_CONFIG, `A PAO cannot bind ${governance.kind}: it has no parent to defer to`);
        }

        const id = this.allocateId(kind, options.id);
        const now = this.clock.now();
        const governanceModuleRef = this.modules.moduleRef(governance);

        const record: OrganizationRecord = {
            id,
            kind,
            ...(parent !== undefined ? { parent } : {}),
            governanceModuleRef,
            governance,
            data: options.data ?? {},
            version: 0,
            status: 'Active',
            history: [{ version: 0, governanceModuleRef, governance, activatedAt: now }],
            createdAt: now
        };

        const check = checkRecordInvariants(record);
        if (!check.ok) {
            throw new KernelError(check.rejection.code, check.rejection.message, { invariantId: check.rejection.invariantId });
        }

        this.store.insert(record);
        console.log(`[Registry] Registered ${kind} ${id} (${governanceModuleRef})`);

        await this.audit.append({
            type: 'ORGANIZATION_REGISTERED',
            subject: id,
            orgId: id,
            detail: { kind, parent: parent ?? null, governanceModuleRef }
        }, 'SUCCESS', now);

        return id;
    }

    public lookup(id: OrganizationId): OrganizationRecord {
        return this.store.require(id);
    }

    public list(): OrganizationRecord[] {
        return this.store.list();
    }

    /**
     * Transitive dependents in breadth-first order, excluding the organization itself.
     */
    public listDependents(id: OrganizationId): OrganizationId[] {
        this.store.require(id);
        const result: OrganizationId[] = [];
        const queue: OrganizationId[] = [id];
        for (let i = 0; i < queue.length; i++) {
            const current = queue[i];
            if (current === undefined) break;
            for (const child of this.store.childrenOf(current)) {
                result.push(child);
                queue.push(child);
            }
        }
        return result;
    }

    public async deregister(id: OrganizationId): Promise<void> {
        const record = this.store.require(id);
        enforce(StatusGuard({ record, allowed: ['Active'] }));
        const dependents = this.store.childrenOf(id);
        if (dependents.length > 0) {
            throw new KernelError(ErrorCode.HAS_DEPENDENTS, `Organization ${id} has ${dependents.length} direct dependent(s)`, { dependents });
        }

        this.store.remove(id);
        console.log(`[Registry] Deregistered ${record.kind} ${id}`);

        await this.audit.append({
            type: 'ORGANIZATION_DEREGISTERED',
            subject: id,
            orgId: id,
            detail: { kind: record.kind, version: record.version }
        }, 'SUCCESS', this.clock.now());
    }

    private allocateId(kind: OrganizationKind, requested?: OrganizationId): OrganizationId {
        if (requested !== undefined) {
            if (requested.length === 0) {
                throw new KernelError(ErrorCode.INVALID_ACTION, 'Organization id must be non-empty');
            }
            if (this.store.isTaken(requested)) {
                throw new KernelError(ErrorCode.DUPLICATE_ID, `Organization id ${requested} is already taken`);
            }
            return requested;
        }
        let id: OrganizationId;
        do {
            id = `${kind.toLowerCase()}_${randomNonce(8)}`;
        } while (this.store.isTaken(id));
        return id;
    }
}
