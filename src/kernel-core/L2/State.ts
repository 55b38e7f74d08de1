import { freeze, produce } from 'immer';
import type { Draft } from 'immer';
import type { JsonObject, OrganizationId, OrganizationRecord, OrganizationStatus } from '../L0/Ontology.js';
import { MemoryStateRepository } from '../L0/Ports.js';
import type { IStateRepository } from '../L0/Ports.js';
import { enforce, StatusGuard, VersionGuard } from '../L0/Guards.js';
import { ErrorCode, KernelError } from '../Errors.js';

export interface UpdateExpectation {
    status?: OrganizationStatus[];
    version?: number;
}

/**
 * Arena of organization records indexed by id.
 *
 * Records are frozen; every write produces a new record through immer and is
 * persisted before the arena points at it. Expectations are checked and the
 * write applied in one synchronous step, which is what makes `status` usable
 * as a per-record compare-and-swap mutex.
 */
export class OrganizationStore {
    private records: Map<OrganizationId, OrganizationRecord> = new Map();
    private children: Map<OrganizationId, Set<OrganizationId>> = new Map();
    private retired: Set<OrganizationId> = new Set();

    constructor(private repository: IStateRepository = new MemoryStateRepository()) { }

    public hydrate(): void {
        this.records.clear();
        this.children.clear();
        this.retired = new Set(this.repository.loadRetiredIds());
        for (const record of this.repository.loadOrganizations()) {
            this.records.set(record.id, freeze(record, true));
        }
        for (const record of this.records.values()) {
            if (record.parent !== undefined) this.link(record.parent, record.id);
        }
    }

    public has(id: OrganizationId): boolean {
        return this.records.has(id);
    }

    /**
     * True when the id is live or was ever retired; such ids are never issued again.
     */
    public isTaken(id: OrganizationId): boolean {
        return this.records.has(id) || this.retired.has(id);
    }

    public get(id: OrganizationId): OrganizationRecord | undefined {
        return this.records.get(id);
    }

    public require(id: OrganizationId): OrganizationRecord {
        const record = this.records.get(id);
        if (!record) throw new KernelError(ErrorCode.NOT_FOUND, `Organization ${id} not found`);
        return record;
    }

    public list(): OrganizationRecord[] {
        return [...this.records.values()];
    }

    public childrenOf(id: OrganizationId): OrganizationId[] {
        return [...(this.children.get(id) ?? [])];
    }

    public insert(record: OrganizationRecord): OrganizationRecord {
        if (this.isTaken(record.id)) {
            throw new KernelError(ErrorCode.DUPLICATE_ID, `Organization id ${record.id} is already taken`);
        }
        const frozen = freeze(record, true);
        this.repository.saveOrganization(frozen);
        this.records.set(frozen.id, frozen);
        if (frozen.parent !== undefined) this.link(frozen.parent, frozen.id);
        return frozen;
    }

    /**
     * Checks the expectation, applies the recipe, validates and persists.
     * Nothing is written if any step throws.
     */
    public update(
        id: OrganizationId,
        recipe: (draft: Draft<OrganizationRecord>) => void,
        expect: UpdateExpectation = {},
        validate?: (before: OrganizationRecord, after: OrganizationRecord) => void
    ): OrganizationRecord {
        const current = this.expecting(id, expect);
        const next = produce(current, recipe);
        if (next === current) return current;
        if (next.id !== current.id) {
            throw new KernelError(ErrorCode.INTEGRITY_BREACH, `Organization ${id} cannot change its id`);
        }
        if (validate) validate(current, next);

        this.repository.saveOrganization(next);
        this.records.set(id, next);
        return next;
    }

    /**
     * Swaps the data payload for a new one, leaving every other field as it is.
     */
    public replaceData(id: OrganizationId, data: JsonObject, expect: UpdateExpectation = {}): OrganizationRecord {
        const current = this.expecting(id, expect);
        const next: OrganizationRecord = freeze({ ...current, data }, true);
        this.repository.saveOrganization(next);
        this.records.set(id, next);
        return next;
    }

    public compareAndSetStatus(id: OrganizationId, from: OrganizationStatus, to: OrganizationStatus): OrganizationRecord {
        return this.update(id, draft => { draft.status = to; }, { status: [from] });
    }

    /**
     * Physically removes a record and retires its id.
     */
    public remove(id: OrganizationId): OrganizationRecord {
        const record = this.require(id);
        if (this.childrenOf(id).length > 0) {
            throw new KernelError(ErrorCode.HAS_DEPENDENTS, `Organization ${id} still has dependents`);
        }
        this.repository.deleteOrganization(id);
        this.repository.retireId(id);
        this.records.delete(id);
        this.retired.add(id);
        this.children.delete(id);
        if (record.parent !== undefined) this.children.get(record.parent)?.delete(id);
        return record;
    }

    private expecting(id: OrganizationId, expect: UpdateExpectation): OrganizationRecord {
        const current = this.require(id);
        if (expect.status) enforce(StatusGuard({ record: current, allowed: expect.status }));
        if (expect.version !== undefined) enforce(VersionGuard({ record: current, expected: expect.version }));
        return current;
    }

    private link(parent: OrganizationId, child: OrganizationId): void {
        let set = this.children.get(parent);
        if (!set) {
            set = new Set();
            this.children.set(parent, set);
        }
        set.add(child);
    }
}
