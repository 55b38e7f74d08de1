// src/kernel-core/L0/Ports.ts
import type {
    ActionId, ActionRecord, Invite, InviteId, OrganizationId, OrganizationRecord,
    Signer, SignerId, TransitionHandle, TransitionRecord
} from './Ontology.js';

/**
 * Persistence Port: State Repository
 * One durable row per organization, transition, action, signer and invite.
 * Writes are synchronous so a compare-and-swap in memory and its persistence
 * happen in the same turn of the event loop.
 */
export interface IStateRepository {
    loadOrganizations(): OrganizationRecord[];
    saveOrganization(record: OrganizationRecord): void;
    deleteOrganization(id: OrganizationId): void;

    loadRetiredIds(): OrganizationId[];
    retireId(id: OrganizationId): void;

    loadTransitions(): TransitionRecord[];
    saveTransition(record: TransitionRecord): void;

    loadActions(): ActionRecord[];
    saveAction(record: ActionRecord): void;

    loadSigners(): Signer[];
    saveSigner(signer: Signer): void;

    loadInvites(): Invite[];
    saveInvite(invite: Invite): void;
}

/**
 * Volatile repository. Rows handed in are frozen by the kernel, so they are
 * kept by reference.
 */
export class MemoryStateRepository implements IStateRepository {
    private organizations = new Map<OrganizationId, OrganizationRecord>();
    private retired = new Set<OrganizationId>();
    private transitions = new Map<TransitionHandle, TransitionRecord>();
    private actions = new Map<ActionId, ActionRecord>();
    private signers = new Map<SignerId, Signer>();
    private invites = new Map<InviteId, Invite>();

    loadOrganizations(): OrganizationRecord[] { return [...this.organizations.values()]; }
    saveOrganization(record: OrganizationRecord): void { this.organizations.set(record.id, record); }
    deleteOrganization(id: OrganizationId): void { this.organizations.delete(id); }

    loadRetiredIds(): OrganizationId[] { return [...this.retired]; }
    retireId(id: OrganizationId): void { this.retired.add(id); }

    loadTransitions(): TransitionRecord[] { return [...this.transitions.values()]; }
    saveTransition(record: TransitionRecord): void { this.transitions.set(record.transitionId, record); }

    loadActions(): ActionRecord[] { return [...this.actions.values()]; }
    saveAction(record: ActionRecord): void { this.actions.set(record.actionId, record); }

    loadSigners(): Signer[] { return [...this.signers.values()]; }
    saveSigner(signer: Signer): void { this.signers.set(signer.id, signer); }

    loadInvites(): Invite[] { return [...this.invites.values()]; }
    saveInvite(invite: Invite): void { this.invites.set(invite.inviteId, invite); }
}
