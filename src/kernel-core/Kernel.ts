import { hash } from './L0/Crypto.js';
import { ActionKinds } from './L0/Ontology.js';
import type {
    ActionId, ActionRecord, ActionRequest, ActionStatus, Ballot, CallerProof, Cancellation,
    Invite, InviteId, OrganizationId, OrganizationKind, OrganizationRecord, Signer, SignerId,
    TransitionHandle, TransitionRecord
} from './L0/Ontology.js';
import { MemoryStateRepository } from './L0/Ports.js';
import type { IStateRepository } from './L0/Ports.js';
import { SystemClock } from './L0/Clock.js';
import type { ISystemClock } from './L0/Clock.js';
import { IdentityManager } from './L1/Identity.js';
import { InviteBook } from './L1/Invites.js';
import { OrganizationStore } from './L2/State.js';
import { Registry } from './L2/Registry.js';
import type { RegisterOptions } from './L2/Registry.js';
import { DependencyResolver, DEFAULT_MAX_DELEGATION_DEPTH } from './L3/Dependency.js';
import { ActionEngine } from './L3/Actions.js';
import { TransitionEngine } from './L3/Transition.js';
import { registerStandardEffects } from './L3/Effects.js';
import type { GovernanceModuleRegistry } from './L4/Governance.js';
import { createStandardModules } from './L4/modules/index.js';
import { AuditLog } from './L5/Audit.js';
import type { Evidence, IEventStore } from './L5/Audit.js';
import { ErrorCode, KernelError } from './Errors.js';

export type KernelLifecycle = 'CONSTITUTED' | 'ACTIVE' | 'HALTED';

export interface KernelOptions {
    repository?: IStateRepository;
    eventStore?: IEventStore;
    modules?: GovernanceModuleRegistry;
    clock?: ISystemClock;
    maxDelegationDepth?: number;
    /** Staged transitions older than this are aborted by expireStagedTransitions. */
    stagingTimeoutMs?: number;
}

export interface AuthorityResolution {
    orgId: OrganizationId;
    path: OrganizationId[];
    /** The organization whose governance decides, when the walk succeeds. */
    level?: OrganizationId;
    code?: ErrorCode;
    reason?: string;
}

/**
 * The governance kernel: one process-wide instance composed at bootstrap.
 * CONSTITUTED until `boot()` hydrates persisted state, ACTIVE until `halt()`.
 */
export class GovernanceKernel {
    private lifecycle: KernelLifecycle = 'CONSTITUTED';

    private readonly repository: IStateRepository;
    private readonly clock: ISystemClock;
    private readonly audit: AuditLog;
    private readonly modules: GovernanceModuleRegistry;
    private readonly identity: IdentityManager;
    private readonly invites: InviteBook;
    private readonly store: OrganizationStore;
    private readonly registry: Registry;
    private readonly resolver: DependencyResolver;
    private readonly actions: ActionEngine;
    private readonly transitions: TransitionEngine;
    private readonly stagingTimeoutMs: number | undefined;

    constructor(options: KernelOptions = {}) {
        this.repository = options.repository ?? new MemoryStateRepository();
        this.clock = options.clock ?? new SystemClock();
        this.audit = new AuditLog(options.eventStore);
        this.modules = options.modules ?? createStandardModules();
        this.stagingTimeoutMs = options.stagingTimeoutMs;

        this.identity = new IdentityManager(this.repository, this.clock);
        this.store = new OrganizationStore(this.repository);
        this.invites = new InviteBook(this.repository, this.identity, this.clock, id => this.store.has(id));
        this.registry = new Registry(this.store, this.modules, this.audit, this.clock);
        this.resolver = new DependencyResolver(this.store, this.modules, options.maxDelegationDepth ?? DEFAULT_MAX_DELEGATION_DEPTH);
        this.actions = new ActionEngine(
            this.repository, this.store, this.modules, this.identity, this.resolver, this.audit, this.clock
        );
        this.transitions = new TransitionEngine(
            this.repository, this.store, this.modules, this.actions, this.audit, this.clock
        );
        registerStandardEffects(this.actions, this.store, this.invites, this.audit, this.clock);
    }

    public get Lifecycle(): KernelLifecycle {
        return this.lifecycle;
    }

    public get Modules(): GovernanceModuleRegistry {
        return this.modules;
    }

    public async boot(): Promise<void> {
        if (this.lifecycle === 'ACTIVE') return;
        if (this.lifecycle === 'HALTED') {
            throw new KernelError(ErrorCode.KERNEL_NOT_ACTIVE, 'A halted kernel cannot be booted again');
        }

        this.identity.hydrate();
        this.store.hydrate();
        this.invites.hydrate();
        this.actions.hydrate();
        this.transitions.hydrate();
        await this.audit.hydrate();

        this.lifecycle = 'ACTIVE';
        console.log(`[Kernel] Active with ${this.store.list().length} organization(s), ${this.identity.list().length} signer(s)`);
    }

    public halt(): void {
        this.lifecycle = 'HALTED';
        console.log('[Kernel] Halted');
    }

    // --- Registry ---

    public async register(
        kind: OrganizationKind,
        parent: OrganizationId | undefined,
        config: unknown,
        options: RegisterOptions = {}
    ): Promise<OrganizationId> {
        this.assertActive();
        return this.registry.register(kind, parent, config, options);
    }

    public lookup(id: OrganizationId): OrganizationRecord {
        this.assertActive();
        return this.registry.lookup(id);
    }

    public list(): OrganizationRecord[] {
        this.assertActive();
        return this.registry.list();
    }

    public listDependents(id: OrganizationId): OrganizationId[] {
        this.assertActive();
        return this.registry.listDependents(id);
    }

    public async deregister(id: OrganizationId): Promise<void> {
        this.assertActive();
        await this.registry.deregister(id);
    }

    // --- Transitions ---

    public async beginTransition(id: OrganizationId, config: unknown, proof: CallerProof): Promise<TransitionHandle> {
        this.assertActive();
        const transition = await this.transitions.begin(id, config, proof);
        return transition.transitionId;
    }

    public async commitTransition(handle: TransitionHandle): Promise<TransitionRecord> {
        this.assertActive();
        return this.transitions.commit(handle);
    }

    public async abortTransition(handle: TransitionHandle, reason: string): Promise<TransitionRecord> {
        this.assertActive();
        return this.transitions.abort(handle, reason);
    }

    public getTransition(handle: TransitionHandle): TransitionRecord {
        this.assertActive();
        return this.transitions.get(handle);
    }

    public listTransitions(orgId?: OrganizationId): TransitionRecord[] {
        this.assertActive();
        return this.transitions.list(orgId);
    }

    public async expireStagedTransitions(): Promise<TransitionHandle[]> {
        this.assertActive();
        if (this.stagingTimeoutMs === undefined) return [];
        return this.transitions.expireStaged(this.stagingTimeoutMs);
    }

    // --- Actions ---

    public async submitAction(orgId: OrganizationId, request: ActionRequest, proof: CallerProof): Promise<ActionId> {
        this.assertActive();
        return this.actions.submit(orgId, request, proof);
    }

    public actionStatus(actionId: ActionId): ActionStatus {
        this.assertActive();
        return this.actions.status(actionId);
    }

    public getAction(actionId: ActionId): ActionRecord {
        this.assertActive();
        return this.actions.get(actionId);
    }

    public listActions(orgId?: OrganizationId): ActionRecord[] {
        this.assertActive();
        return this.actions.list(orgId);
    }

    public async vote(actionId: ActionId, ballot: Ballot): Promise<ActionRecord> {
        this.assertActive();
        return this.actions.vote(actionId, ballot);
    }

    public async finalize(actionId: ActionId): Promise<ActionRecord> {
        this.assertActive();
        return this.actions.finalize(actionId);
    }

    public async cancel(actionId: ActionId, cancellation: Cancellation): Promise<ActionRecord> {
        this.assertActive();
        return this.actions.cancel(actionId, cancellation);
    }

    public resolveAuthority(orgId: OrganizationId): AuthorityResolution {
        this.assertActive();
        const resolution = this.resolver.resolve(orgId);
        if (resolution.ok) return { orgId, path: resolution.path, level: resolution.level.id };
        return { orgId, path: resolution.path, code: resolution.code, reason: resolution.reason };
    }

    // --- Identity & Membership ---

    public async registerSigner(id: SignerId, publicKey: string): Promise<Signer> {
        this.assertActive();
        const signer = this.identity.register(id, publicKey);
        await this.audit.append({
            type: 'SIGNER_REGISTERED',
            subject: id,
            detail: { keyHash: hash(publicKey) }
        }, 'SUCCESS', signer.createdAt);
        return signer;
    }

    public async revokeSigner(id: SignerId): Promise<Signer> {
        this.assertActive();
        const signer = this.identity.revoke(id);
        await this.audit.append({ type: 'SIGNER_REVOKED', subject: id, detail: {} }, 'SUCCESS', this.clock.now());
        return signer;
    }

    public getSigner(id: SignerId): Signer | undefined {
        this.assertActive();
        return this.identity.get(id);
    }

    /**
     * Builds the governed action that issues an invite. The proof must sign
     * this exact request; the invite id is the resulting action id.
     */
    public static inviteRequest(expiresAt: number): ActionRequest {
        return { kind: ActionKinds.INVITE, payload: { expiresAt } };
    }

    public async issueInvite(orgId: OrganizationId, expiresAt: number, proof: CallerProof): Promise<InviteId> {
        this.assertActive();
        return this.actions.submit(orgId, GovernanceKernel.inviteRequest(expiresAt), proof);
    }

    public getInvite(inviteId: InviteId): Invite | undefined {
        this.assertActive();
        return this.invites.get(inviteId);
    }

    public async redeemInvite(inviteId: InviteId, signerId: SignerId, publicKey: string, signature: string): Promise<Signer> {
        this.assertActive();
        const signer = this.invites.redeem(inviteId, signerId, publicKey, signature);
        await this.audit.append({
            type: 'INVITE_REDEEMED',
            subject: inviteId,
            ...(signer.invitedBy !== undefined ? { orgId: signer.invitedBy } : {}),
            actor: signerId,
            detail: { keyHash: hash(publicKey) }
        }, 'SUCCESS', this.clock.now());
        return signer;
    }

    // --- Audit ---

    public async auditTrail(): Promise<Evidence[]> {
        this.assertActive();
        return this.audit.getHistory();
    }

    public async verifyAudit(): Promise<boolean> {
        this.assertActive();
        return this.audit.verifyChain();
    }

    private assertActive(): void {
        if (this.lifecycle !== 'ACTIVE') {
            throw new KernelError(ErrorCode.KERNEL_NOT_ACTIVE, `Kernel is ${this.lifecycle}`);
        }
    }
}
