// src/kernel-core/L3/Transition.ts
import { freeze, produce } from 'immer';
import type { Draft } from 'immer';
import { hash, canonicalize } from '../L0/Crypto.js';
import { ActionKinds } from '../L0/Ontology.js';
import type {
    ActionRecord, CallerProof, OrganizationId, TransitionHandle, TransitionRecord
} from '../L0/Ontology.js';
import { checkTransitionInvariants } from '../L0/Invariants.js';
import { enforce, StatusGuard, VersionGuard } from '../L0/Guards.js';
import type { IStateRepository } from '../L0/Ports.js';
import type { ISystemClock } from '../L0/Clock.js';
import { ActionFactory } from '../L2/ActionFactory.js';
import type { OrganizationStore } from '../L2/State.js';
import type { GovernanceModuleRegistry } from '../L4/Governance.js';
import type { AuditLog } from '../L5/Audit.js';
import type { ActionEngine } from './Actions.js';
import { ErrorCode, KernelError, isErrorCode } from '../Errors.js';

const TERMINAL_PHASES = new Set(['COMMITTED', 'ABORTED', 'REJECTED']);

/**
 * Moves an organization between governance modules without touching its data.
 *
 * begin:  the current governance approves a `governance.transition` action;
 *         approval stages the new config and takes the Active -> Migrating lock.
 * commit: one produce swaps binding and ref, bumps the version, appends the
 *         epoch and releases the lock.
 * abort:  releases the lock, or withdraws the pending approval.
 */
export class TransitionEngine {
    private transitions: Map<TransitionHandle, TransitionRecord> = new Map();

    constructor(
        private repository: IStateRepository,
        private store: OrganizationStore,
        private modules: GovernanceModuleRegistry,
        private actions: ActionEngine,
        private audit: AuditLog,
        private clock: ISystemClock
    ) {
        this.actions.registerEffect(ActionKinds.TRANSITION, {
            apply: action => this.stage(action),
            rejected: action => this.markRejected(action)
        }, { reserved: true });
    }

    /**
     * Loads persisted transitions; those whose approval ended while the
     * process was down are closed to match their action.
     */
    public hydrate(): void {
        this.transitions.clear();
        for (const t of this.repository.loadTransitions()) {
            const action = this.actions.find(t.transitionId);
            if (t.phase === 'AWAITING_APPROVAL' && (!action || action.status === 'REJECTED')) {
                this.write(produce(t, draft => {
                    draft.phase = 'REJECTED';
                    draft.reason = action?.reason ?? 'Approval record lost';
                    draft.completedAt = this.clock.now();
                }));
            } else {
                this.transitions.set(t.transitionId, freeze(t, true));
            }
        }
    }

    public async begin(orgId: OrganizationId, newConfig: unknown, proof: CallerProof): Promise<TransitionRecord> {
        const record = this.store.require(orgId);
        enforce(StatusGuard({ record, allowed: ['Active'] }));

        const config = this.modules.validate(newConfig);
        if (record.kind === 'PAO' && this.modules.delegates(config)) {
            throw new KernelError(ErrorCode.INVALID_CONFIG, `A PAO cannot bind ${config.kind}: it has no parent to defer to`);
        }

        const action = this.actions.open(orgId, ActionFactory.transitionRequest(config), proof, { internal: true });
        const transition = this.write({
            transitionId: action.actionId,
            orgId,
            config,
            configRef: this.modules.moduleRef(config),
            baseVersion: record.version,
            phase: 'AWAITING_APPROVAL',
            createdAt: this.clock.now()
        });

        await this.audit.append({
            type: 'TRANSITION_REQUESTED',
            subject: transition.transitionId,
            orgId,
            actor: proof.signer,
            detail: { from: record.governanceModuleRef, to: transition.configRef, baseVersion: record.version }
        }, 'PENDING', transition.createdAt);

        const resolved = await this.actions.process(action.actionId);
        if (resolved.status === 'REJECTED') {
            const code = resolved.code !== undefined && isErrorCode(resolved.code) ? resolved.code : ErrorCode.REJECTED;
            throw new KernelError(code, resolved.reason ?? 'Transition rejected by governance', { transitionId: transition.transitionId });
        }
        return this.require(transition.transitionId);
    }

    public async commit(handle: TransitionHandle): Promise<TransitionRecord> {
        const t = this.require(handle);
        if (t.phase !== 'STAGED') {
            throw new KernelError(ErrorCode.INVALID_STATE, `Transition ${handle} is ${t.phase}, not STAGED`);
        }

        const now = this.clock.now();
        const before = this.store.require(t.orgId);
        const after = this.store.update(t.orgId, draft => {
            draft.governance = t.config;
            draft.governanceModuleRef = t.configRef;
            draft.version += 1;
            draft.status = 'Active';
            draft.history.push({
                version: draft.version,
                governanceModuleRef: t.configRef,
                governance: t.config,
                activatedAt: now,
                transitionId: handle
            });
        }, { status: ['Migrating'], version: t.baseVersion }, (prev, next) => {
            const check = checkTransitionInvariants({ before: prev, after: next });
            if (!check.ok) {
                throw new KernelError(check.rejection.code, check.rejection.message, { invariantId: check.rejection.invariantId });
            }
        });

        const committed = this.patch(t, draft => {
            draft.phase = 'COMMITTED';
            draft.completedAt = now;
        });
        console.log(`[TransitionEngine] ${t.orgId} v${before.version} -> v${after.version}: ${before.governanceModuleRef} -> ${after.governanceModuleRef}`);

        await this.audit.append({
            type: 'TRANSITION_COMMITTED',
            subject: handle,
            orgId: t.orgId,
            detail: { from: before.governanceModuleRef, to: after.governanceModuleRef, version: after.version }
        }, 'SUCCESS', now);

        return committed;
    }

    public async abort(handle: TransitionHandle, reason: string): Promise<TransitionRecord> {
        const t = this.require(handle);
        if (TERMINAL_PHASES.has(t.phase)) {
            throw new KernelError(ErrorCode.INVALID_STATE, `Transition ${handle} is already ${t.phase}`);
        }

        const now = this.clock.now();
        if (t.phase === 'STAGED') {
            this.store.update(t.orgId, draft => { draft.status = 'Active'; }, { status: ['Migrating'], version: t.baseVersion });
        }
        const aborted = this.patch(t, draft => {
            draft.phase = 'ABORTED';
            draft.reason = reason;
            draft.completedAt = now;
        });
        if (t.phase === 'AWAITING_APPROVAL') {
            await this.actions.withdraw(handle, `Transition aborted: ${reason}`);
        }
        console.log(`[TransitionEngine] ${t.orgId} transition ${handle.slice(0, 12)} aborted: ${reason}`);

        await this.audit.append({
            type: 'TRANSITION_ABORTED',
            subject: handle,
            orgId: t.orgId,
            detail: { phase: t.phase, to: t.configRef }
        }, 'ABORTED', now, reason);

        return aborted;
    }

    public get(handle: TransitionHandle): TransitionRecord {
        return this.require(handle);
    }

    public list(orgId?: OrganizationId): TransitionRecord[] {
        const all = [...this.transitions.values()];
        return orgId === undefined ? all : all.filter(t => t.orgId === orgId);
    }

    /**
     * Aborts staged transitions that have held their lock longer than `timeoutMs`.
     */
    public async expireStaged(timeoutMs: number): Promise<TransitionHandle[]> {
        const now = this.clock.now();
        const expired = this.list().filter(t => t.phase === 'STAGED' && t.stagedAt !== undefined && now - t.stagedAt > timeoutMs);
        const handles: TransitionHandle[] = [];
        for (const t of expired) {
            await this.abort(t.transitionId, `Staging timeout of ${timeoutMs}ms elapsed`);
            handles.push(t.transitionId);
        }
        return handles;
    }

    private async stage(action: ActionRecord): Promise<void> {
        const t = this.require(action.actionId);
        if (t.phase !== 'AWAITING_APPROVAL') {
            throw new KernelError(ErrorCode.INVALID_STATE, `Transition ${t.transitionId} is ${t.phase}`);
        }
        // The approved payload must still describe the staged config
        if (action.payload['configHash'] !== hash(canonicalize(t.config))) {
            throw new KernelError(ErrorCode.INTEGRITY_BREACH, `Transition ${t.transitionId} config does not match its approval`);
        }

        const record = this.store.require(t.orgId);
        enforce(VersionGuard({ record, expected: t.baseVersion }));
        this.store.compareAndSetStatus(t.orgId, 'Active', 'Migrating');

        const now = this.clock.now();
        this.patch(t, draft => {
            draft.phase = 'STAGED';
            draft.stagedAt = now;
        });
        console.log(`[TransitionEngine] ${t.orgId} staged ${t.configRef} at v${t.baseVersion}`);

        await this.audit.append({
            type: 'TRANSITION_STAGED',
            subject: t.transitionId,
            orgId: t.orgId,
            detail: { to: t.configRef, baseVersion: t.baseVersion }
        }, 'SUCCESS', now);
    }

    private async markRejected(action: ActionRecord): Promise<void> {
        const t = this.transitions.get(action.actionId);
        if (!t || t.phase !== 'AWAITING_APPROVAL') return;
        this.patch(t, draft => {
            draft.phase = 'REJECTED';
            draft.reason = action.reason ?? 'Rejected by governance';
            draft.completedAt = this.clock.now();
        });
    }

    private require(handle: TransitionHandle): TransitionRecord {
        const t = this.transitions.get(handle);
        if (!t) throw new KernelError(ErrorCode.NOT_FOUND, `Transition ${handle} not found`);
        return t;
    }

    private patch(t: TransitionRecord, recipe: (draft: Draft<TransitionRecord>) => void): TransitionRecord {
        return this.write(produce(t, recipe));
    }

    private write(t: TransitionRecord): TransitionRecord {
        const frozen = freeze(t, true);
        this.repository.saveTransition(frozen);
        this.transitions.set(frozen.transitionId, frozen);
        return frozen;
    }
}
