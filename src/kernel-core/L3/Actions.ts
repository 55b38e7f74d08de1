// src/kernel-core/L3/Actions.ts
import { freeze, produce } from 'immer';
import type { Draft } from 'immer';
import { ActionKinds } from '../L0/Ontology.js';
import type {
    ActionId, ActionKind, ActionRecord, ActionRequest, ActionStatus, Ballot, CallerProof,
    Cancellation, JsonObject, OrganizationId, OrganizationRecord, OrganizationStatus, Verdict
} from '../L0/Ontology.js';
import { enforce, ReplayGuard, SignatureGuard, StatusGuard } from '../L0/Guards.js';
import type { IStateRepository } from '../L0/Ports.js';
import type { ISystemClock } from '../L0/Clock.js';
import type { IdentityManager } from '../L1/Identity.js';
import { ActionFactory } from '../L2/ActionFactory.js';
import type { OrganizationStore } from '../L2/State.js';
import type { GovernanceModuleRegistry } from '../L4/Governance.js';
import type { AuditLog, EvidenceStatus } from '../L5/Audit.js';
import type { DependencyResolver } from './Dependency.js';
import { ErrorCode, KernelError, isKernelError } from '../Errors.js';

/**
 * What happens once an action of a given kind is approved.
 */
export interface ActionEffect {
    /** Rejects a malformed payload at submission. */
    validate?(payload: JsonObject): void;
    /** A KernelError thrown here turns the approval into a rejection. */
    apply(action: ActionRecord): Promise<void>;
    rejected?(action: ActionRecord): Promise<void>;
}

export interface EffectOptions {
    /** Reserved kinds cannot be submitted directly by callers. */
    reserved?: boolean;
}

export interface OpenOptions {
    internal?: boolean;
}

const AUDIT_STATUS: Record<'APPROVED' | 'REJECTED' | 'PENDING', EvidenceStatus> = {
    APPROVED: 'SUCCESS',
    REJECTED: 'REJECT',
    PENDING: 'PENDING'
};

/**
 * Action state machine:
 * SUBMITTED -> EVALUATING -> APPROVED | REJECTED | PENDING, and
 * PENDING -> EVALUATING -> APPROVED | REJECTED | PENDING on vote or finalize.
 * APPROVED and REJECTED are terminal.
 */
export class ActionEngine {
    private actions: Map<ActionId, ActionRecord> = new Map();
    private effects: Map<ActionKind, ActionEffect> = new Map();
    private reserved: Set<ActionKind> = new Set();

    constructor(
        private repository: IStateRepository,
        private store: OrganizationStore,
        private modules: GovernanceModuleRegistry,
        private identity: IdentityManager,
        private resolver: DependencyResolver,
        private audit: AuditLog,
        private clock: ISystemClock
    ) { }

    /**
     * Loads persisted actions. Anything caught mid-evaluation by a shutdown
     * is closed as rejected.
     */
    public hydrate(): void {
        this.actions.clear();
        for (const action of this.repository.loadActions()) {
            if (action.status === 'SUBMITTED' || action.status === 'EVALUATING') {
                this.write(produce(action, draft => {
                    draft.status = 'REJECTED';
                    draft.code = ErrorCode.INVALID_STATE;
                    draft.reason = 'Interrupted before resolution';
                    draft.resolvedAt = this.clock.now();
                }));
            } else {
                this.actions.set(action.actionId, freeze(action, true));
            }
        }
    }

    public registerEffect(kind: ActionKind, effect: ActionEffect, options: EffectOptions = {}): void {
        if (this.effects.has(kind)) {
            throw new Error(`ActionEngine: Effect for ${kind} already registered`);
        }
        this.effects.set(kind, effect);
        if (options.reserved) this.reserved.add(kind);
    }

    public async submit(orgId: OrganizationId, request: ActionRequest, proof: CallerProof): Promise<ActionId> {
        const action = this.open(orgId, request, proof);
        await this.process(action.actionId);
        return action.actionId;
    }

    /**
     * Validates and records a submission without evaluating it.
     */
    public open(orgId: OrganizationId, request: ActionRequest, proof: CallerProof, options: OpenOptions = {}): ActionRecord {
        if (request.kind.length === 0) {
            throw new KernelError(ErrorCode.INVALID_ACTION, 'Action kind must be non-empty');
        }
        if (this.reserved.has(request.kind) && !options.internal) {
            throw new KernelError(ErrorCode.INVALID_ACTION, `Action kind ${request.kind} is reserved`);
        }

        const record = this.store.require(orgId);
        enforce(StatusGuard({ record, allowed: this.allowedStatuses(request.kind) }));

        const message = ActionFactory.message(orgId, request, proof.nonce);
        const actionId = ActionFactory.actionId(orgId, request, proof.nonce);
        enforce(ReplayGuard({ actionId, seen: id => this.actions.has(id) }));
        enforce(SignatureGuard({ message, signer: proof.signer, signature: proof.signature, identity: this.identity }));

        this.effects.get(request.kind)?.validate?.(request.payload);

        return this.write({
            actionId,
            orgId,
            kind: request.kind,
            payload: request.payload,
            proposer: proof.signer,
            proof,
            status: 'SUBMITTED',
            path: [],
            ballots: {},
            submittedAt: this.clock.now()
        });
    }

    /**
     * First evaluation of an opened action.
     */
    public async process(actionId: ActionId): Promise<ActionRecord> {
        const action = this.require(actionId);
        if (action.status !== 'SUBMITTED') {
            throw new KernelError(ErrorCode.INVALID_STATE, `Action ${actionId} is ${action.status}`);
        }
        const evaluating = this.patch(action, draft => { draft.status = 'EVALUATING'; });

        await this.audit.append({
            type: 'ACTION_SUBMITTED',
            subject: actionId,
            orgId: action.orgId,
            actor: action.proposer,
            detail: { kind: action.kind, payload: action.payload }
        }, 'SUCCESS', this.clock.now());

        return this.evaluate(this.require(evaluating.actionId));
    }

    public get(actionId: ActionId): ActionRecord {
        return this.require(actionId);
    }

    public find(actionId: ActionId): ActionRecord | undefined {
        return this.actions.get(actionId);
    }

    public status(actionId: ActionId): ActionStatus {
        return this.require(actionId).status;
    }

    public list(orgId?: OrganizationId): ActionRecord[] {
        const all = [...this.actions.values()];
        return orgId === undefined ? all : all.filter(a => a.orgId === orgId);
    }

    public async vote(actionId: ActionId, ballot: Ballot): Promise<ActionRecord> {
        const action = this.requirePending(actionId);
        enforce(SignatureGuard({
            message: ActionFactory.ballotMessage(actionId, ballot.approve),
            signer: ballot.voter,
            signature: ballot.signature,
            identity: this.identity
        }));

        const level = action.evaluatedAt === undefined ? undefined : this.store.get(action.evaluatedAt);
        if (!level) {
            return this.settle(this.patch(action, draft => { draft.status = 'EVALUATING'; }), {
                outcome: 'REJECTED',
                code: ErrorCode.NOT_FOUND,
                reason: `Evaluating organization ${action.evaluatedAt ?? '(none)'} no longer exists`
            });
        }
        if (!this.modules.acceptsBallot(level.governance, ballot.voter)) {
            throw new KernelError(ErrorCode.NOT_ELIGIBLE, `Signer ${ballot.voter} cannot vote under ${level.governanceModuleRef}`);
        }

        this.patch(action, draft => { draft.ballots[ballot.voter] = ballot.approve; });
        await this.audit.append({
            type: 'BALLOT_CAST',
            subject: actionId,
            orgId: action.orgId,
            actor: ballot.voter,
            detail: { approve: ballot.approve, level: level.id }
        }, 'SUCCESS', this.clock.now());

        return this.reevaluate(this.require(actionId));
    }

    /**
     * Re-evaluates a pending action; resolved actions are returned as they are.
     */
    public async finalize(actionId: ActionId): Promise<ActionRecord> {
        const action = this.require(actionId);
        if (action.status !== 'PENDING') return action;
        return this.reevaluate(action);
    }

    public async cancel(actionId: ActionId, cancellation: Cancellation): Promise<ActionRecord> {
        const action = this.requirePending(actionId);
        enforce(SignatureGuard({
            message: ActionFactory.cancelMessage(actionId),
            signer: cancellation.signer,
            signature: cancellation.signature,
            identity: this.identity
        }));

        const level = action.evaluatedAt === undefined ? undefined : this.store.get(action.evaluatedAt);
        const allowed = level
            ? this.modules.canCancel(level.governance, action.proposer, cancellation.signer)
            : cancellation.signer === action.proposer;
        if (!allowed) {
            throw new KernelError(ErrorCode.NOT_ELIGIBLE, `Signer ${cancellation.signer} cannot cancel action ${actionId}`);
        }

        return this.settle(this.patch(action, draft => { draft.status = 'EVALUATING'; }), {
            outcome: 'REJECTED',
            code: ErrorCode.REJECTED,
            reason: `Cancelled by ${cancellation.signer}`
        });
    }

    /**
     * Closes a pending action on behalf of the kernel.
     */
    public async withdraw(actionId: ActionId, reason: string): Promise<ActionRecord> {
        const action = this.require(actionId);
        if (action.status !== 'PENDING') return action;
        return this.settle(this.patch(action, draft => { draft.status = 'EVALUATING'; }), {
            outcome: 'REJECTED',
            code: ErrorCode.REJECTED,
            reason
        });
    }

    private async reevaluate(action: ActionRecord): Promise<ActionRecord> {
        if (action.status !== 'PENDING') return action;

        // Rules in flux: wait for the transition to commit or abort
        const level = action.evaluatedAt === undefined ? undefined : this.store.get(action.evaluatedAt);
        const target = this.store.get(action.orgId);
        if (level?.status === 'Migrating' || target?.status === 'Migrating') return action;

        return this.evaluate(this.patch(action, draft => { draft.status = 'EVALUATING'; }));
    }

    private async evaluate(action: ActionRecord): Promise<ActionRecord> {
        const firstPass = action.evaluatedAt === undefined;
        const target = this.store.get(action.orgId);
        if (!target) {
            return this.settle(action, {
                outcome: 'REJECTED',
                code: ErrorCode.NOT_FOUND,
                reason: `Organization ${action.orgId} no longer exists`
            });
        }
        const guard = StatusGuard({ record: target, allowed: this.allowedStatuses(action.kind) });
        if (!guard.ok && (firstPass || target.status !== 'Migrating')) {
            return this.settle(action, { outcome: 'REJECTED', code: guard.code, reason: guard.violation });
        }

        const resolution = this.resolver.resolve(action.orgId);
        if (!resolution.ok) {
            const walked = this.patch(action, draft => { draft.path = resolution.path; });
            return this.settle(walked, { outcome: 'REJECTED', code: resolution.code, reason: resolution.reason });
        }
        const level = resolution.level;

        if (!firstPass && (level.id !== action.evaluatedAt || level.version !== action.evaluatedAtVersion)) {
            return this.settle(action, {
                outcome: 'REJECTED',
                code: ErrorCode.GOVERNANCE_CHANGED,
                reason: `Governance of ${level.id} changed since evaluation`
            });
        }

        const evaluated = firstPass
            ? this.patch(action, draft => {
                draft.path = resolution.path;
                draft.evaluatedAt = level.id;
                draft.evaluatedAtVersion = level.version;
            })
            : action;

        if (level.status === 'Migrating') {
            return this.settle(evaluated, { outcome: 'PENDING', reason: `Awaiting transition of ${level.id}` });
        }

        const verdict = this.modules.evaluate(level.governance, {
            actionId: evaluated.actionId,
            orgId: evaluated.orgId,
            level: level.id,
            kind: evaluated.kind,
            payload: evaluated.payload,
            proof: evaluated.proof,
            message: ActionFactory.message(evaluated.orgId, { kind: evaluated.kind, payload: evaluated.payload }, evaluated.proof.nonce),
            ballots: evaluated.ballots,
            openedAt: evaluated.submittedAt,
            now: this.clock.now(),
            identity: this.identity
        });

        return this.settle(evaluated, verdict, level);
    }

    private async settle(action: ActionRecord, verdict: Verdict, level?: OrganizationRecord): Promise<ActionRecord> {
        const effect = this.effects.get(action.kind);
        const outcome = verdict.outcome === 'APPROVED' && effect
            ? await this.applyEffect(effect, action)
            : verdict;

        const now = this.clock.now();
        const resolved = this.patch(this.require(action.actionId), draft => {
            draft.status = outcome.outcome;
            if (outcome.outcome === 'PENDING') {
                draft.reason = outcome.reason;
                return;
            }
            draft.resolvedAt = now;
            if (outcome.outcome === 'REJECTED') {
                draft.code = outcome.code ?? ErrorCode.REJECTED;
                draft.reason = outcome.reason;
            } else {
                delete draft.reason;
            }
        });

        if (resolved.status === 'REJECTED' && effect?.rejected) {
            await effect.rejected(resolved);
        }

        console.log(`[ActionEngine] ${resolved.kind} ${resolved.actionId.slice(0, 12)} on ${resolved.orgId}: ${resolved.status}${level && level.id !== resolved.orgId ? ` (decided at ${level.id})` : ''}`);

        await this.audit.append({
            type: 'ACTION_RESOLVED',
            subject: resolved.actionId,
            orgId: resolved.orgId,
            actor: resolved.proposer,
            detail: { kind: resolved.kind, path: resolved.path }
        }, AUDIT_STATUS[outcome.outcome], now, resolved.reason, resolved.code ? { code: resolved.code } : undefined);

        return resolved;
    }

    private async applyEffect(effect: ActionEffect, action: ActionRecord): Promise<Verdict> {
        try {
            await effect.apply(action);
            return { outcome: 'APPROVED' };
        } catch (e) {
            if (!isKernelError(e)) throw e;
            return { outcome: 'REJECTED', code: e.code, reason: e.reason };
        }
    }

    private allowedStatuses(kind: ActionKind): OrganizationStatus[] {
        return kind === ActionKinds.UNFREEZE ? ['Active', 'Frozen'] : ['Active'];
    }

    private require(actionId: ActionId): ActionRecord {
        const action = this.actions.get(actionId);
        if (!action) throw new KernelError(ErrorCode.NOT_FOUND, `Action ${actionId} not found`);
        return action;
    }

    private requirePending(actionId: ActionId): ActionRecord {
        const action = this.require(actionId);
        if (action.status !== 'PENDING') {
            throw new KernelError(ErrorCode.INVALID_STATE, `Action ${actionId} is ${action.status}, not PENDING`);
        }
        return action;
    }

    private patch(action: ActionRecord, recipe: (draft: Draft<ActionRecord>) => void): ActionRecord {
        return this.write(produce(action, recipe));
    }

    private write(action: ActionRecord): ActionRecord {
        const frozen = freeze(action, true);
        this.repository.saveAction(frozen);
        this.actions.set(frozen.actionId, frozen);
        return frozen;
    }
}
