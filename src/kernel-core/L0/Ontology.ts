/**
 * Governance Ontology
 * The primitive value types shared by every kernel layer.
 */

// --- 0. JSON ---
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

// --- 1. Identifiers ---
export type OrganizationId = string;
export type SignerId = string;
export type ActionId = string;
export type TransitionHandle = string;
export type InviteId = string;

// --- 2. Organization ---
export type OrganizationKind = 'PAO' | 'SAO';
export type OrganizationStatus = 'Active' | 'Migrating' | 'Frozen';

/**
 * The parameters of a bound governance strategy, tagged by module kind.
 * Each module narrows this through its own schema.
 */
export interface GovernanceConfig {
    kind: string;
}

export interface GovernanceEpoch {
    version: number;
    governanceModuleRef: string;
    governance: GovernanceConfig;
    activatedAt: number;
    transitionId?: TransitionHandle;
}

export interface OrganizationRecord {
    id: OrganizationId;
    kind: OrganizationKind;
    parent?: OrganizationId;
    governanceModuleRef: string;
    governance: GovernanceConfig;
    data: JsonObject;
    version: number;
    status: OrganizationStatus;
    history: GovernanceEpoch[];
    createdAt: number;
}

// --- 3. Proofs ---
export interface Cosignature {
    signer: SignerId;
    signature: string;
}

/**
 * Caller proof for an action: the signer's signature over the canonical
 * action message, plus optional cosignatures over the same message.
 */
export interface CallerProof {
    signer: SignerId;
    nonce: string;
    signature: string;
    cosignatures?: Cosignature[];
}

export interface Ballot {
    voter: SignerId;
    approve: boolean;
    signature: string;
}

export interface Cancellation {
    signer: SignerId;
    signature: string;
}

// --- 4. Actions ---
export type ActionKind = string;

export const ActionKinds = {
    TRANSITION: 'governance.transition',
    DATA_PUT: 'data.put',
    DATA_DELETE: 'data.delete',
    FREEZE: 'organization.freeze',
    UNFREEZE: 'organization.unfreeze',
    INVITE: 'membership.invite'
} as const;

export interface ActionRequest {
    kind: ActionKind;
    payload: JsonObject;
}

export type ActionStatus = 'SUBMITTED' | 'EVALUATING' | 'APPROVED' | 'REJECTED' | 'PENDING';

export interface ActionRecord {
    actionId: ActionId;
    orgId: OrganizationId;
    kind: ActionKind;
    payload: JsonObject;
    proposer: SignerId;
    proof: CallerProof;
    status: ActionStatus;
    path: OrganizationId[];
    evaluatedAt?: OrganizationId;
    evaluatedAtVersion?: number;
    ballots: Record<SignerId, boolean>;
    code?: string;
    reason?: string;
    submittedAt: number;
    resolvedAt?: number;
}

// --- 5. Transitions ---
export type TransitionPhase = 'AWAITING_APPROVAL' | 'STAGED' | 'COMMITTED' | 'ABORTED' | 'REJECTED';

export interface TransitionRecord {
    transitionId: TransitionHandle;
    orgId: OrganizationId;
    config: GovernanceConfig;
    configRef: string;
    baseVersion: number;
    phase: TransitionPhase;
    reason?: string;
    createdAt: number;
    stagedAt?: number;
    completedAt?: number;
}

// --- 6. Verdicts ---
export type Verdict =
    | { outcome: 'APPROVED' }
    | { outcome: 'REJECTED'; reason: string; code?: string }
    | { outcome: 'PENDING'; reason: string };

// --- 7. Signers & Invites ---
export type SignerStatus = 'ACTIVE' | 'REVOKED';

export interface Signer {
    id: SignerId;
    publicKey: string;
    status: SignerStatus;
    createdAt: number;
    revokedAt?: number;
    invitedBy?: OrganizationId;
}

export interface Invite {
    inviteId: InviteId;
    orgId: OrganizationId;
    expiresAt: number;
    used: boolean;
    redeemedBy?: SignerId;
    createdAt: number;
}
