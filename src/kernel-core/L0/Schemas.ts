// src/kernel-core/L0/Schemas.ts
import { z } from 'zod';
import type {
    ActionRecord, Ballot, CallerProof, Cancellation, GovernanceConfig, Invite, JsonObject, JsonValue,
    OrganizationRecord, Signer, TransitionRecord
} from './Ontology.js';

/**
 * Runtime validators for values that cross a trust boundary: HTTP bodies and
 * rows read back from storage.
 */

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() => z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema)
]));

export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(JsonValueSchema);

export const GovernanceConfigSchema: z.ZodType<GovernanceConfig, z.ZodTypeDef, unknown> =
    z.object({ kind: z.string().min(1) }).passthrough();

export const CosignatureSchema = z.object({
    signer: z.string().min(1),
    signature: z.string().min(1)
});

export const CallerProofSchema: z.ZodType<CallerProof, z.ZodTypeDef, unknown> = z.object({
    signer: z.string().min(1),
    nonce: z.string().min(1),
    signature: z.string().min(1),
    cosignatures: z.array(CosignatureSchema).optional()
});

export const BallotSchema: z.ZodType<Ballot, z.ZodTypeDef, unknown> = z.object({
    voter: z.string().min(1),
    approve: z.boolean(),
    signature: z.string().min(1)
});

export const CancellationSchema: z.ZodType<Cancellation, z.ZodTypeDef, unknown> = z.object({
    signer: z.string().min(1),
    signature: z.string().min(1)
});

const EpochSchema = z.object({
    version: z.number().int().nonnegative(),
    governanceModuleRef: z.string(),
    governance: GovernanceConfigSchema,
    activatedAt: z.number(),
    transitionId: z.string().optional()
});

export const OrganizationRecordSchema: z.ZodType<OrganizationRecord, z.ZodTypeDef, unknown> = z.object({
    id: z.string().min(1),
    kind: z.enum(['PAO', 'SAO']),
    parent: z.string().optional(),
    governanceModuleRef: z.string(),
    governance: GovernanceConfigSchema,
    data: JsonObjectSchema,
    version: z.number().int().nonnegative(),
    status: z.enum(['Active', 'Migrating', 'Frozen']),
    history: z.array(EpochSchema),
    createdAt: z.number()
});

export const TransitionRecordSchema: z.ZodType<TransitionRecord, z.ZodTypeDef, unknown> = z.object({
    transitionId: z.string().min(1),
    orgId: z.string().min(1),
    config: GovernanceConfigSchema,
    configRef: z.string(),
    baseVersion: z.number().int().nonnegative(),
    phase: z.enum(['AWAITING_APPROVAL', 'STAGED', 'COMMITTED', 'ABORTED', 'REJECTED']),
    reason: z.string().optional(),
    createdAt: z.number(),
    stagedAt: z.number().optional(),
    completedAt: z.number().optional()
});

export const ActionRecordSchema: z.ZodType<ActionRecord, z.ZodTypeDef, unknown> = z.object({
    actionId: z.string().min(1),
    orgId: z.string().min(1),
    kind: z.string().min(1),
    payload: JsonObjectSchema,
    proposer: z.string().min(1),
    proof: CallerProofSchema,
    status: z.enum(['SUBMITTED', 'EVALUATING', 'APPROVED', 'REJECTED', 'PENDING']),
    path: z.array(z.string()),
    evaluatedAt: z.string().optional(),
    evaluatedAtVersion: z.number().int().nonnegative().optional(),
    ballots: z.record(z.boolean()),
    code: z.string().optional(),
    reason: z.string().optional(),
    submittedAt: z.number(),
    resolvedAt: z.number().optional()
});

export const SignerSchema: z.ZodType<Signer, z.ZodTypeDef, unknown> = z.object({
    id: z.string().min(1),
    publicKey: z.string().min(1),
    status: z.enum(['ACTIVE', 'REVOKED']),
    createdAt: z.number(),
    revokedAt: z.number().optional(),
    invitedBy: z.string().optional()
});

export const InviteSchema: z.ZodType<Invite, z.ZodTypeDef, unknown> = z.object({
    inviteId: z.string().min(1),
    orgId: z.string().min(1),
    expiresAt: z.number(),
    used: z.boolean(),
    redeemedBy: z.string().optional(),
    createdAt: z.number()
});
