// src/kernel-core/L0/Guards.ts
import type { IdentityManager } from '../L1/Identity.js';
import type { Cosignature, OrganizationRecord, OrganizationStatus, SignerId } from './Ontology.js';
import { ErrorCode, KernelError } from '../Errors.js';

// --- Guard Pattern ---
export type GuardResult =
    | { ok: true }
    | { ok: false; code: ErrorCode; violation: string };

export type Guard<T> = (input: T) => GuardResult;

const OK: GuardResult = { ok: true };
const FAIL = (code: ErrorCode, violation: string): GuardResult => ({ ok: false, code, violation });

/**
 * Converts a failed guard into a thrown KernelError.
 */
export function enforce(result: GuardResult, metadata?: Record<string, unknown>): void {
    if (!result.ok) {
        throw new KernelError(result.code, result.violation, metadata);
    }
}

// --- Concrete Guards ---

// 1. Identity & Signature
export const SignatureGuard: Guard<{ message: string, signer: SignerId, signature: string, identity: IdentityManager }> = ({ message, signer, signature, identity }) => {
    const s = identity.get(signer);
    if (!s) return FAIL(ErrorCode.UNKNOWN_SIGNER, `Signer ${signer} not registered`);
    if (s.status === 'REVOKED') return FAIL(ErrorCode.REVOKED_SIGNER, `Signer ${signer} revoked`);
    if (!identity.verify(signer, message, signature)) return FAIL(ErrorCode.SIGNATURE_INVALID, 'Invalid Signature');
    return OK;
};

// 2. Record Status (the per-record mutex)
export const StatusGuard: Guard<{ record: OrganizationRecord, allowed: OrganizationStatus[] }> = ({ record, allowed }) => {
    if (allowed.includes(record.status)) return OK;
    if (record.status === 'Migrating') {
        return FAIL(ErrorCode.TRANSITION_IN_PROGRESS, `Organization ${record.id} is migrating`);
    }
    return FAIL(ErrorCode.INVALID_STATE, `Organization ${record.id} is ${record.status}`);
};

// 3. Optimistic Concurrency
export const VersionGuard: Guard<{ record: OrganizationRecord, expected: number }> = ({ record, expected }) => {
    if (record.version !== expected) {
        return FAIL(ErrorCode.VERSION_CONFLICT, `Organization ${record.id} at version ${record.version}, expected ${expected}`);
    }
    return OK;
};

// 4. Replay Guard
export const ReplayGuard: Guard<{ actionId: string, seen: (id: string) => boolean }> = ({ actionId, seen }) => {
    if (seen(actionId)) return FAIL(ErrorCode.REPLAY_DETECTED, `Replay Violation: Action ${actionId} already processed`);
    return OK;
};

// 5. MultiSig Guard (plurality requirement)
export interface MultiSigContext {
    message: string;
    requiredSignatures: number;
    providedSignatures: Cosignature[];
    authorizedSigners: SignerId[];
    identity: IdentityManager;
}

export const MultiSigGuard: Guard<MultiSigContext> = ({
    message,
    requiredSignatures,
    providedSignatures,
    authorizedSigners,
    identity
}) => {
    if (providedSignatures.length < requiredSignatures) {
        return FAIL(
            ErrorCode.REJECTED,
            `Requires ${requiredSignatures} signatures, got ${providedSignatures.length}`
        );
    }

    // Each authorized signer counts once
    const counted = new Set<SignerId>();
    for (const { signer, signature } of providedSignatures) {
        if (counted.has(signer) || !authorizedSigners.includes(signer)) continue;
        const s = identity.get(signer);
        if (s && s.status === 'ACTIVE' && identity.verify(signer, message, signature)) {
            counted.add(signer);
        }
    }

    if (counted.size < requiredSignatures) {
        return FAIL(
            ErrorCode.REJECTED,
            `Only ${counted.size} valid signatures from authorized signers`
        );
    }

    return OK;
};
