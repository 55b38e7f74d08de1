// src/kernel-core/L0/Invariants.ts
import type { OrganizationRecord } from './Ontology.js';
import { canonicalize } from './Crypto.js';
import { ErrorCode } from '../Errors.js';

export interface Invariant<C> {
    id: string;
    boundary: string; // The named boundary (e.g. "Identity Integrity")
    description: string;
    permits: string; // "What would make this permissible?"
    predicate: (context: C) => boolean;
    violation: ErrorCode;
}

export interface TransitionContext {
    before: OrganizationRecord;
    after: OrganizationRecord;
}

export interface Rejection {
    code: ErrorCode;
    invariantId: string;
    boundary: string;
    permissible: string;
    message: string;
}

// --- I. Record Structure ---

export const INV_REC_01: Invariant<OrganizationRecord> = {
    id: 'INV-REC-01',
    boundary: 'Dependency Forest',
    description: 'An SAO has a parent and a PAO has none',
    permits: 'Register SAOs under an existing parent and PAOs without one.',
    predicate: (record) => (record.kind === 'SAO') === (record.parent !== undefined),
    violation: ErrorCode.INVALID_PARENT
};

export const INV_REC_02: Invariant<OrganizationRecord> = {
    id: 'INV-REC-02',
    boundary: 'Dependency Forest',
    description: 'An organization is never its own parent',
    permits: 'Parent must be a different, existing organization.',
    predicate: (record) => record.parent !== record.id,
    violation: ErrorCode.INVALID_PARENT
};

export const INV_REC_03: Invariant<OrganizationRecord> = {
    id: 'INV-REC-03',
    boundary: 'Governance History',
    description: 'The latest epoch describes the bound governance',
    permits: 'History must end with the active binding at the current version.',
    predicate: (record) => {
        const last = record.history[record.history.length - 1];
        return !!last
            && last.version === record.version
            && last.governanceModuleRef === record.governanceModuleRef;
    },
    violation: ErrorCode.INTEGRITY_BREACH
};

// --- II. Transition Law ---

export const INV_TRN_01: Invariant<TransitionContext> = {
    id: 'INV-TRN-01',
    boundary: 'Identity Integrity',
    description: 'Identity fields are immutable',
    permits: 'A transition may only change governance, version, status and history.',
    predicate: ({ before, after }) =>
        before.id === after.id
        && before.kind === after.kind
        && before.parent === after.parent
        && before.createdAt === after.createdAt,
    violation: ErrorCode.INTEGRITY_BREACH
};

export const INV_TRN_02: Invariant<TransitionContext> = {
    id: 'INV-TRN-02',
    boundary: 'Data Preservation',
    description: 'Organization data survives the transition untouched',
    permits: 'Data may only be written by approved data actions.',
    predicate: ({ before, after }) => canonicalize(before.data) === canonicalize(after.data),
    violation: ErrorCode.INTEGRITY_BREACH
};

export const INV_TRN_03: Invariant<TransitionContext> = {
    id: 'INV-TRN-03',
    boundary: 'Version Monotonicity',
    description: 'Version advances by exactly one',
    permits: 'Commit increments the version once.',
    predicate: ({ before, after }) => after.version === before.version + 1,
    violation: ErrorCode.VERSION_CONFLICT
};

export const INV_TRN_04: Invariant<TransitionContext> = {
    id: 'INV-TRN-04',
    boundary: 'Governance History',
    description: 'History grows by exactly one epoch',
    permits: 'Previous epochs are kept and one epoch is appended.',
    predicate: ({ before, after }) =>
        after.history.length === before.history.length + 1
        && before.history.every((epoch, i) => canonicalize(epoch) === canonicalize(after.history[i])),
    violation: ErrorCode.INTEGRITY_BREACH
};

export const INV_TRN_05: Invariant<TransitionContext> = {
    id: 'INV-TRN-05',
    boundary: 'Record Mutex',
    description: 'The record leaves the transition Active',
    permits: 'Commit releases the Migrating status.',
    predicate: ({ after }) => after.status === 'Active',
    violation: ErrorCode.INVALID_STATE
};

export const RECORD_INVARIANTS: Invariant<OrganizationRecord>[] = [INV_REC_01, INV_REC_02, INV_REC_03];

export const TRANSITION_INVARIANTS: Invariant<TransitionContext>[] = [
    INV_TRN_01, INV_TRN_02, INV_TRN_03, INV_TRN_04, INV_TRN_05,
    // The committed record must itself be well formed
    ...RECORD_INVARIANTS.map((inv): Invariant<TransitionContext> => ({
        ...inv,
        predicate: ({ after }) => inv.predicate(after)
    }))
];

export function checkInvariants<C>(invariants: Invariant<C>[], context: C): { ok: true } | { ok: false; rejection: Rejection } {
    for (const inv of invariants) {
        if (!inv.predicate(context)) {
            return {
                ok: false,
                rejection: {
                    code: inv.violation,
                    invariantId: inv.id,
                    boundary: inv.boundary,
                    permissible: inv.permits,
                    message: `Invariant Violation: ${inv.description}`
                }
            };
        }
    }
    return { ok: true };
}

export function checkRecordInvariants(record: OrganizationRecord) {
    return checkInvariants(RECORD_INVARIANTS, record);
}

export function checkTransitionInvariants(context: TransitionContext) {
    return checkInvariants(TRANSITION_INVARIANTS, context);
}
