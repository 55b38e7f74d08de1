/**
 * Governance Kernel Error Taxonomy
 * Every code here is a recoverable, caller-visible outcome.
 */

export enum ErrorCode {
    // I. Registry
    NOT_FOUND = 'NOT_FOUND',
    INVALID_PARENT = 'INVALID_PARENT',
    DUPLICATE_ID = 'DUPLICATE_ID',
    HAS_DEPENDENTS = 'HAS_DEPENDENTS',

    // II. Record State
    INVALID_STATE = 'INVALID_STATE',
    TRANSITION_IN_PROGRESS = 'TRANSITION_IN_PROGRESS',
    VERSION_CONFLICT = 'VERSION_CONFLICT',

    // III. Governance
    REJECTED = 'REJECTED',
    DEPTH_EXCEEDED = 'DEPTH_EXCEEDED',
    GOVERNANCE_CHANGED = 'GOVERNANCE_CHANGED',
    NOT_ELIGIBLE = 'NOT_ELIGIBLE',
    INVALID_CONFIG = 'INVALID_CONFIG',
    UNKNOWN_MODULE = 'UNKNOWN_MODULE',
    INVALID_ACTION = 'INVALID_ACTION',

    // IV. Identity & Signature
    SIGNATURE_INVALID = 'SIGNATURE_INVALID',
    UNKNOWN_SIGNER = 'UNKNOWN_SIGNER',
    REVOKED_SIGNER = 'REVOKED_SIGNER',
    REPLAY_DETECTED = 'REPLAY_DETECTED',

    // V. Membership
    INVALID_INVITE = 'INVALID_INVITE',
    INVITE_ALREADY_USED = 'INVITE_ALREADY_USED',
    INVITE_EXPIRED = 'INVITE_EXPIRED',

    // VI. Kernel Lifecycle & Internal
    KERNEL_NOT_ACTIVE = 'KERNEL_NOT_ACTIVE',
    INTEGRITY_BREACH = 'INTEGRITY_BREACH'
}

export class KernelError extends Error {
    /** The message without the code prefix. */
    public readonly reason: string;

    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly metadata?: Record<string, unknown>
    ) {
        super(`[Kernel:${code}] ${message}`);
        this.name = 'KernelError';
        this.reason = message;
    }
}

export function isKernelError(e: unknown): e is KernelError {
    return e instanceof KernelError;
}

export function isErrorCode(value: string): value is ErrorCode {
    return Object.values(ErrorCode).some(code => code === value);
}
