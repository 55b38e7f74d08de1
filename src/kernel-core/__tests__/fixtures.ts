import { generateKeyPair } from '../L0/Crypto.js';
import type { KeyPair } from '../L0/Crypto.js';
import type { ActionRequest, CallerProof, GovernanceConfig, OrganizationId } from '../L0/Ontology.js';
import { ManualClock } from '../L0/Clock.js';
import { ActionFactory } from '../L2/ActionFactory.js';
import { GovernanceKernel } from '../Kernel.js';
import type { KernelOptions } from '../Kernel.js';
import { ErrorCode, isKernelError } from '../Errors.js';

export interface TestSigner {
    id: string;
    keys: KeyPair;
}

export function makeSigner(id: string): TestSigner {
    return { id, keys: generateKeyPair() };
}

/**
 * Code of the KernelError thrown by `fn`, or undefined when it returns.
 */
export function thrownCode(fn: () => unknown): ErrorCode | undefined {
    try {
        fn();
    } catch (e) {
        if (isKernelError(e)) return e.code;
        throw e;
    }
    return undefined;
}

export async function rejectedCode(promise: Promise<unknown>): Promise<ErrorCode | undefined> {
    try {
        await promise;
    } catch (e) {
        if (isKernelError(e)) return e.code;
        throw e;
    }
    return undefined;
}

export interface TestKernel {
    kernel: GovernanceKernel;
    clock: ManualClock;
    signers: Record<string, TestSigner>;
    signer(id: string): TestSigner;
}

/**
 * Booted in-memory kernel on a manual clock with the given signers enrolled.
 */
export async function bootKernel(ids: string[], options: KernelOptions = {}): Promise<TestKernel> {
    const clock = new ManualClock(1_000);
    const kernel = new GovernanceKernel({ clock, ...options });
    await kernel.boot();

    const signers: Record<string, TestSigner> = {};
    for (const id of ids) {
        const s = makeSigner(id);
        await kernel.registerSigner(id, s.keys.publicKey);
        signers[id] = s;
    }
    return {
        kernel,
        clock,
        signers,
        signer(id: string): TestSigner {
            const s = signers[id];
            if (!s) throw new Error(`Unknown test signer ${id}`);
            return s;
        }
    };
}

export function propose(orgId: OrganizationId, request: ActionRequest, signer: TestSigner, nonce?: string): CallerProof {
    return ActionFactory.sign(orgId, request, signer.id, signer.keys.privateKey, nonce);
}

export function proposeTransition(orgId: OrganizationId, config: GovernanceConfig, signer: TestSigner, nonce?: string): CallerProof {
    return propose(orgId, ActionFactory.transitionRequest(config), signer, nonce);
}
