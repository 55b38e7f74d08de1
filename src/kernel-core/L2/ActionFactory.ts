// src/kernel-core/L2/ActionFactory.ts
import { signData, hash, canonicalize, randomNonce } from '../L0/Crypto.js';
import type { Ed25519PrivateKey } from '../L0/Crypto.js';
import { ActionKinds } from '../L0/Ontology.js';
import type {
    ActionId, ActionRequest, Ballot, CallerProof, Cancellation, Cosignature,
    GovernanceConfig, OrganizationId, SignerId
} from '../L0/Ontology.js';

/**
 * Canonical messages and signed proofs. The action id is the hash of the
 * signed message, so a proof binds the organization, kind, payload and nonce.
 * Messages are canonical JSON arrays; ids and kinds may contain any character.
 */
export class ActionFactory {
    static message(orgId: OrganizationId, request: ActionRequest, nonce: string): string {
        return canonicalize(['action', orgId, request.kind, request.payload, nonce]);
    }

    static actionId(orgId: OrganizationId, request: ActionRequest, nonce: string): ActionId {
        return hash(ActionFactory.message(orgId, request, nonce));
    }

    static sign(
        orgId: OrganizationId,
        request: ActionRequest,
        signer: SignerId,
        privateKey: Ed25519PrivateKey,
        nonce: string = randomNonce()
    ): CallerProof {
        return {
            signer,
            nonce,
            signature: signData(ActionFactory.message(orgId, request, nonce), privateKey)
        };
    }

    static cosign(
        orgId: OrganizationId,
        request: ActionRequest,
        nonce: string,
        signer: SignerId,
        privateKey: Ed25519PrivateKey
    ): Cosignature {
        return { signer, signature: signData(ActionFactory.message(orgId, request, nonce), privateKey) };
    }

    /**
     * The governance action behind a transition. The config itself is bound
     * through its canonical hash.
     */
    static transitionRequest(config: GovernanceConfig): ActionRequest {
        return {
            kind: ActionKinds.TRANSITION,
            payload: { module: config.kind, configHash: hash(canonicalize(config)) }
        };
    }

    static ballotMessage(actionId: ActionId, approve: boolean): string {
        return canonicalize(['ballot', actionId, approve ? 'APPROVE' : 'REJECT']);
    }

    static ballot(actionId: ActionId, voter: SignerId, approve: boolean, privateKey: Ed25519PrivateKey): Ballot {
        return { voter, approve, signature: signData(ActionFactory.ballotMessage(actionId, approve), privateKey) };
    }

    static cancelMessage(actionId: ActionId): string {
        return canonicalize(['cancel', actionId]);
    }

    static cancellation(actionId: ActionId, signer: SignerId, privateKey: Ed25519PrivateKey): Cancellation {
        return { signer, signature: signData(ActionFactory.cancelMessage(actionId), privateKey) };
    }
}
