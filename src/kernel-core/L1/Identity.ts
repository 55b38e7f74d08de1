import { freeze, produce } from 'immer';
import { verifySignature, isPublicKey } from '../L0/Crypto.js';
import type { Ed25519PublicKey } from '../L0/Crypto.js';
import type { OrganizationId, Signer, SignerId } from '../L0/Ontology.js';
import { MemoryStateRepository } from '../L0/Ports.js';
import type { IStateRepository } from '../L0/Ports.js';
import { SystemClock } from '../L0/Clock.js';
import type { ISystemClock } from '../L0/Clock.js';
import { ErrorCode, KernelError } from '../Errors.js';

/**
 * Signer registry. Every proof, ballot and cancellation is verified against
 * the public keys held here.
 */
export class IdentityManager {
    private signers: Map<SignerId, Signer> = new Map();

    constructor(
        private repository: IStateRepository = new MemoryStateRepository(),
        private clock: ISystemClock = new SystemClock()
    ) { }

    public hydrate(): void {
        this.signers.clear();
        for (const s of this.repository.loadSigners()) {
            this.signers.set(s.id, freeze(s, true));
        }
    }

    public register(id: SignerId, publicKey: Ed25519PublicKey, invitedBy?: OrganizationId): Signer {
        if (!id) throw new KernelError(ErrorCode.INVALID_ACTION, 'Signer id must be non-empty');

        const existing = this.signers.get(id);
        // No resurrection: a revoked id stays revoked
        if (existing && existing.status === 'REVOKED') {
            throw new KernelError(ErrorCode.REVOKED_SIGNER, `No Resurrection allowed for REVOKED signer ${id}`);
        }
        if (existing) {
            throw new KernelError(ErrorCode.DUPLICATE_ID, `Signer ${id} already registered`);
        }
        if (!isPublicKey(publicKey)) {
            throw new KernelError(ErrorCode.SIGNATURE_INVALID, `Signer ${id} public key is not a valid ed25519 key`);
        }

        const signer: Signer = freeze({
            id,
            publicKey,
            status: 'ACTIVE',
            createdAt: this.clock.now(),
            ...(invitedBy ? { invitedBy } : {})
        }, true);

        this.repository.saveSigner(signer);
        this.signers.set(id, signer);
        return signer;
    }

    public get(id: SignerId): Signer | undefined {
        return this.signers.get(id);
    }

    public list(): Signer[] {
        return [...this.signers.values()];
    }

    public revoke(id: SignerId): Signer {
        const s = this.signers.get(id);
        if (!s) throw new KernelError(ErrorCode.UNKNOWN_SIGNER, `Signer ${id} not registered`);
        if (s.status === 'REVOKED') return s;

        const revoked = produce(s, draft => {
            draft.status = 'REVOKED';
            draft.revokedAt = this.clock.now();
        });
        this.repository.saveSigner(revoked);
        this.signers.set(id, revoked);
        return revoked;
    }

    /**
     * True only for an ACTIVE signer whose key verifies the signature.
     */
    public verify(id: SignerId, message: string, signature: string): boolean {
        const s = this.signers.get(id);
        if (!s || s.status !== 'ACTIVE') return false;
        return verifySignature(message, signature, s.publicKey);
    }
}
