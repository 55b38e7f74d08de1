import { freeze, produce } from 'immer';
import { verifySignature } from '../L0/Crypto.js';
import type { Invite, InviteId, OrganizationId, Signer, SignerId } from '../L0/Ontology.js';
import type { IStateRepository } from '../L0/Ports.js';
import type { ISystemClock } from '../L0/Clock.js';
import { IdentityManager } from './Identity.js';
import { ErrorCode, KernelError } from '../Errors.js';

/**
 * Message a newcomer signs with the key being registered, proving possession.
 */
export function redemptionMessage(inviteId: InviteId, signerId: SignerId): string {
    return `invite:${inviteId}:${signerId}`;
}

/**
 * Membership invites: single use, expiring, redeemed by registering a signer.
 * Invites are issued by approved `membership.invite` actions.
 */
export class InviteBook {
    private invites: Map<InviteId, Invite> = new Map();

    constructor(
        private repository: IStateRepository,
        private identity: IdentityManager,
        private clock: ISystemClock,
        private organizationExists: (id: OrganizationId) => boolean
    ) { }

    public hydrate(): void {
        this.invites.clear();
        for (const invite of this.repository.loadInvites()) {
            this.invites.set(invite.inviteId, freeze(invite, true));
        }
    }

    public issue(inviteId: InviteId, orgId: OrganizationId, expiresAt: number): Invite {
        if (this.invites.has(inviteId)) {
            throw new KernelError(ErrorCode.DUPLICATE_ID, `Invite ${inviteId} already issued`);
        }
        if (expiresAt <= this.clock.now()) {
            throw new KernelError(ErrorCode.INVALID_ACTION, 'Invite expiry must lie in the future');
        }

        const invite: Invite = freeze({
            inviteId,
            orgId,
            expiresAt,
            used: false,
            createdAt: this.clock.now()
        }, true);

        this.repository.saveInvite(invite);
        this.invites.set(inviteId, invite);
        return invite;
    }

    public get(inviteId: InviteId): Invite | undefined {
        return this.invites.get(inviteId);
    }

    public redeem(inviteId: InviteId, signerId: SignerId, publicKey: string, signature: string): Signer {
        const invite = this.invites.get(inviteId);
        if (!invite || !this.organizationExists(invite.orgId)) {
            throw new KernelError(ErrorCode.INVALID_INVITE, `Invite ${inviteId} is not valid`);
        }
        if (invite.used) {
            throw new KernelError(ErrorCode.INVITE_ALREADY_USED, `Invite ${inviteId} already used`);
        }
        if (this.clock.now() > invite.expiresAt) {
            throw new KernelError(ErrorCode.INVITE_EXPIRED, `Invite ${inviteId} expired`);
        }
        if (!verifySignature(redemptionMessage(inviteId, signerId), signature, publicKey)) {
            throw new KernelError(ErrorCode.SIGNATURE_INVALID, 'Redemption must be signed by the registered key');
        }

        const signer = this.identity.register(signerId, publicKey, invite.orgId);

        const used = produce(invite, draft => {
            draft.used = true;
            draft.redeemedBy = signerId;
        });
        this.repository.saveInvite(used);
        this.invites.set(inviteId, used);

        return signer;
    }
}
