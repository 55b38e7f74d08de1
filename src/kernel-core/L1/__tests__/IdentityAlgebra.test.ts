import { describe, test, expect, beforeEach } from '@jest/globals';
import { IdentityManager } from '../Identity.js';
import { InviteBook, redemptionMessage } from '../Invites.js';
import { generateKeyPair, signData } from '../../L0/Crypto.js';
import { ManualClock } from '../../L0/Clock.js';
import { MemoryStateRepository } from '../../L0/Ports.js';
import { ErrorCode } from '../../Errors.js';
import { thrownCode } from '../../__tests__/fixtures.js';

describe('Signer identity', () => {
    let repository: MemoryStateRepository;
    let clock: ManualClock;
    let identity: IdentityManager;

    beforeEach(() => {
        repository = new MemoryStateRepository();
        clock = new ManualClock(100);
        identity = new IdentityManager(repository, clock);
    });

    test('registers an active signer', () => {
        const keys = generateKeyPair();
        const signer = identity.register('alice', keys.publicKey);
        expect(signer).toEqual({ id: 'alice', publicKey: keys.publicKey, status: 'ACTIVE', createdAt: 100 });
        expect(Object.isFrozen(signer)).toBe(true);
        expect(identity.verify('alice', 'm', signData('m', keys.privateKey))).toBe(true);
    });

    test('rejects empty ids, duplicates and malformed keys', () => {
        const keys = generateKeyPair();
        expect(thrownCode(() => identity.register('', keys.publicKey))).toBe(ErrorCode.INVALID_ACTION);
        identity.register('alice', keys.publicKey);
        expect(thrownCode(() => identity.register('alice', keys.publicKey))).toBe(ErrorCode.DUPLICATE_ID);
        expect(thrownCode(() => identity.register('bob', 'garbage'))).toBe(ErrorCode.SIGNATURE_INVALID);
    });

    test('revocation is final', () => {
        const keys = generateKeyPair();
        identity.register('alice', keys.publicKey);
        clock.advance(50);

        const revoked = identity.revoke('alice');
        expect(revoked.status).toBe('REVOKED');
        expect(revoked.revokedAt).toBe(150);
        expect(identity.verify('alice', 'm', signData('m', keys.privateKey))).toBe(false);
        expect(thrownCode(() => identity.register('alice', generateKeyPair().publicKey))).toBe(ErrorCode.REVOKED_SIGNER);
        expect(thrownCode(() => identity.revoke('nobody'))).toBe(ErrorCode.UNKNOWN_SIGNER);
    });

    test('hydrates from the repository', () => {
        identity.register('alice', generateKeyPair().publicKey);
        identity.register('bob', generateKeyPair().publicKey);
        identity.revoke('bob');

        const restored = new IdentityManager(repository, clock);
        restored.hydrate();
        expect(restored.list().map(s => `${s.id}:${s.status}`).sort()).toEqual(['alice:ACTIVE', 'bob:REVOKED']);
    });
});

describe('Membership invites', () => {
    let clock: ManualClock;
    let identity: IdentityManager;
    let organizations: Set<string>;
    let book: InviteBook;

    beforeEach(() => {
        const repository = new MemoryStateRepository();
        clock = new ManualClock(1_000);
        identity = new IdentityManager(repository, clock);
        organizations = new Set(['pao_1']);
        book = new InviteBook(repository, identity, clock, id => organizations.has(id));
    });

    function redeem(inviteId: string, signerId: string) {
        const keys = generateKeyPair();
        return book.redeem(inviteId, signerId, keys.publicKey, signData(redemptionMessage(inviteId, signerId), keys.privateKey));
    }

    test('issues single-use invites with a future expiry', () => {
        expect(book.issue('inv-1', 'pao_1', 2_000)).toEqual({
            inviteId: 'inv-1', orgId: 'pao_1', expiresAt: 2_000, used: false, createdAt: 1_000
        });
        expect(thrownCode(() => book.issue('inv-1', 'pao_1', 3_000))).toBe(ErrorCode.DUPLICATE_ID);
        expect(thrownCode(() => book.issue('inv-2', 'pao_1', 1_000))).toBe(ErrorCode.INVALID_ACTION);
    });

    test('redemption registers the signer once', () => {
        book.issue('inv-1', 'pao_1', 2_000);
        const signer = redeem('inv-1', 'dave');

        expect(signer.invitedBy).toBe('pao_1');
        expect(identity.get('dave')?.status).toBe('ACTIVE');
        expect(book.get('inv-1')).toMatchObject({ used: true, redeemedBy: 'dave' });
        expect(thrownCode(() => redeem('inv-1', 'erin'))).toBe(ErrorCode.INVITE_ALREADY_USED);
    });

    test('expiry is inclusive of the expiry instant', () => {
        book.issue('inv-1', 'pao_1', 2_000);
        book.issue('inv-2', 'pao_1', 2_000);
        clock.set(2_000);
        expect(redeem('inv-1', 'dave').id).toBe('dave');
        clock.advance(1);
        expect(thrownCode(() => redeem('inv-2', 'erin'))).toBe(ErrorCode.INVITE_EXPIRED);
    });

    test('unknown invites and invites of removed organizations are invalid', () => {
        expect(thrownCode(() => redeem('missing', 'dave'))).toBe(ErrorCode.INVALID_INVITE);
        book.issue('inv-1', 'pao_1', 2_000);
        organizations.delete('pao_1');
        expect(thrownCode(() => redeem('inv-1', 'dave'))).toBe(ErrorCode.INVALID_INVITE);
    });

    test('redemption must be signed by the key being registered', () => {
        book.issue('inv-1', 'pao_1', 2_000);
        const keys = generateKeyPair();
        const other = generateKeyPair();
        const signature = signData(redemptionMessage('inv-1', 'dave'), other.privateKey);
        expect(thrownCode(() => book.redeem('inv-1', 'dave', keys.publicKey, signature))).toBe(ErrorCode.SIGNATURE_INVALID);
        expect(book.get('inv-1')?.used).toBe(false);
    });
});
