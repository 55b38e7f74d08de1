import { describe, test, expect } from '@jest/globals';
import { GovernanceKernel } from '../../Kernel.js';
import { ActionFactory } from '../../L2/ActionFactory.js';
import { MemoryStateRepository } from '../../L0/Ports.js';
import { ErrorCode } from '../../Errors.js';
import { bootKernel, propose, rejectedCode } from '../../__tests__/fixtures.js';

const put = (key: string, value: string) => ({ kind: 'data.put', payload: { key, value } });

describe('Action engine', () => {
    describe('direct-signer governance', () => {
        test('approves the authority and applies the effect', async () => {
            const { kernel, signer } = await bootKernel(['alice']);
            await kernel.register('PAO', undefined, { kind: 'direct-signer', authority: 'alice' }, { id: 'P' });

            const id = await kernel.submitAction('P', put('motto', 'steady'), propose('P', put('motto', 'steady'), signer('alice')));

            expect(kernel.actionStatus(id)).toBe('APPROVED');
            expect(kernel.getAction(id)).toMatchObject({
                orgId: 'P',
                proposer: 'alice',
                path: ['P'],
                evaluatedAt: 'P',
                evaluatedAtVersion: 0,
                resolvedAt: 1_000
            });
            expect(kernel.lookup('P').data).toEqual({ motto: 'steady' });
            expect(kernel.lookup('P').version).toBe(0);
        });

        test('rejects anyone else and leaves data untouched', async () => {
            const { kernel, signer } = await bootKernel(['alice', 'bob']);
            await kernel.register('PAO', undefined, { kind: 'direct-signer', authority: 'alice' }, { id: 'P' });

            const id = await kernel.submitAction('P', put('k', 'v'), propose('P', put('k', 'v'), signer('bob')));

            expect(kernel.getAction(id)).toMatchObject({
                status: 'REJECTED',
                code: 'REJECTED',
                reason: 'Signer bob is not the authority'
            });
            expect(kernel.lookup('P').data).toEqual({});
        });

        test('kinds without an effect are approval-only', async () => {
            const { kernel, signer } = await bootKernel(['alice']);
            await kernel.register('PAO', undefined, { kind: 'direct-signer', authority: 'alice' }, { id: 'P' });
            const request = { kind: 'custom.note', payload: { text: 'hello' } };

            const id = await kernel.submitAction('P', request, propose('P', request, signer('alice')));
            expect(kernel.actionStatus(id)).toBe('APPROVED');
            expect(kernel.lookup('P').data).toEqual({});
        });

        test('freeze blocks actions until unfreeze', async () => {
            const { kernel, signer } = await bootKernel(['alice']);
            await kernel.register('PAO', undefined, { kind: 'direct-signer', authority: 'alice' }, { id: 'P' });
            const freeze = { kind: 'organization.freeze', payload: {} };
            const unfreeze = { kind: 'organization.unfreeze', payload: {} };

            await kernel.submitAction('P', freeze, propose('P', freeze, signer('alice')));
            expect(kernel.lookup('P').status).toBe('Frozen');
            expect(await rejectedCode(
                kernel.submitAction('P', put('k', 'v'), propose('P', put('k', 'v'), signer('alice')))
            )).toBe(ErrorCode.INVALID_STATE);

            const id = await kernel.submitAction('P', unfreeze, propose('P', unfreeze, signer('alice')));
            expect(kernel.actionStatus(id)).toBe('APPROVED');
            expect(kernel.lookup('P').status).toBe('Active');
        });

        test('an effect failure turns the approval into a rejection', async () => {
            const { kernel, signer } = await bootKernel(['alice']);
            await kernel.register('PAO', undefined, { kind: 'direct-signer', authority: 'alice' }, { id: 'P' });
            const request = GovernanceKernel.inviteRequest(500);

            const id = await kernel.submitAction('P', request, propose('P', request, signer('alice')));
            expect(kernel.getAction(id)).toMatchObject({
                status: 'REJECTED',
                code: 'INVALID_ACTION',
                reason: 'Invite expiry must lie in the future'
            });
            expect(kernel.getInvite(id)).toBeUndefined();
        });
    });

    describe('submission checks', () => {
        test('rejects replays, forgeries and unknown signers', async () => {
            const { kernel, signer } = await bootKernel(['alice', 'bob']);
            await kernel.register('PAO', undefined, { kind: 'direct-signer', authority: 'alice' }, { id: 'P' });
            const request = put('k', 'v');
            const proof = propose('P', request, signer('alice'), 'nonce-1');

            await kernel.submitAction('P', request, proof);
            expect(await rejectedCode(kernel.submitAction('P', request, proof))).toBe(ErrorCode.REPLAY_DETECTED);

            const forged = propose('P', request, { id: 'alice', keys: signer('bob').keys });
            expect(await rejectedCode(kernel.submitAction('P', request, forged))).toBe(ErrorCode.SIGNATURE_INVALID);

            const stranger = propose('P', request, { id: 'zed', keys: signer('bob').keys });
            expect(await rejectedCode(kernel.submitAction('P', request, stranger))).toBe(ErrorCode.UNKNOWN_SIGNER);

            await kernel.revokeSigner('bob');
            expect(await rejectedCode(
                kernel.submitAction('P', request, propose('P', request, signer('bob')))
            )).toBe(ErrorCode.REVOKED_SIGNER);
        });

        test('a proof signed for other content does not verify', async () => {
            const { kernel, signer } = await bootKernel(['alice']);
            await kernel.register('PAO', undefined, { kind: 'direct-signer', authority: 'alice' }, { id: 'P' });
            const proof = propose('P', put('k', 'v'), signer('alice'));
            expect(await rejectedCode(kernel.submitAction('P', put('k', 'other'), proof))).toBe(ErrorCode.SIGNATURE_INVALID);
        });

        test('a proof cannot be moved between organizations by shifting separators', async () => {
            const { kernel, signer } = await bootKernel(['alice']);
            await kernel.register('PAO', undefined, { kind: 'direct-signer', authority: 'alice' }, { id: 'a' });
            await kernel.register('PAO', undefined, { kind: 'direct-signer', authority: 'alice' }, { id: 'a:x' });

            const harmless = { kind: 'x:data.put', payload: { key: 'treasury', value: 'drained' } };
            const proof = propose('a', harmless, signer('alice'), 'nonce-1');
            const write = { kind: 'data.put', payload: { key: 'treasury', value: 'drained' } };

            expect(await rejectedCode(kernel.submitAction('a:x', write, proof))).toBe(ErrorCode.SIGNATURE_INVALID);
            expect(kernel.lookup('a:x').data).toEqual({});

            const next = { kind: 'multisig', signers: ['alice'], required: 1 };
            const takeover = ActionFactory.transitionRequest(next);
            const smuggled = propose('a', { kind: `x:${takeover.kind}`, payload: takeover.payload }, signer('alice'), 'nonce-2');
            expect(await rejectedCode(kernel.beginTransition('a:x', next, smuggled))).toBe(ErrorCode.SIGNATURE_INVALID);
            expect(kernel.lookup('a:x').status).toBe('Active');
        });

        test('ballots and cancellations are framed apart from action messages', () => {
            expect(ActionFactory.ballotMessage('a1', true)).toBe('["ballot","a1","APPROVE"]');
            expect(ActionFactory.cancelMessage('a1')).toBe('["cancel","a1"]');
            expect(ActionFactory.message('a', { kind: 'x:data.put', payload: {} }, 'n'))
                .not.toBe(ActionFactory.message('a:x', { kind: 'data.put', payload: {} }, 'n'));
        });

        test('reserved kinds and malformed payloads are refused before recording', async () => {
            const { kernel, signer } = await bootKernel(['alice']);
            await kernel.register('PAO', undefined, { kind: 'direct-signer', authority: 'alice' }, { id: 'P' });

            const transition = ActionFactory.transitionRequest({ kind: 'direct-signer' });
            expect(await rejectedCode(
                kernel.submitAction('P', transition, propose('P', transition, signer('alice')))
            )).toBe(ErrorCode.INVALID_ACTION);

            const bad = { kind: 'data.put', payload: { key: '__proto__', value: 1 } };
            expect(await rejectedCode(kernel.submitAction('P', bad, propose('P', bad, signer('alice'))))).toBe(ErrorCode.INVALID_ACTION);

            const empty = { kind: '', payload: {} };
            expect(await rejectedCode(kernel.submitAction('P', empty, propose('P', empty, signer('alice'))))).toBe(ErrorCode.INVALID_ACTION);

            expect(kernel.listActions('P')).toEqual([]);
        });

        test('an unknown organization is not found', async () => {
            const { kernel, signer } = await bootKernel(['alice']);
            expect(await rejectedCode(
                kernel.submitAction('ghost', put('k', 'v'), propose('ghost', put('k', 'v'), signer('alice')))
            )).toBe(ErrorCode.NOT_FOUND);
        });
    });

    describe('delegation', () => {
        test('an SAO action is decided by its parent', async () => {
            const { kernel, signer } = await bootKernel(['alice']);
            await kernel.register('PAO', undefined, { kind: 'direct-signer', authority: 'alice' }, { id: 'P' });
            await kernel.register('SAO', 'P', { kind: 'delegated' }, { id: 'S' });

            const id = await kernel.submitAction('S', put('k', 'v'), propose('S', put('k', 'v'), signer('alice')));
            expect(kernel.getAction(id)).toMatchObject({ status: 'APPROVED', path: ['S', 'P'], evaluatedAt: 'P' });
            expect(kernel.lookup('S').data).toEqual({ k: 'v' });
            expect(kernel.lookup('P').data).toEqual({});
        });

        test('an exceeded depth bound rejects with the walked path', async () => {
            const { kernel, signer } = await bootKernel(['alice'], { maxDelegationDepth: 1 });
            await kernel.register('PAO', undefined, { kind: 'direct-signer', authority: 'alice' }, { id: 'P' });
            await kernel.register('SAO', 'P', { kind: 'delegated' }, { id: 'S1' });
            await kernel.register('SAO', 'S1', { kind: 'delegated' }, { id: 'S2' });

            const id = await kernel.submitAction('S2', put('k', 'v'), propose('S2', put('k', 'v'), signer('alice')));
            expect(kernel.getAction(id)).toMatchObject({ status: 'REJECTED', code: 'DEPTH_EXCEEDED', path: ['S2', 'S1'] });
        });
    });

    describe('threshold-vote governance', () => {
        const threshold = { kind: 'threshold-vote', voters: { alice: 1, bob: 1, carol: 1 }, quorum: 2 };

        test('stays pending until quorum and rejects later ballots', async () => {
            const { kernel, signer } = await bootKernel(['alice', 'bob', 'carol', 'dave']);
            await kernel.register('PAO', undefined, threshold, { id: 'P' });

            const id = await kernel.submitAction('P', put('k', 'v'), propose('P', put('k', 'v'), signer('alice')));
            expect(kernel.getAction(id)).toMatchObject({ status: 'PENDING', reason: '1/2 weight approved' });
            expect(kernel.lookup('P').data).toEqual({});

            expect(await rejectedCode(
                kernel.vote(id, ActionFactory.ballot(id, 'dave', true, signer('dave').keys.privateKey))
            )).toBe(ErrorCode.NOT_ELIGIBLE);
            expect(await rejectedCode(
                kernel.vote(id, ActionFactory.ballot(id, 'bob', true, signer('carol').keys.privateKey))
            )).toBe(ErrorCode.SIGNATURE_INVALID);

            const approved = await kernel.vote(id, ActionFactory.ballot(id, 'bob', true, signer('bob').keys.privateKey));
            expect(approved.status).toBe('APPROVED');
            expect(approved.ballots).toEqual({ bob: true });
            expect(approved.reason).toBeUndefined();
            expect(kernel.lookup('P').data).toEqual({ k: 'v' });

            expect(await rejectedCode(
                kernel.vote(id, ActionFactory.ballot(id, 'carol', true, signer('carol').keys.privateKey))
            )).toBe(ErrorCode.INVALID_STATE);
        });

        test('rejects once quorum is out of reach', async () => {
            const { kernel, signer } = await bootKernel(['alice', 'bob', 'carol']);
            await kernel.register('PAO', undefined, threshold, { id: 'P' });
            const id = await kernel.submitAction('P', put('k', 'v'), propose('P', put('k', 'v'), signer('alice')));

            const first = await kernel.vote(id, ActionFactory.ballot(id, 'bob', false, signer('bob').keys.privateKey));
            expect(first.status).toBe('PENDING');

            const second = await kernel.vote(id, ActionFactory.ballot(id, 'carol', false, signer('carol').keys.privateKey));
            expect(second).toMatchObject({ status: 'REJECTED', code: 'REJECTED', reason: 'Quorum of 2 unreachable' });
        });

        test('finalize closes an elapsed window', async () => {
            const { kernel, clock, signer } = await bootKernel(['alice', 'bob']);
            await kernel.register('PAO', undefined, { ...threshold, windowMs: 100 }, { id: 'P' });
            const id = await kernel.submitAction('P', put('k', 'v'), propose('P', put('k', 'v'), signer('alice')));

            clock.advance(100);
            expect((await kernel.finalize(id)).status).toBe('PENDING');

            clock.advance(1);
            const closed = await kernel.finalize(id);
            expect(closed).toMatchObject({
                status: 'REJECTED',
                reason: 'Voting window of 100ms elapsed with 1/2 weight approved',
                resolvedAt: 1_101
            });
            expect(await kernel.finalize(id)).toBe(closed);
        });

        test('only the proposer may cancel', async () => {
            const { kernel, signer } = await bootKernel(['alice', 'bob']);
            await kernel.register('PAO', undefined, threshold, { id: 'P' });
            const id = await kernel.submitAction('P', put('k', 'v'), propose('P', put('k', 'v'), signer('alice')));

            expect(await rejectedCode(
                kernel.cancel(id, ActionFactory.cancellation(id, 'bob', signer('bob').keys.privateKey))
            )).toBe(ErrorCode.NOT_ELIGIBLE);

            const cancelled = await kernel.cancel(id, ActionFactory.cancellation(id, 'alice', signer('alice').keys.privateKey));
            expect(cancelled).toMatchObject({ status: 'REJECTED', code: 'REJECTED', reason: 'Cancelled by alice' });
        });

        test('a proposer without a vote is rejected outright', async () => {
            const { kernel, signer } = await bootKernel(['dave']);
            await kernel.register('PAO', undefined, threshold, { id: 'P' });
            const id = await kernel.submitAction('P', put('k', 'v'), propose('P', put('k', 'v'), signer('dave')));
            expect(kernel.getAction(id).reason).toBe('Proposer dave holds no vote');
        });
    });

    describe('multisig governance', () => {
        const multisig = { kind: 'multisig', signers: ['alice', 'bob', 'carol'], required: 2 };

        test('approves with enough cosignatures', async () => {
            const { kernel, signer } = await bootKernel(['alice', 'bob']);
            await kernel.register('PAO', undefined, multisig, { id: 'P' });
            const request = put('k', 'v');

            const alone = await kernel.submitAction('P', request, propose('P', request, signer('alice'), 'n1'));
            expect(kernel.getAction(alone).reason).toBe('Requires 2 signatures, got 1');

            const proof = {
                ...propose('P', request, signer('alice'), 'n2'),
                cosignatures: [ActionFactory.cosign('P', request, 'n2', 'bob', signer('bob').keys.privateKey)]
            };
            const id = await kernel.submitAction('P', request, proof);
            expect(kernel.actionStatus(id)).toBe('APPROVED');
        });
    });

    test('actions interrupted by a restart are closed as rejected', async () => {
        const repository = new MemoryStateRepository();
        repository.saveAction({
            actionId: 'a1',
            orgId: 'P',
            kind: 'data.put',
            payload: { key: 'k', value: 'v' },
            proposer: 'alice',
            proof: { signer: 'alice', nonce: 'n', signature: '00' },
            status: 'EVALUATING',
            path: [],
            ballots: {},
            submittedAt: 10
        });

        const { kernel } = await bootKernel([], { repository });
        expect(kernel.getAction('a1')).toMatchObject({
            status: 'REJECTED',
            code: 'INVALID_STATE',
            reason: 'Interrupted before resolution',
            resolvedAt: 1_000
        });
    });
});
