import { z } from 'zod';
import type { GovernanceModule } from '../Governance.js';

export const ThresholdVoteSchema = z.object({
    kind: z.literal('threshold-vote'),
    voters: z.record(z.string().min(1), z.number().int().positive()),
    quorum: z.number().int().positive(),
    windowMs: z.number().int().positive().optional()
}).strict().refine(
    config => config.quorum <= totalWeight(config.voters),
    { message: 'Quorum must not exceed total voting weight', path: ['quorum'] }
);

export type ThresholdVoteConfig = z.infer<typeof ThresholdVoteSchema>;

function totalWeight(voters: Record<string, number>): number {
    return Object.values(voters).reduce((sum, w) => sum + w, 0);
}

/**
 * Weighted quorum vote over an optional time window.
 *
 * The proposer must hold a vote and counts as approving unless they cast a
 * ballot saying otherwise. Once the rejecting weight leaves the quorum out of
 * reach the action is rejected without waiting for the remaining voters.
 */
export const ThresholdVoteModule: GovernanceModule<ThresholdVoteConfig> = {
    kind: 'threshold-vote',
    schema: ThresholdVoteSchema,

    evaluate({ proof, ballots, openedAt, now }, config) {
        const proposer = proof.signer;
        if (!Object.hasOwn(config.voters, proposer)) {
            return { outcome: 'REJECTED', reason: `Proposer ${proposer} holds no vote` };
        }

        const cast: Record<string, boolean> = { [proposer]: true, ...ballots };
        let approving = 0;
        let rejecting = 0;
        for (const [voter, weight] of Object.entries(config.voters)) {
            if (!Object.hasOwn(cast, voter)) continue;
            if (cast[voter] === true) approving += weight;
            else rejecting += weight;
        }

        if (config.windowMs !== undefined && now - openedAt > config.windowMs) {
            return { outcome: 'REJECTED', reason: `Voting window of ${config.windowMs}ms elapsed with ${approving}/${config.quorum} weight approved` };
        }
        if (approving >= config.quorum) return { outcome: 'APPROVED' };
        if (totalWeight(config.voters) - rejecting < config.quorum) {
            return { outcome: 'REJECTED', reason: `Quorum of ${config.quorum} unreachable` };
        }
        return { outcome: 'PENDING', reason: `${approving}/${config.quorum} weight approved` };
    },

    acceptsBallot(config, voter) {
        return Object.hasOwn(config.voters, voter);
    },

    canCancel(_config, proposer, canceller) {
        return canceller === proposer;
    }
};
