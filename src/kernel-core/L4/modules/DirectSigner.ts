import { z } from 'zod';
import type { GovernanceModule } from '../Governance.js';

export const DirectSignerSchema = z.object({
    kind: z.literal('direct-signer'),
    authority: z.string().min(1)
}).strict();

export type DirectSignerConfig = z.infer<typeof DirectSignerSchema>;

/**
 * Single authority: the action is approved iff the authority signed it.
 */
export const DirectSignerModule: GovernanceModule<DirectSignerConfig> = {
    kind: 'direct-signer',
    schema: DirectSignerSchema,

    evaluate({ proof }, config) {
        if (proof.signer === config.authority) return { outcome: 'APPROVED' };
        return { outcome: 'REJECTED', reason: `Signer ${proof.signer} is not the authority` };
    },

    canCancel(config, proposer, canceller) {
        return canceller === config.authority || canceller === proposer;
    }
};
