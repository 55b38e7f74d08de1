import { z } from 'zod';
import type { GovernanceModule } from '../Governance.js';

export const DelegatedSchema = z.object({
    kind: z.literal('delegated')
}).strict();

export type DelegatedConfig = z.infer<typeof DelegatedSchema>;

/**
 * Defers every decision to the parent organization's governance.
 */
export const DelegatedModule: GovernanceModule<DelegatedConfig> = {
    kind: 'delegated',
    schema: DelegatedSchema,
    delegatesToParent: true,

    // Reached only when a delegating organization has no parent
    evaluate() {
        return { outcome: 'REJECTED', reason: 'Delegated governance has no parent to defer to' };
    }
};
