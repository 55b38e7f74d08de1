import { z } from 'zod';
import type { GovernanceModule } from '../Governance.js';
import { MultiSigGuard } from '../../L0/Guards.js';

export const MultisigSchema = z.object({
    kind: z.literal('multisig'),
    signers: z.array(z.string().min(1)).min(1),
    required: z.number().int().positive()
}).strict().refine(
    config => config.required <= new Set(config.signers).size,
    { message: 'Required signatures must not exceed the signer set', path: ['required'] }
);

export type MultisigConfig = z.infer<typeof MultisigSchema>;

/**
 * N-of-M signatures carried in the proof itself; never pending.
 */
export const MultisigModule: GovernanceModule<MultisigConfig> = {
    kind: 'multisig',
    schema: MultisigSchema,

    evaluate({ proof, message, identity }, config) {
        const result = MultiSigGuard({
            message,
            requiredSignatures: config.required,
            providedSignatures: [
                { signer: proof.signer, signature: proof.signature },
                ...(proof.cosignatures ?? [])
            ],
            authorizedSigners: config.signers,
            identity
        });
        if (!result.ok) return { outcome: 'REJECTED', reason: result.violation };
        return { outcome: 'APPROVED' };
    }
};
