import { GovernanceModuleRegistry } from '../Governance.js';
import { DirectSignerModule } from './DirectSigner.js';
import { ThresholdVoteModule } from './ThresholdVote.js';
import { MultisigModule } from './Multisig.js';
import { DelegatedModule } from './Delegated.js';

export * from './DirectSigner.js';
export * from './ThresholdVote.js';
export * from './Multisig.js';
export * from './Delegated.js';

export function createStandardModules(): GovernanceModuleRegistry {
    const modules = new GovernanceModuleRegistry();
    modules.register(DirectSignerModule);
    modules.register(ThresholdVoteModule);
    modules.register(MultisigModule);
    modules.register(DelegatedModule);
    return modules;
}
