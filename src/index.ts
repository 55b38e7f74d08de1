export { GovernanceKernel } from './kernel-core/Kernel.js';
export type { KernelLifecycle, KernelOptions, AuthorityResolution } from './kernel-core/Kernel.js';
export * from './kernel-core/L0/Ontology.js';
export { generateKeyPair, signData, verifySignature, canonicalize, hash, randomNonce } from './kernel-core/L0/Crypto.js';
export { SystemClock, ManualClock } from './kernel-core/L0/Clock.js';
export type { ISystemClock } from './kernel-core/L0/Clock.js';
export { MemoryStateRepository } from './kernel-core/L0/Ports.js';
export type { IStateRepository } from './kernel-core/L0/Ports.js';
export { ActionFactory } from './kernel-core/L2/ActionFactory.js';
export { redemptionMessage } from './kernel-core/L1/Invites.js';
export { GovernanceModuleRegistry } from './kernel-core/L4/Governance.js';
export type { GovernanceModule, EvaluationContext } from './kernel-core/L4/Governance.js';
export * from './kernel-core/L4/modules/index.js';
export { AuditLog } from './kernel-core/L5/Audit.js';
export type { Evidence, IEventStore } from './kernel-core/L5/Audit.js';
export { ErrorCode, KernelError, isKernelError } from './kernel-core/Errors.js';
export { SQLiteStateRepository } from './infrastructure/persistence/SQLiteStateRepository.js';
export { SQLiteEventStore } from './infrastructure/persistence/SQLiteEventStore.js';
export { GovernanceServer } from './server/Server.js';
export { loadConfig } from './config/Config.js';
export type { AppConfig } from './config/Config.js';
