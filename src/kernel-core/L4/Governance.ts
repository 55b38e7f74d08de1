// src/kernel-core/L4/Governance.ts
import { z } from 'zod';
import { hash, canonicalize } from '../L0/Crypto.js';
import type {
    ActionId, ActionKind, CallerProof, GovernanceConfig, JsonObject,
    OrganizationId, SignerId, Verdict
} from '../L0/Ontology.js';
import type { IdentityManager } from '../L1/Identity.js';
import { ErrorCode, KernelError } from '../Errors.js';

/**
 * Everything a module may look at when deciding an action.
 * `level` is the organization whose governance is evaluating; it differs from
 * `orgId` when the acting organization delegates upward.
 */
export interface EvaluationContext {
    actionId: ActionId;
    orgId: OrganizationId;
    level: OrganizationId;
    kind: ActionKind;
    payload: JsonObject;
    proof: CallerProof;
    message: string;
    ballots: Readonly<Record<SignerId, boolean>>;
    openedAt: number;
    now: number;
    identity: IdentityManager;
}

/**
 * Pluggable governance strategy. New strategies implement this interface and
 * are registered with a GovernanceModuleRegistry.
 */
export interface GovernanceModule<C extends GovernanceConfig> {
    readonly kind: string;
    readonly schema: z.ZodType<C, z.ZodTypeDef, unknown>;
    /** Walk to the parent instead of evaluating here. */
    readonly delegatesToParent?: boolean;
    evaluate(context: EvaluationContext, config: C): Verdict;
    acceptsBallot?(config: C, voter: SignerId): boolean;
    /** Defaults to proposer-only withdrawal. */
    canCancel?(config: C, proposer: SignerId, canceller: SignerId): boolean;
}

// Type-erased view kept by the registry; every call re-validates the config.
interface BoundModule {
    kind: string;
    delegatesToParent: boolean;
    validate(config: unknown): GovernanceConfig;
    evaluate(context: EvaluationContext, config: GovernanceConfig): Verdict;
    acceptsBallot(config: GovernanceConfig, voter: SignerId): boolean;
    canCancel(config: GovernanceConfig, proposer: SignerId, canceller: SignerId): boolean;
}

const TaggedConfig = z.object({ kind: z.string().min(1) }).passthrough();

export class GovernanceModuleRegistry {
    private modules: Map<string, BoundModule> = new Map();

    public register<C extends GovernanceConfig>(module: GovernanceModule<C>): void {
        if (this.modules.has(module.kind)) {
            throw new Error(`GovernanceModuleRegistry: Module ${module.kind} already registered`);
        }

        const parse = (config: unknown): C => {
            const result = module.schema.safeParse(config);
            if (!result.success) {
                const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
                throw new KernelError(ErrorCode.INVALID_CONFIG, `Invalid ${module.kind} config: ${issues}`);
            }
            if (result.data.kind !== module.kind) {
                throw new KernelError(ErrorCode.INVALID_CONFIG, `Config kind ${result.data.kind} does not match module ${module.kind}`);
            }
            return result.data;
        };

        this.modules.set(module.kind, {
            kind: module.kind,
            delegatesToParent: module.delegatesToParent === true,
            validate: parse,
            evaluate: (context, config) => module.evaluate(context, parse(config)),
            acceptsBallot: (config, voter) => module.acceptsBallot ? module.acceptsBallot(parse(config), voter) : false,
            canCancel: (config, proposer, canceller) => module.canCancel
                ? module.canCancel(parse(config), proposer, canceller)
                : canceller === proposer
        });
    }

    public has(kind: string): boolean {
        return this.modules.has(kind);
    }

    public kinds(): string[] {
        return [...this.modules.keys()];
    }

    private get(kind: string): BoundModule {
        const module = this.modules.get(kind);
        if (!module) throw new KernelError(ErrorCode.UNKNOWN_MODULE, `Governance module ${kind} is not registered`);
        return module;
    }

    /**
     * Validates an untrusted config against its module's schema.
     */
    public validate(config: unknown): GovernanceConfig {
        const tagged = TaggedConfig.safeParse(config);
        if (!tagged.success) {
            throw new KernelError(ErrorCode.INVALID_CONFIG, 'Governance config must be an object with a module kind');
        }
        if (!this.modules.has(tagged.data.kind)) {
            throw new KernelError(ErrorCode.INVALID_CONFIG, `Unknown governance module ${tagged.data.kind}`);
        }
        return this.get(tagged.data.kind).validate(config);
    }

    public delegates(config: GovernanceConfig): boolean {
        return this.get(config.kind).delegatesToParent;
    }

    public evaluate(config: GovernanceConfig, context: EvaluationContext): Verdict {
        return this.get(config.kind).evaluate(context, config);
    }

    public acceptsBallot(config: GovernanceConfig, voter: SignerId): boolean {
        return this.get(config.kind).acceptsBallot(config, voter);
    }

    public canCancel(config: GovernanceConfig, proposer: SignerId, canceller: SignerId): boolean {
        return this.get(config.kind).canCancel(config, proposer, canceller);
    }

    /**
     * Identifier of a module/config binding: `<kind>:<16 hex of the config hash>`.
     */
    public moduleRef(config: GovernanceConfig): string {
        return `${config.kind}:${hash(canonicalize(config)).slice(0, 16)}`;
    }
}
