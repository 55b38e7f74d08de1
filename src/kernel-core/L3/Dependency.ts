// src/kernel-core/L3/Dependency.ts
import type { OrganizationId, OrganizationRecord } from '../L0/Ontology.js';
import type { OrganizationStore } from '../L2/State.js';
import type { GovernanceModuleRegistry } from '../L4/Governance.js';
import { ErrorCode } from '../Errors.js';

export const DEFAULT_MAX_DELEGATION_DEPTH = 16;

export type Resolution =
    | { ok: true; level: OrganizationRecord; path: OrganizationId[] }
    | { ok: false; code: ErrorCode; reason: string; path: OrganizationId[] };

/**
 * Finds the organization whose governance decides for another.
 *
 * Walks parent links while the current level's module delegates. The walk is
 * iterative and bounded by `maxDepth` hops, so a deep or corrupted chain
 * yields a rejection instead of unbounded work.
 */
export class DependencyResolver {
    constructor(
        private store: OrganizationStore,
        private modules: GovernanceModuleRegistry,
        private maxDepth: number = DEFAULT_MAX_DELEGATION_DEPTH
    ) {
        if (!Number.isInteger(maxDepth) || maxDepth < 0) {
            throw new Error(`DependencyResolver: maxDepth must be a non-negative integer, got ${maxDepth}`);
        }
    }

    public get MaxDepth(): number {
        return this.maxDepth;
    }

    /**
     * Throws NOT_FOUND for an unknown starting organization; every other
     * failure comes back as a rejected resolution carrying the walked path.
     */
    public resolve(orgId: OrganizationId): Resolution {
        let current = this.store.require(orgId);
        const path: OrganizationId[] = [];
        const visited = new Set<OrganizationId>();

        for (let hops = 0; ; hops++) {
            if (visited.has(current.id)) {
                return { ok: false, code: ErrorCode.INTEGRITY_BREACH, reason: `Cycle through ${current.id}`, path };
            }
            visited.add(current.id);
            path.push(current.id);

            if (!this.modules.delegates(current.governance)) {
                return { ok: true, level: current, path };
            }
            if (current.parent === undefined) {
                return {
                    ok: false,
                    code: ErrorCode.REJECTED,
                    reason: `${current.id} delegates but has no parent to defer to`,
                    path
                };
            }
            if (hops + 1 > this.maxDepth) {
                return {
                    ok: false,
                    code: ErrorCode.DEPTH_EXCEEDED,
                    reason: `Delegation from ${orgId} exceeds ${this.maxDepth} hops`,
                    path
                };
            }

            const parent = this.store.get(current.parent);
            if (!parent) {
                return { ok: false, code: ErrorCode.NOT_FOUND, reason: `Parent ${current.parent} not found`, path };
            }
            current = parent;
        }
    }

    /**
     * Parent chain from the organization up to its root, inclusive.
     */
    public ancestors(orgId: OrganizationId): OrganizationId[] {
        const chain: OrganizationId[] = [];
        const seen = new Set<OrganizationId>();
        let current: OrganizationRecord | undefined = this.store.require(orgId);
        while (current && !seen.has(current.id)) {
            seen.add(current.id);
            chain.push(current.id);
            current = current.parent === undefined ? undefined : this.store.get(current.parent);
        }
        return chain;
    }
}
