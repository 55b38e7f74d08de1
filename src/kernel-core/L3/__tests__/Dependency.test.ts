import { describe, test, expect, beforeEach } from '@jest/globals';
import { DependencyResolver } from '../Dependency.js';
import { OrganizationStore } from '../../L2/State.js';
import { Registry } from '../../L2/Registry.js';
import { ManualClock } from '../../L0/Clock.js';
import type { OrganizationRecord } from '../../L0/Ontology.js';
import { createStandardModules } from '../../L4/modules/index.js';
import type { GovernanceModuleRegistry } from '../../L4/Governance.js';
import { AuditLog } from '../../L5/Audit.js';
import { ErrorCode } from '../../Errors.js';
import { thrownCode } from '../../__tests__/fixtures.js';

const direct = { kind: 'direct-signer', authority: 'alice' };
const delegated = { kind: 'delegated' };

// Bypasses registry checks to build shapes the registry would refuse
function raw(id: string, parent?: string): OrganizationRecord {
    return {
        id,
        kind: 'SAO',
        ...(parent !== undefined ? { parent } : {}),
        governanceModuleRef: 'delegated:0',
        governance: delegated,
        data: {},
        version: 0,
        status: 'Active',
        history: [{ version: 0, governanceModuleRef: 'delegated:0', governance: delegated, activatedAt: 0 }],
        createdAt: 0
    };
}

describe('DependencyResolver', () => {
    let store: OrganizationStore;
    let modules: GovernanceModuleRegistry;

    beforeEach(async () => {
        store = new OrganizationStore();
        modules = createStandardModules();
        const registry = new Registry(store, modules, new AuditLog(), new ManualClock(0));
        await registry.register('PAO', undefined, direct, { id: 'P' });
        await registry.register('SAO', 'P', delegated, { id: 'S1' });
        await registry.register('SAO', 'S1', delegated, { id: 'S2' });
        await registry.register('SAO', 'S2', delegated, { id: 'S3' });
        await registry.register('SAO', 'P', direct, { id: 'D' });
    });

    test('a delegation chain resolves at the first non-delegating ancestor', () => {
        const resolution = new DependencyResolver(store, modules).resolve('S3');
        expect(resolution.ok).toBe(true);
        if (resolution.ok) {
            expect(resolution.level.id).toBe('P');
            expect(resolution.path).toEqual(['S3', 'S2', 'S1', 'P']);
        }
    });

    test('an organization with its own module decides for itself', () => {
        const resolution = new DependencyResolver(store, modules).resolve('D');
        expect(resolution.ok && resolution.path).toEqual(['D']);
    });

    test('the depth bound counts hops', () => {
        expect(new DependencyResolver(store, modules, 3).resolve('S3').ok).toBe(true);

        expect(new DependencyResolver(store, modules, 2).resolve('S3')).toEqual({
            ok: false,
            code: ErrorCode.DEPTH_EXCEEDED,
            reason: 'Delegation from S3 exceeds 2 hops',
            path: ['S3', 'S2', 'S1']
        });

        const none = new DependencyResolver(store, modules, 0).resolve('S1');
        expect(!none.ok && none.code).toBe(ErrorCode.DEPTH_EXCEEDED);
        expect(none.path).toEqual(['S1']);
    });

    test('rejects a negative bound', () => {
        expect(() => new DependencyResolver(store, modules, -1)).toThrow('maxDepth must be a non-negative integer');
    });

    test('an unknown starting organization throws', () => {
        expect(thrownCode(() => new DependencyResolver(store, modules).resolve('ghost'))).toBe(ErrorCode.NOT_FOUND);
    });

    test('a delegating root is rejected', () => {
        store.insert({ ...raw('R'), kind: 'PAO' });
        expect(new DependencyResolver(store, modules).resolve('R')).toEqual({
            ok: false,
            code: ErrorCode.REJECTED,
            reason: 'R delegates but has no parent to defer to',
            path: ['R']
        });
    });

    test('a corrupted cycle is reported as an integrity breach', () => {
        store.insert(raw('A', 'B'));
        store.insert(raw('B', 'A'));
        const resolution = new DependencyResolver(store, modules).resolve('A');
        expect(!resolution.ok && resolution.code).toBe(ErrorCode.INTEGRITY_BREACH);
        expect(resolution.path).toEqual(['A', 'B']);
    });

    test('a dangling parent link is reported as not found', () => {
        store.insert(raw('orphan', 'ghost'));
        const resolution = new DependencyResolver(store, modules).resolve('orphan');
        expect(!resolution.ok && resolution.reason).toBe('Parent ghost not found');
    });

    test('ancestors lists the chain up to the root', () => {
        expect(new DependencyResolver(store, modules).ancestors('S3')).toEqual(['S3', 'S2', 'S1', 'P']);
        expect(new DependencyResolver(store, modules).ancestors('P')).toEqual(['P']);
    });
});
