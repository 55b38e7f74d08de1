// src/kernel-core/L3/Effects.ts
import { z } from 'zod';
import { ActionKinds } from '../L0/Ontology.js';
import type { ActionRecord, JsonObject } from '../L0/Ontology.js';
import { JsonValueSchema } from '../L0/Schemas.js';
import type { ISystemClock } from '../L0/Clock.js';
import type { InviteBook } from '../L1/Invites.js';
import type { OrganizationStore } from '../L2/State.js';
import type { AuditLog } from '../L5/Audit.js';
import type { ActionEngine, ActionEffect } from './Actions.js';
import { ErrorCode, KernelError } from '../Errors.js';

const FORBIDDEN_KEYS = new Set(['__proto__', 'prototype', 'constructor']);

const DataKey = z.string().min(1).max(256).refine(key => !FORBIDDEN_KEYS.has(key), { message: 'Reserved key' });

const DataPutPayload = z.object({ key: DataKey, value: JsonValueSchema }).strict();
const DataDeletePayload = z.object({ key: DataKey }).strict();
const InvitePayload = z.object({ expiresAt: z.number().int().positive() }).strict();
const EmptyPayload = z.object({}).strict();

function parsePayload<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, kind: string, payload: JsonObject): T {
    const result = schema.safeParse(payload);
    if (!result.success) {
        const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
        throw new KernelError(ErrorCode.INVALID_ACTION, `Invalid ${kind} payload: ${issues}`);
    }
    return result.data;
}

/**
 * Registers the effects of the built-in action kinds. Kinds without an
 * effect are approval-only.
 */
export function registerStandardEffects(
    actions: ActionEngine,
    store: OrganizationStore,
    invites: InviteBook,
    audit: AuditLog,
    clock: ISystemClock
): void {
    const dataPut: ActionEffect = {
        validate: payload => { parsePayload(DataPutPayload, ActionKinds.DATA_PUT, payload); },
        apply: async (action: ActionRecord) => {
            const { key, value } = parsePayload(DataPutPayload, ActionKinds.DATA_PUT, action.payload);
            const current = store.require(action.orgId);
            store.replaceData(action.orgId, { ...current.data, [key]: value }, { status: ['Active'] });
        }
    };

    const dataDelete: ActionEffect = {
        validate: payload => { parsePayload(DataDeletePayload, ActionKinds.DATA_DELETE, payload); },
        apply: async (action: ActionRecord) => {
            const { key } = parsePayload(DataDeletePayload, ActionKinds.DATA_DELETE, action.payload);
            const data: JsonObject = { ...store.require(action.orgId).data };
            delete data[key];
            store.replaceData(action.orgId, data, { status: ['Active'] });
        }
    };

    const freezeOrg: ActionEffect = {
        validate: payload => { parsePayload(EmptyPayload, ActionKinds.FREEZE, payload); },
        apply: async (action: ActionRecord) => {
            store.compareAndSetStatus(action.orgId, 'Active', 'Frozen');
            console.log(`[Effects] ${action.orgId} frozen`);
        }
    };

    const unfreezeOrg: ActionEffect = {
        validate: payload => { parsePayload(EmptyPayload, ActionKinds.UNFREEZE, payload); },
        apply: async (action: ActionRecord) => {
            store.compareAndSetStatus(action.orgId, 'Frozen', 'Active');
            console.log(`[Effects] ${action.orgId} unfrozen`);
        }
    };

    const invite: ActionEffect = {
        validate: payload => { parsePayload(InvitePayload, ActionKinds.INVITE, payload); },
        apply: async (action: ActionRecord) => {
            const { expiresAt } = parsePayload(InvitePayload, ActionKinds.INVITE, action.payload);
            const issued = invites.issue(action.actionId, action.orgId, expiresAt);
            await audit.append({
                type: 'INVITE_ISSUED',
                subject: issued.inviteId,
                orgId: issued.orgId,
                actor: action.proposer,
                detail: { expiresAt: issued.expiresAt }
            }, 'SUCCESS', clock.now());
        }
    };

    actions.registerEffect(ActionKinds.DATA_PUT, dataPut);
    actions.registerEffect(ActionKinds.DATA_DELETE, dataDelete);
    actions.registerEffect(ActionKinds.FREEZE, freezeOrg);
    actions.registerEffect(ActionKinds.UNFREEZE, unfreezeOrg);
    actions.registerEffect(ActionKinds.INVITE, invite);
}
