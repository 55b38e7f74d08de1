import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import type { Server } from 'node:http';
import { z } from 'zod';
import { GovernanceKernel } from '../kernel-core/Kernel.js';
import {
    BallotSchema, CallerProofSchema, CancellationSchema, JsonObjectSchema
} from '../kernel-core/L0/Schemas.js';
import { ErrorCode, isKernelError } from '../kernel-core/Errors.js';

class RequestError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'RequestError';
    }
}

const RegisterSignerBody = z.object({
    id: z.string().min(1),
    publicKey: z.string().min(1)
});

const RegisterOrganizationBody = z.object({
    kind: z.enum(['PAO', 'SAO']),
    parent: z.string().min(1).optional(),
    governance: z.unknown(),
    id: z.string().min(1).optional(),
    data: JsonObjectSchema.optional()
});

const BeginTransitionBody = z.object({
    governance: z.unknown(),
    proof: CallerProofSchema
});

const AbortTransitionBody = z.object({
    reason: z.string().min(1).default('Aborted by caller')
});

const SubmitActionBody = z.object({
    kind: z.string().min(1),
    payload: JsonObjectSchema.default({}),
    proof: CallerProofSchema
});

const IssueInviteBody = z.object({
    expiresAt: z.number().int().positive(),
    proof: CallerProofSchema
});

const RedeemInviteBody = z.object({
    signerId: z.string().min(1),
    publicKey: z.string().min(1),
    signature: z.string().min(1)
});

const STATUS_BY_CODE: Partial<Record<ErrorCode, number>> = {
    [ErrorCode.NOT_FOUND]: 404,
    [ErrorCode.DUPLICATE_ID]: 409,
    [ErrorCode.INVALID_STATE]: 409,
    [ErrorCode.TRANSITION_IN_PROGRESS]: 409,
    [ErrorCode.VERSION_CONFLICT]: 409,
    [ErrorCode.HAS_DEPENDENTS]: 409,
    [ErrorCode.REPLAY_DETECTED]: 409,
    [ErrorCode.INVITE_ALREADY_USED]: 409,
    [ErrorCode.REJECTED]: 403,
    [ErrorCode.SIGNATURE_INVALID]: 403,
    [ErrorCode.NOT_ELIGIBLE]: 403,
    [ErrorCode.UNKNOWN_SIGNER]: 403,
    [ErrorCode.REVOKED_SIGNER]: 403,
    [ErrorCode.KERNEL_NOT_ACTIVE]: 503
};

export function httpStatusFor(code: ErrorCode): number {
    return STATUS_BY_CODE[code] ?? 422;
}

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
    const result = schema.safeParse(body);
    if (!result.success) {
        const issues = result.error.issues.map(i => `${i.path.join('.') || '(body)'}: ${i.message}`).join('; ');
        throw new RequestError(issues);
    }
    return result.data;
}

function param(req: Request, name: string): string {
    const value = req.params[name];
    if (value === undefined || value.length === 0) throw new RequestError(`Missing path parameter ${name}`);
    return value;
}

type Handler = (req: Request) => unknown;

/**
 * JSON binding of the kernel facade.
 * Every response is `{ ok: true, data }` or `{ ok: false, error: { code, message } }`.
 */
export class GovernanceServer {
    private app: express.Express;
    private server?: Server;

    constructor(private kernel: GovernanceKernel, private port: number = 3000) {
        this.app = express();
        this.app.use(cors());
        this.app.use(bodyParser.json());
        this.setupRoutes();
    }

    public get App(): express.Express {
        return this.app;
    }

    /**
     * Resolves with the bound port once listening.
     */
    public start(): Promise<number> {
        return new Promise((resolve, reject) => {
            const server = this.app.listen(this.port, () => {
                const address = server.address();
                const port = typeof address === 'object' && address !== null ? address.port : this.port;
                console.log(`[Server] Listening on port ${port}`);
                resolve(port);
            });
            server.on('error', reject);
            this.server = server;
        });
    }

    public stop(): Promise<void> {
        return new Promise((resolve, reject) => {
            const server = this.server;
            if (!server) {
                resolve();
                return;
            }
            server.close(err => (err ? reject(err) : resolve()));
            this.server = undefined;
        });
    }

    private setupRoutes() {
        this.app.use((req, _res, next) => {
            console.log(`[Server] ${req.method} ${req.url}`);
            next();
        });

        const k = this.kernel;

        this.app.get('/status', this.route(async () => ({
            lifecycle: k.Lifecycle,
            organizations: k.list().length,
            modules: k.Modules.kinds(),
            auditIntact: await k.verifyAudit()
        })));

        // Signers
        this.app.post('/signers', this.route(async req => {
            const body = parseBody(RegisterSignerBody, req.body);
            return k.registerSigner(body.id, body.publicKey);
        }, 201));

        // Organizations
        this.app.post('/organizations', this.route(async req => {
            const body = parseBody(RegisterOrganizationBody, req.body);
            const id = await k.register(body.kind, body.parent, body.governance, {
                ...(body.id !== undefined ? { id: body.id } : {}),
                ...(body.data !== undefined ? { data: body.data } : {})
            });
            return k.lookup(id);
        }, 201));
        this.app.get('/organizations', this.route(() => k.list()));
        this.app.get('/organizations/:id', this.route(req => k.lookup(param(req, 'id'))));
        this.app.get('/organizations/:id/dependents', this.route(req => k.listDependents(param(req, 'id'))));
        this.app.get('/organizations/:id/authority', this.route(req => k.resolveAuthority(param(req, 'id'))));
        this.app.delete('/organizations/:id', this.route(async req => {
            const id = param(req, 'id');
            await k.deregister(id);
            return { id, deregistered: true };
        }));

        // Transitions
        this.app.post('/organizations/:id/transitions', this.route(async req => {
            const body = parseBody(BeginTransitionBody, req.body);
            const handle = await k.beginTransition(param(req, 'id'), body.governance, body.proof);
            return k.getTransition(handle);
        }, 201));
        this.app.get('/transitions/:handle', this.route(req => k.getTransition(param(req, 'handle'))));
        this.app.post('/transitions/:handle/commit', this.route(req => k.commitTransition(param(req, 'handle'))));
        this.app.post('/transitions/:handle/abort', this.route(req => {
            const body = parseBody(AbortTransitionBody, req.body ?? {});
            return k.abortTransition(param(req, 'handle'), body.reason);
        }));

        // Actions
        this.app.post('/organizations/:id/actions', this.route(async req => {
            const body = parseBody(SubmitActionBody, req.body);
            const actionId = await k.submitAction(param(req, 'id'), { kind: body.kind, payload: body.payload }, body.proof);
            return k.getAction(actionId);
        }, 201));
        this.app.get('/actions/:id', this.route(req => k.getAction(param(req, 'id'))));
        this.app.post('/actions/:id/votes', this.route(req => k.vote(param(req, 'id'), parseBody(BallotSchema, req.body))));
        this.app.post('/actions/:id/finalize', this.route(req => k.finalize(param(req, 'id'))));
        this.app.post('/actions/:id/cancel', this.route(req => k.cancel(param(req, 'id'), parseBody(CancellationSchema, req.body))));

        // Invites
        this.app.post('/organizations/:id/invites', this.route(async req => {
            const body = parseBody(IssueInviteBody, req.body);
            const inviteId = await k.issueInvite(param(req, 'id'), body.expiresAt, body.proof);
            return { inviteId, action: k.getAction(inviteId), invite: k.getInvite(inviteId) ?? null };
        }, 201));
        this.app.post('/invites/:id/redeem', this.route(req => {
            const body = parseBody(RedeemInviteBody, req.body);
            return k.redeemInvite(param(req, 'id'), body.signerId, body.publicKey, body.signature);
        }));

        // Audit
        this.app.get('/audit', this.route(() => k.auditTrail()));

        // Body parser failures arrive here
        this.app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
            this.fail(res, err instanceof SyntaxError ? new RequestError('Malformed JSON body') : err);
        });
    }

    private route(handler: Handler, status: number = 200) {
        return async (req: Request, res: Response): Promise<void> => {
            try {
                const data = await handler(req);
                res.status(status).json({ ok: true, data });
            } catch (e) {
                this.fail(res, e);
            }
        };
    }

    private fail(res: Response, e: unknown): void {
        if (e instanceof RequestError) {
            res.status(400).json({ ok: false, error: { code: 'BAD_REQUEST', message: e.message } });
            return;
        }
        if (isKernelError(e)) {
            res.status(httpStatusFor(e.code)).json({ ok: false, error: { code: e.code, message: e.reason } });
            return;
        }
        console.error('[Server] Unhandled error:', e);
        res.status(500).json({ ok: false, error: { code: 'INTERNAL', message: 'Internal error' } });
    }
}
