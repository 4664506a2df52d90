import express from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import type { Server } from 'http';
import type { NextFunction, Request, Response } from 'express';
import { z, ZodError } from 'zod';
import { ErrorCode, AccessError } from '../kernel-core/Errors.js';
import { ROLE_CAPACITY, isPrincipal } from '../kernel-core/L0/Ontology.js';
import type { Principal } from '../kernel-core/L0/Ontology.js';
import { rolesIn } from '../kernel-core/L1/Roles.js';
import type { OwnableRolesSample } from '../Products/Samples/OwnableRolesSample.js';
import type { RequestAuthenticator } from './Authentication.js';
import type { Logger } from '../logging.js';

const principal = z
    .string()
    .refine(isPrincipal, 'expected 0x-prefixed 20-byte hex principal')
    .transform((p) => p.toLowerCase());
const role = z.number().int().min(0).max(ROLE_CAPACITY - 1);

const Bodies = {
    initialize: z.object({ owner: principal }),
    transfer: z.object({ newOwner: principal }),
    complete: z.object({ pendingOwner: principal }),
    grant: z.object({ principal, role }),
    renounceRole: z.object({ role }),
    roleAdmin: z.object({ role, adminRole: role })
};

const STATUS: Record<ErrorCode, number> = {
    [ErrorCode.AUTHENTICATION_FAILED]: 401,
    [ErrorCode.UNAUTHORIZED]: 403,
    [ErrorCode.ALREADY_INITIALIZED]: 409,
    [ErrorCode.INVALID_INITIALIZATION_ORDER]: 409,
    [ErrorCode.NO_HANDOVER_REQUEST]: 409,
    [ErrorCode.STATE_CONFLICT]: 409,
    [ErrorCode.INVALID_OWNER]: 400,
    [ErrorCode.INVALID_ROLE]: 400,
    [ErrorCode.INVALID_PRINCIPAL]: 400,
    [ErrorCode.STATE_CORRUPTED]: 500
};

type SignedHandler = (caller: Principal, body: unknown) => Record<string, unknown>;

export interface AccessServerOptions {
    service: OwnableRolesSample;
    authenticator: RequestAuthenticator;
    logger: Logger;
}

/**
 * HTTP surface over one access-controlled service.
 * Reads are public; every mutation and gated call must be signed.
 */
export class AccessServer {
    private app: express.Express;
    private server: Server | undefined;
    private service: OwnableRolesSample;
    private authenticator: RequestAuthenticator;
    private log: Logger;

    constructor(options: AccessServerOptions) {
        this.service = options.service;
        this.authenticator = options.authenticator;
        this.log = options.logger.child({ component: 'http' });

        this.app = express();
        this.app.use(cors());
        this.app.use(bodyParser.json());
        this.app.use((req, _res, next) => {
            this.log.info({ method: req.method, path: req.path }, 'request');
            next();
        });

        this.setupRoutes();
        this.app.use(this.handleError);
    }

    /** Resolves with the bound port (useful when `port` is 0). */
    public listen(port: number): Promise<number> {
        return new Promise((resolve, reject) => {
            const server = this.app.listen(port);
            server.once('error', reject);
            server.once('listening', () => {
                const address = server.address();
                if (address === null || typeof address === 'string') {
                    reject(new Error('Server is not bound to a TCP port'));
                    return;
                }
                this.server = server;
                this.log.info({ port: address.port }, 'listening');
                resolve(address.port);
            });
        });
    }

    public close(): Promise<void> {
        const server = this.server;
        if (!server) return Promise.resolve();
        this.server = undefined;
        return new Promise((resolve, reject) => {
            server.close((err) => (err ? reject(err) : resolve()));
        });
    }

    private setupRoutes() {
        const svc = this.service;

        // --- Queries ---
        this.app.get('/capabilities/:id', (req, res) => {
            res.json({ id: req.params.id, supported: svc.supportsCapability(req.params.id) });
        });

        this.app.get('/owner', (_req, res) => {
            res.json({ owner: svc.ownership.owner() });
        });

        this.app.get('/roles/:principal', (req, res) => {
            const p = principal.parse(req.params.principal);
            const bits = svc.roles.rolesOf(p);
            res.json({ principal: p, roles: rolesIn(bits), mask: `0x${bits.toString(16)}` });
        });

        this.app.get('/audit', (_req, res) => {
            res.json(svc.history());
        });

        // --- Initialization ---
        this.signed('/initialize', (caller, body) => {
            const { owner } = Bodies.initialize.parse(body);
            svc.initialize(caller, owner);
            return { owner: svc.ownership.owner() };
        });

        // --- Ownership ---
        this.signed('/ownership/transfer', (caller, body) => {
            const { newOwner } = Bodies.transfer.parse(body);
            svc.ownership.transferOwnership(caller, newOwner);
            return { owner: svc.ownership.owner() };
        });
        this.signed('/ownership/renounce', (caller) => {
            svc.ownership.renounceOwnership(caller);
            return { owner: svc.ownership.owner() };
        });
        this.signed('/ownership/handover/request', (caller) => ({
            expiresAt: svc.ownership.requestOwnershipHandover(caller)
        }));
        this.signed('/ownership/handover/cancel', (caller) => {
            svc.ownership.cancelOwnershipHandover(caller);
            return { ok: true };
        });
        this.signed('/ownership/handover/complete', (caller, body) => {
            const { pendingOwner } = Bodies.complete.parse(body);
            svc.ownership.completeOwnershipHandover(caller, pendingOwner);
            return { owner: svc.ownership.owner() };
        });

        // --- Roles ---
        this.signed('/roles/grant', (caller, body) => {
            const input = Bodies.grant.parse(body);
            svc.roles.grantRole(caller, input.principal, input.role);
            return { principal: input.principal, roles: rolesIn(svc.roles.rolesOf(input.principal)) };
        });
        this.signed('/roles/revoke', (caller, body) => {
            const input = Bodies.grant.parse(body);
            svc.roles.revokeRole(caller, input.principal, input.role);
            return { principal: input.principal, roles: rolesIn(svc.roles.rolesOf(input.principal)) };
        });
        this.signed('/roles/renounce', (caller, body) => {
            const { role: r } = Bodies.renounceRole.parse(body);
            svc.roles.renounceRole(caller, r);
            return { principal: caller, roles: rolesIn(svc.roles.rolesOf(caller)) };
        });
        this.signed('/roles/admin', (caller, body) => {
            const input = Bodies.roleAdmin.parse(body);
            svc.roles.setRoleAdmin(caller, input.role, input.adminRole);
            return { role: input.role, adminRole: svc.roles.getRoleAdmin(input.role) };
        });

        // --- Gated samples ---
        this.signed('/sample/owner', (caller) => ({ ok: svc.onlyOwnerSampleFunction(caller) }));
        this.signed('/sample/roles', (caller) => ({ ok: svc.onlyRolesSampleFunction(caller) }));
        this.signed('/sample/owner-or-roles', (caller) => ({ ok: svc.onlyOwnerOrRolesSampleFunction(caller) }));
    }

    private signed(path: string, handler: SignedHandler): void {
        this.app.post(path, (req, res, next) => {
            const body: unknown = req.body;
            this.authenticator
                .authenticate(req.method, req.path, req.headers, body)
                .then((caller) => {
                    res.json(handler(caller, body));
                })
                .catch(next);
        });
    }

    private handleError = (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
        if (err instanceof AccessError) {
            const status = STATUS[err.code];
            if (status >= 500) {
                this.log.error({ err, path: req.path }, 'request failed');
            } else {
                this.log.warn({ code: err.code, path: req.path, reason: err.reason }, 'request rejected');
            }
            res.status(status).json({ error: { code: err.code, message: err.message } });
            return;
        }
        if (err instanceof ZodError) {
            const message = err.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');
            res.status(400).json({ error: { code: 'INVALID_REQUEST', message } });
            return;
        }
        // body-parser rejects malformed JSON with a SyntaxError
        if (err instanceof SyntaxError) {
            res.status(400).json({ error: { code: 'INVALID_REQUEST', message: 'Malformed JSON body' } });
            return;
        }

        this.log.error({ err, path: req.path }, 'unhandled error');
        res.status(500).json({ error: { code: 'INTERNAL', message: 'Internal server error' } });
    };
}
