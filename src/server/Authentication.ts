import type { IncomingHttpHeaders } from 'http';
import { ErrorCode, AccessError } from '../kernel-core/Errors.js';
import { canonicalize, principalFromPublicKey, verifySignature } from '../kernel-core/L0/Crypto.js';
import type { Principal } from '../kernel-core/L0/Ontology.js';
import type { ISystemClock } from '../Platform/Ports.js';

export const HEADER_PUBLIC_KEY = 'x-public-key';
export const HEADER_TIMESTAMP = 'x-timestamp';
export const HEADER_SIGNATURE = 'x-signature';

const PUBLIC_KEY_FORMAT = /^[0-9a-fA-F]{64}$/;
const TIMESTAMP_FORMAT = /^\d+$/;

/** The exact string a client signs for a request. */
export function signingPayload(method: string, path: string, timestamp: number, body: unknown): string {
    return `${method.toUpperCase()}\n${path}\n${timestamp}\n${canonicalize(body ?? {})}`;
}

export interface AuthenticatorOptions {
    clock: ISystemClock;
    maxSkewMs: number;
}

/**
 * Resolves the calling principal from an ed25519-signed request.
 * A signature is accepted once; it is remembered for as long as its timestamp is within skew.
 */
export class RequestAuthenticator {
    private seen: Map<string, number> = new Map();

    constructor(private options: AuthenticatorOptions) { }

    public async authenticate(method: string, path: string, headers: IncomingHttpHeaders, body: unknown): Promise<Principal> {
        const publicKey = header(headers, HEADER_PUBLIC_KEY);
        const rawTimestamp = header(headers, HEADER_TIMESTAMP);
        const signature = header(headers, HEADER_SIGNATURE);

        if (publicKey === undefined || rawTimestamp === undefined || signature === undefined) {
            throw fail('Missing signature headers');
        }
        if (!PUBLIC_KEY_FORMAT.test(publicKey)) throw fail('Malformed public key');
        if (!TIMESTAMP_FORMAT.test(rawTimestamp)) throw fail('Malformed timestamp');

        const timestamp = Number(rawTimestamp);
        const now = this.options.clock.now();
        if (Math.abs(now - timestamp) > this.options.maxSkewMs) {
            throw fail(`Timestamp ${timestamp} outside allowed skew`);
        }

        this.prune(now);
        const replayKey = signature.toLowerCase();
        if (this.seen.has(replayKey)) throw fail('Replayed request');

        // Reserved before verification so a concurrent copy of the request sees it
        this.seen.set(replayKey, timestamp);
        const valid = await verifySignature(signingPayload(method, path, timestamp, body), signature, publicKey);
        if (!valid) {
            this.seen.delete(replayKey);
            throw fail('Invalid signature');
        }

        return principalFromPublicKey(publicKey);
    }

    private prune(now: number): void {
        for (const [sig, ts] of this.seen) {
            if (now - ts > this.options.maxSkewMs) this.seen.delete(sig);
        }
    }
}

function header(headers: IncomingHttpHeaders, name: string): string | undefined {
    const value = headers[name];
    return typeof value === 'string' && value.length > 0 ? value : undefined;
}

const fail = (reason: string): AccessError => new AccessError(ErrorCode.AUTHENTICATION_FAILED, reason);
