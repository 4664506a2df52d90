// src/kernel-core/L0/Crypto.ts
import { createHash } from 'crypto';
import * as ed from '@noble/ed25519';
import type { Principal } from './Ontology.js';

// 1.1 Hash Function (SHA-256)
export function hash(data: string): string {
    return createHash('sha256').update(data).digest('hex');
}

// 1.2 Canonical JSON (sorted keys, bigint as hex)
export function canonicalize(value: unknown): string {
    return JSON.stringify(sortValue(value));
}

function sortValue(value: unknown): unknown {
    if (typeof value === 'bigint') return `0x${value.toString(16)}`;
    if (value === null || typeof value !== 'object') return value;
    if (Array.isArray(value)) return value.map(sortValue);

    const entries: [string, unknown][] = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

    const sorted: Record<string, unknown> = {};
    for (const [key, inner] of entries) {
        sorted[key] = sortValue(inner);
    }
    return sorted;
}

// 1.3 Digital Signatures (Ed25519, hex encoded)
export type Ed25519PublicKey = string;
export type Ed25519PrivateKey = string;
export type Signature = string;

export interface KeyPair {
    publicKey: Ed25519PublicKey;
    privateKey: Ed25519PrivateKey;
}

const toHex = (bytes: Uint8Array): string => Buffer.from(bytes).toString('hex');

export async function generateKeyPair(): Promise<KeyPair> {
    const privateKey = ed.utils.randomPrivateKey();
    const publicKey = await ed.getPublicKey(privateKey);
    return { publicKey: toHex(publicKey), privateKey: toHex(privateKey) };
}

export async function signData(data: string, privateKey: Ed25519PrivateKey): Promise<Signature> {
    return toHex(await ed.sign(Buffer.from(data), privateKey));
}

export async function verifySignature(data: string, signature: Signature, publicKey: Ed25519PublicKey): Promise<boolean> {
    try {
        return await ed.verify(signature, Buffer.from(data), publicKey);
    } catch {
        // Malformed key or signature encoding
        return false;
    }
}

// 1.4 Principal derivation: trailing 20 bytes of the key hash
export function principalFromPublicKey(publicKey: Ed25519PublicKey): Principal {
    return `0x${hash(publicKey.toLowerCase()).slice(-40)}`;
}
