// src/kernel-core/L6/Capabilities.ts
import { hash } from '../L0/Crypto.js';

/** Four-byte capability identifier, `0x` + 8 lowercase hex digits. */
export type CapabilityId = string;

const CAPABILITY_FORMAT = /^0x[0-9a-f]{8}$/;

/** Reserved: never supported by any object. */
export const INVALID_CAPABILITY: CapabilityId = '0xffffffff';

/**
 * First four bytes of the operation signature's hash.
 */
export function selector(signature: string): CapabilityId {
    return `0x${hash(signature).slice(0, 8)}`;
}

/**
 * A capability group is identified by the XOR of its operations' selectors.
 */
export function capabilityId(signatures: readonly string[]): CapabilityId {
    const folded = signatures.reduce((acc, sig) => (acc ^ parseInt(selector(sig).slice(2), 16)) >>> 0, 0);
    return `0x${folded.toString(16).padStart(8, '0')}`;
}

export function isCapabilityId(value: string): boolean {
    return CAPABILITY_FORMAT.test(value);
}

/**
 * Operation signatures of each capability group.
 */
export const CapabilitySignatures = {
    INTROSPECTION: ['supportsCapability(bytes4)'],
    OWNABLE: ['owner()', 'transferOwnership(address)', 'renounceOwnership()'],
    OWNERSHIP_HANDOVER: [
        'requestOwnershipHandover()',
        'cancelOwnershipHandover()',
        'completeOwnershipHandover(address)',
        'ownershipHandoverExpiresAt(address)'
    ],
    ROLES: [
        'hasRole(address,uint8)',
        'getRoleAdmin(uint8)',
        'grantRole(address,uint8)',
        'revokeRole(address,uint8)',
        'renounceRole(uint8)',
        'setRoleAdmin(uint8,uint8)'
    ]
} as const;

export const Capabilities = {
    INTROSPECTION: capabilityId(CapabilitySignatures.INTROSPECTION),
    OWNABLE: capabilityId(CapabilitySignatures.OWNABLE),
    OWNERSHIP_HANDOVER: capabilityId(CapabilitySignatures.OWNERSHIP_HANDOVER),
    ROLES: capabilityId(CapabilitySignatures.ROLES)
} as const;

/**
 * Capability Registry
 * Each composed authorization strategy registers its ids at construction; the
 * introspection query is a membership test over the union.
 */
export class CapabilityRegistry {
    private ids: Set<CapabilityId> = new Set([Capabilities.INTROSPECTION]);

    public register(id: CapabilityId): void {
        const normalized = id.toLowerCase();
        if (!isCapabilityId(normalized)) {
            throw new Error(`CapabilityRegistry: malformed capability id ${id}`);
        }
        if (normalized === INVALID_CAPABILITY) {
            throw new Error(`CapabilityRegistry: ${INVALID_CAPABILITY} is reserved`);
        }
        this.ids.add(normalized);
    }

    public supports(id: CapabilityId): boolean {
        const normalized = id.toLowerCase();
        return isCapabilityId(normalized) && this.ids.has(normalized);
    }

    public list(): CapabilityId[] {
        return [...this.ids].sort();
    }
}
