import { z } from 'zod';
import { ErrorCode, AccessError } from '../Errors.js';
import { FULL_ROLE_SET, ROLE_CAPACITY } from '../L0/Ontology.js';
import type { AccessState, Evidence } from '../L0/Ontology.js';

/**
 * Persistence Port: State Store
 * A stable storage region keyed by object identity. `commit` writes the new state and the
 * evidence it produced as one unit; implementations must apply both or neither, and must
 * reject the commit with STATE_CONFLICT when the stored tip is no longer `expectedTip`
 * (the evidence id the writer built on, or null for an empty chain).
 */
export interface IStateStore {
    load(objectId: string): AccessState | null;
    commit(objectId: string, state: AccessState, evidence: readonly Evidence[], expectedTip: string | null): void;
    getHistory(objectId: string): Evidence[];
    getLatest(objectId: string): Evidence | null;
}

// --- Persisted form ---
// Maps become entry lists, role sets become hex strings.

const principal = z.string().min(1);
const roleId = z.number().int().min(0).max(ROLE_CAPACITY - 1);
const roleSet = z
    .string()
    .regex(/^0x[0-9a-f]+$/)
    .transform((hex) => BigInt(hex))
    .refine((bits) => bits > 0n && bits <= FULL_ROLE_SET, 'role set out of range');

export const PersistedStateSchema = z.object({
    // INITIALIZING only exists inside an open transaction and is never committed
    initialization: z.enum(['UNINITIALIZED', 'INITIALIZED']),
    owner: principal,
    handovers: z.array(z.tuple([principal, z.number().int().nonnegative()])),
    roles: z.array(z.tuple([principal, roleSet])),
    roleAdmins: z.array(z.tuple([roleId, roleId]))
});

export function encodeState(state: AccessState): string {
    return JSON.stringify({
        initialization: state.initialization,
        owner: state.owner,
        handovers: [...state.handovers.entries()],
        roles: [...state.roles.entries()].map(([p, bits]) => [p, `0x${bits.toString(16)}`]),
        roleAdmins: [...state.roleAdmins.entries()]
    });
}

export function decodeState(raw: string): AccessState {
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (e) {
        throw new AccessError(ErrorCode.STATE_CORRUPTED, `Persisted state is not JSON: ${String(e)}`);
    }

    const parsed = PersistedStateSchema.safeParse(json);
    if (!parsed.success) {
        throw new AccessError(ErrorCode.STATE_CORRUPTED, 'Persisted state failed validation', {
            issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
        });
    }

    const data = parsed.data;
    return {
        initialization: data.initialization,
        owner: data.owner,
        handovers: new Map(data.handovers),
        roles: new Map(data.roles),
        roleAdmins: new Map(data.roleAdmins)
    };
}

export function assertTip(objectId: string, actual: string | null, expected: string | null): void {
    if (actual !== expected) {
        throw new AccessError(ErrorCode.STATE_CONFLICT, `Object ${objectId} was modified concurrently`, {
            objectId,
            expected,
            actual
        });
    }
}

/**
 * In-process store. Keeps the encoded form so every load goes through the codec.
 */
export class MemoryStateStore implements IStateStore {
    private states: Map<string, string> = new Map();
    private evidence: Map<string, Evidence[]> = new Map();

    load(objectId: string): AccessState | null {
        const raw = this.states.get(objectId);
        return raw === undefined ? null : decodeState(raw);
    }

    commit(objectId: string, state: AccessState, evidence: readonly Evidence[], expectedTip: string | null): void {
        const chain = this.evidence.get(objectId) ?? [];
        assertTip(objectId, chain[chain.length - 1]?.evidenceId ?? null, expectedTip);

        const encoded = encodeState(state);
        this.states.set(objectId, encoded);
        this.evidence.set(objectId, [...chain, ...evidence]);
    }

    getHistory(objectId: string): Evidence[] {
        return [...(this.evidence.get(objectId) ?? [])];
    }

    getLatest(objectId: string): Evidence | null {
        const chain = this.evidence.get(objectId);
        return chain?.[chain.length - 1] ?? null;
    }
}
