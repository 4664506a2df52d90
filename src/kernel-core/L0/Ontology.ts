/**
 * ACCESS ONTOLOGY
 * The single source of truth for kernel primitives.
 */

// --- 1. Principal ---
// An authenticated actor. Opaque to the kernel beyond equality.
export type Principal = string;

export const NULL_PRINCIPAL: Principal = '0x0000000000000000000000000000000000000000';

const PRINCIPAL_FORMAT = /^0x[0-9a-fA-F]{40}$/;

export function isPrincipal(value: string): boolean {
    return PRINCIPAL_FORMAT.test(value);
}

export function normalizePrincipal(value: string): Principal | null {
    return isPrincipal(value) ? value.toLowerCase() : null;
}

export function isNullPrincipal(p: Principal): boolean {
    return p === NULL_PRINCIPAL;
}

// --- 2. Initialization ---
export type InitializationState = 'UNINITIALIZED' | 'INITIALIZING' | 'INITIALIZED';

// --- 3. Roles ---
// Bit index into a principal's role set.
export type RoleId = number;
// 256-bit mask; bit i set <=> role i held.
export type RoleSet = bigint;

export const ROLE_CAPACITY = 256;
export const DEFAULT_ADMIN_ROLE: RoleId = ROLE_CAPACITY - 1;
export const FULL_ROLE_SET: RoleSet = (1n << BigInt(ROLE_CAPACITY)) - 1n;

export function isRoleId(value: number): boolean {
    return Number.isInteger(value) && value >= 0 && value < ROLE_CAPACITY;
}

// --- 4. Object State ---
export interface AccessState {
    readonly initialization: InitializationState;
    readonly owner: Principal;
    /** Pending ownership handovers: pending owner -> expiry (epoch ms) */
    readonly handovers: ReadonlyMap<Principal, number>;
    /** Absent principal <=> empty role set */
    readonly roles: ReadonlyMap<Principal, RoleSet>;
    /** Absent role <=> administered by DEFAULT_ADMIN_ROLE */
    readonly roleAdmins: ReadonlyMap<RoleId, RoleId>;
}

export function genesisState(): AccessState {
    return {
        initialization: 'UNINITIALIZED',
        owner: NULL_PRINCIPAL,
        handovers: new Map(),
        roles: new Map(),
        roleAdmins: new Map()
    };
}

// --- 5. Observable Events ---
export type AccessEvent =
    | { type: 'INITIALIZED'; by: Principal }
    | { type: 'OWNERSHIP_TRANSFERRED'; previousOwner: Principal; newOwner: Principal }
    | { type: 'OWNERSHIP_HANDOVER_REQUESTED'; pendingOwner: Principal; expiresAt: number }
    | { type: 'OWNERSHIP_HANDOVER_CANCELED'; pendingOwner: Principal }
    | { type: 'ROLE_GRANTED'; principal: Principal; role: RoleId; grantedBy: Principal }
    | { type: 'ROLE_REVOKED'; principal: Principal; role: RoleId; revokedBy: Principal }
    | { type: 'ROLE_ADMIN_CHANGED'; role: RoleId; previousAdminRole: RoleId; newAdminRole: RoleId; changedBy: Principal };

export type AccessEventType = AccessEvent['type'];

// --- 6. Evidence ---
// A committed event, chained to its predecessor for the same object.
export interface Evidence {
    evidenceId: string;
    previousEvidenceId: string;
    objectId: string;
    sequence: number;
    operation: string;
    caller: Principal;
    event: AccessEvent;
    timestamp: number;
}
