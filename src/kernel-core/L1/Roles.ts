import { ErrorCode, AccessError } from '../Errors.js';
import { DEFAULT_ADMIN_ROLE, FULL_ROLE_SET, ROLE_CAPACITY, isNullPrincipal, isRoleId } from '../L0/Ontology.js';
import type { Principal, RoleId, RoleSet } from '../L0/Ontology.js';
import { RoleGuard, enforce } from '../L0/Guards.js';
import type { Gate } from '../L0/Guards.js';
import type { InitializationGuard } from '../L0/Initialization.js';
import type { AccessKernel, Transaction } from '../Kernel.js';

export const ROLES_LAYER = 'roles';

// --- Role bit helpers ---

export function roleBit(role: RoleId): RoleSet {
    if (!isRoleId(role)) {
        throw new AccessError(ErrorCode.INVALID_ROLE, `Role ${role} outside 0..${ROLE_CAPACITY - 1}`, { role });
    }
    return 1n << BigInt(role);
}

export function roleSet(...roles: RoleId[]): RoleSet {
    return roles.reduce((bits, role) => bits | roleBit(role), 0n);
}

/** Fails with INVALID_ROLE unless the set fits in 256 non-negative bits. */
export function checkRoleSet(bits: RoleSet): RoleSet {
    if (bits < 0n || bits > FULL_ROLE_SET) {
        throw new AccessError(ErrorCode.INVALID_ROLE, `Role set ${bits.toString(16)} outside ${ROLE_CAPACITY} bits`);
    }
    return bits;
}

/** Role ids contained in a set, ascending. */
export function rolesIn(bits: RoleSet): RoleId[] {
    checkRoleSet(bits);
    const ids: RoleId[] = [];
    for (let i = 0; i < ROLE_CAPACITY && bits >> BigInt(i) !== 0n; i++) {
        if ((bits >> BigInt(i)) & 1n) ids.push(i);
    }
    return ids;
}

/**
 * Declares a named role table. Indices are checked for range and uniqueness when the
 * table is defined, so a bad table fails at module load rather than at first use.
 */
export function defineRoles<const T extends Record<string, RoleId>>(table: T): Readonly<T> {
    const seen = new Map<RoleId, string>();
    for (const [name, role] of Object.entries(table)) {
        roleBit(role);
        const clash = seen.get(role);
        if (clash !== undefined) {
            throw new AccessError(ErrorCode.INVALID_ROLE, `Roles ${clash} and ${name} share index ${role}`, { role });
        }
        seen.set(role, name);
    }
    return Object.freeze(table);
}

/**
 * Multi-Role Authorization
 *
 * Each principal holds a 256-bit role set. A role is administered by one other role
 * (DEFAULT_ADMIN_ROLE unless relinked); holders of the admin role grant and revoke it.
 */
export class RoleAuthority {
    constructor(
        private kernel: AccessKernel,
        private initialization: InitializationGuard
    ) { }

    /**
     * Seeds roles during initialization. May run several times in one sequence.
     */
    public initializeRoles(principal: Principal, roles: RoleSet): void {
        const tx = this.initialization.requireInitializing('initializeRoles');
        if (isNullPrincipal(principal)) {
            throw new AccessError(ErrorCode.INVALID_PRINCIPAL, 'Cannot seed roles for the null principal');
        }
        for (const role of rolesIn(roles)) {
            this.setRole(tx, principal, role, tx.caller);
        }
    }

    // --- Queries ---

    public rolesOf(principal: Principal): RoleSet {
        return this.kernel.view().roles.get(principal) ?? 0n;
    }

    public hasRole(principal: Principal, role: RoleId): boolean {
        return (this.rolesOf(principal) & roleBit(role)) !== 0n;
    }

    public hasAnyRole(principal: Principal, roles: RoleSet): boolean {
        return (this.rolesOf(principal) & checkRoleSet(roles)) !== 0n;
    }

    public hasAllRoles(principal: Principal, roles: RoleSet): boolean {
        return (this.rolesOf(principal) & checkRoleSet(roles)) === roles;
    }

    public getRoleAdmin(role: RoleId): RoleId {
        roleBit(role);
        return this.kernel.view().roleAdmins.get(role) ?? DEFAULT_ADMIN_ROLE;
    }

    // --- Gates ---

    public gate(roles: RoleSet): Gate {
        checkRoleSet(roles);
        return (caller) => RoleGuard({ caller, held: this.rolesOf(caller), required: roles });
    }

    public requireAnyRole(caller: Principal, roles: RoleSet, operation: string = 'requireAnyRole'): void {
        enforce(this.gate(roles)(caller), caller, operation);
    }

    public requireRole(caller: Principal, role: RoleId, operation: string = 'requireRole'): void {
        this.requireAnyRole(caller, roleBit(role), operation);
    }

    private requireAdminOf(caller: Principal, role: RoleId, operation: string): void {
        this.requireRole(caller, this.getRoleAdmin(role), operation);
    }

    // --- Mutations ---

    public grantRole(caller: Principal, principal: Principal, role: RoleId): void {
        this.grantRoles(caller, principal, roleBit(role), 'grantRole');
    }

    public revokeRole(caller: Principal, principal: Principal, role: RoleId): void {
        this.revokeRoles(caller, principal, roleBit(role), 'revokeRole');
    }

    /** Grants every role in the set; each must pass its own admin gate. */
    public grantRoles(caller: Principal, principal: Principal, roles: RoleSet, operation: string = 'grantRoles'): void {
        this.kernel.transact(operation, caller, (tx) => {
            if (isNullPrincipal(principal)) {
                throw new AccessError(ErrorCode.INVALID_PRINCIPAL, 'Cannot grant roles to the null principal', { caller });
            }
            for (const role of rolesIn(roles)) {
                this.requireAdminOf(caller, role, operation);
                this.setRole(tx, principal, role, caller);
            }
        });
    }

    public revokeRoles(caller: Principal, principal: Principal, roles: RoleSet, operation: string = 'revokeRoles'): void {
        this.kernel.transact(operation, caller, (tx) => {
            for (const role of rolesIn(roles)) {
                this.requireAdminOf(caller, role, operation);
                this.clearRole(tx, principal, role, caller);
            }
        });
    }

    /** Self-service: the caller drops one of its own roles. */
    public renounceRole(caller: Principal, role: RoleId): void {
        const bit = roleBit(role);
        this.kernel.transact('renounceRole', caller, (tx) => {
            if ((this.rolesOf(caller) & bit) !== 0n) {
                this.clearRole(tx, caller, role, caller);
            }
        });
    }

    public setRoleAdmin(caller: Principal, role: RoleId, adminRole: RoleId): void {
        roleBit(adminRole);
        this.kernel.transact('setRoleAdmin', caller, (tx) => {
            this.requireAdminOf(caller, role, 'setRoleAdmin');

            const previousAdminRole = this.getRoleAdmin(role);
            if (previousAdminRole === adminRole) return;

            if (adminRole === DEFAULT_ADMIN_ROLE) {
                tx.state.roleAdmins.delete(role);
            } else {
                tx.state.roleAdmins.set(role, adminRole);
            }
            tx.emit({ type: 'ROLE_ADMIN_CHANGED', role, previousAdminRole, newAdminRole: adminRole, changedBy: caller });
        });
    }

    // Idempotent: an already-held role changes nothing and emits nothing.
    private setRole(tx: Transaction, principal: Principal, role: RoleId, grantedBy: Principal): void {
        const held = tx.state.roles.get(principal) ?? 0n;
        const bit = roleBit(role);
        if ((held & bit) !== 0n) return;

        tx.state.roles.set(principal, held | bit);
        tx.emit({ type: 'ROLE_GRANTED', principal, role, grantedBy });
    }

    private clearRole(tx: Transaction, principal: Principal, role: RoleId, revokedBy: Principal): void {
        const held = tx.state.roles.get(principal) ?? 0n;
        const bit = roleBit(role);
        if ((held & bit) === 0n) return;

        const remaining = held & ~bit;
        if (remaining === 0n) {
            tx.state.roles.delete(principal);
        } else {
            tx.state.roles.set(principal, remaining);
        }
        tx.emit({ type: 'ROLE_REVOKED', principal, role, revokedBy });
    }
}
