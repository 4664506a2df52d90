// src/kernel-core/L0/Guards.ts
import { ErrorCode, AccessError } from '../Errors.js';
import { isNullPrincipal } from './Ontology.js';
import type { Principal, RoleSet } from './Ontology.js';

// --- Guard Pattern ---
export type GuardResult = { ok: true } | { ok: false; violation: string };

export type Guard<T> = (input: T) => GuardResult;

/** A guard already bound to authorization state, awaiting only the caller. */
export type Gate = Guard<Principal>;

const OK: GuardResult = { ok: true };
const FAIL = (msg: string): GuardResult => ({ ok: false, violation: msg });

// --- Concrete Guards ---

// 1. Ownership. A renounced object (owner = null) authorizes nobody, the sentinel included.
export const OwnerGuard: Guard<{ caller: Principal; owner: Principal }> = ({ caller, owner }) => {
    if (isNullPrincipal(caller)) return FAIL('Null principal cannot act as owner');
    if (caller !== owner) return FAIL(`${caller} is not the owner`);
    return OK;
};

// 2. Roles (any-of semantics over the required set)
export const RoleGuard: Guard<{ caller: Principal; held: RoleSet; required: RoleSet }> = ({ caller, held, required }) => {
    if (isNullPrincipal(caller)) return FAIL('Null principal cannot hold roles');
    if ((held & required) === 0n) {
        return FAIL(`${caller} holds none of roles 0x${required.toString(16)}`);
    }
    return OK;
};

// --- Composition ---

/**
 * OR-composition: passes when any gate passes. Violations of all failing gates are reported.
 */
export function anyOf(...gates: Gate[]): Gate {
    return (caller) => {
        const violations: string[] = [];
        for (const gate of gates) {
            const result = gate(caller);
            if (result.ok) return OK;
            violations.push(result.violation);
        }
        return FAIL(violations.length > 0 ? violations.join('; ') : 'No gate configured');
    };
}

/**
 * Throws UNAUTHORIZED when the guard result is a failure.
 */
export function enforce(result: GuardResult, caller: Principal, operation: string): void {
    if (!result.ok) {
        throw new AccessError(ErrorCode.UNAUTHORIZED, `${operation}: ${result.violation}`, { caller, operation });
    }
}
