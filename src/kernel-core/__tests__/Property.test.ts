import { describe, test, expect } from '@jest/globals';
import fc from 'fast-check';
import { RoleAuthority, roleBit } from '../L1/Roles.js';
import { anyOf } from '../L0/Guards.js';
import type { Gate } from '../L0/Guards.js';
import { DEFAULT_ADMIN_ROLE } from '../L0/Ontology.js';
import type { Principal, RoleSet } from '../L0/Ontology.js';
import { isAccessError } from '../Errors.js';
import { ALICE, BOB, CAROL, makeKernel } from './helpers.js';

const actors = [ALICE, BOB, CAROL];
const actor = fc.constantFrom(...actors);
const role = fc.constantFrom(0, 1, 2, DEFAULT_ADMIN_ROLE);

const operation = fc.oneof(
    fc.record({ kind: fc.constant('grant' as const), caller: actor, target: actor, role }),
    fc.record({ kind: fc.constant('revoke' as const), caller: actor, target: actor, role }),
    fc.record({ kind: fc.constant('renounce' as const), caller: actor, target: actor, role }),
    fc.record({ kind: fc.constant('relink' as const), caller: actor, target: actor, role, admin: role })
);

describe('Role authority properties', () => {
    test('role sets always equal the fold of committed grant and revoke events', () => {
        fc.assert(
            fc.property(fc.array(operation, { maxLength: 40 }), (ops) => {
                const { kernel, initialization } = makeKernel();
                const roles = new RoleAuthority(kernel, initialization);
                initialization.initialize(ALICE, () => roles.initializeRoles(ALICE, roleBit(DEFAULT_ADMIN_ROLE)));

                for (const op of ops) {
                    const before = actors.map((p) => roles.rolesOf(p));
                    try {
                        switch (op.kind) {
                            case 'grant':
                                roles.grantRole(op.caller, op.target, op.role);
                                break;
                            case 'revoke':
                                roles.revokeRole(op.caller, op.target, op.role);
                                break;
                            case 'renounce':
                                roles.renounceRole(op.caller, op.role);
                                break;
                            case 'relink':
                                roles.setRoleAdmin(op.caller, op.role, op.admin);
                                break;
                        }
                    } catch (err) {
                        // Only authorization failures are expected, and they change nothing
                        expect(isAccessError(err)).toBe(true);
                        expect(actors.map((p) => roles.rolesOf(p))).toEqual(before);
                    }
                }

                const folded = new Map<Principal, RoleSet>();
                for (const { event } of kernel.Audit.getHistory()) {
                    if (event.type === 'ROLE_GRANTED') {
                        folded.set(event.principal, (folded.get(event.principal) ?? 0n) | roleBit(event.role));
                    } else if (event.type === 'ROLE_REVOKED') {
                        folded.set(event.principal, (folded.get(event.principal) ?? 0n) & ~roleBit(event.role));
                    }
                }

                for (const p of actors) {
                    expect(roles.rolesOf(p)).toBe(folded.get(p) ?? 0n);
                }
                expect(kernel.Audit.verifyChain()).toBe(true);
            }),
            { numRuns: 50 }
        );
    });

    test('anyOf passes exactly when some gate passes', () => {
        fc.assert(
            fc.property(fc.array(fc.boolean(), { maxLength: 6 }), (outcomes) => {
                const gates: Gate[] = outcomes.map((ok, i): Gate => () => (ok ? { ok: true } : { ok: false, violation: `g${i}` }));
                expect(anyOf(...gates)(ALICE).ok).toBe(outcomes.some(Boolean));
            })
        );
    });
});
