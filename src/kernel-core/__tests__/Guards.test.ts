import { describe, test, expect } from '@jest/globals';
import { OwnerGuard, RoleGuard, anyOf, enforce } from '../L0/Guards.js';
import type { Gate } from '../L0/Guards.js';
import { NULL_PRINCIPAL } from '../L0/Ontology.js';
import { ALICE, BOB } from './helpers.js';

const pass: Gate = () => ({ ok: true });
const failWith = (violation: string): Gate => () => ({ ok: false, violation });

describe('Guards', () => {
    test('OwnerGuard', () => {
        expect(OwnerGuard({ caller: ALICE, owner: ALICE })).toEqual({ ok: true });
        expect(OwnerGuard({ caller: BOB, owner: ALICE })).toEqual({ ok: false, violation: `${BOB} is not the owner` });
        expect(OwnerGuard({ caller: NULL_PRINCIPAL, owner: NULL_PRINCIPAL })).toEqual({
            ok: false,
            violation: 'Null principal cannot act as owner'
        });
    });

    test('RoleGuard passes on any intersection', () => {
        expect(RoleGuard({ caller: ALICE, held: 0b10n, required: 0b11n }).ok).toBe(true);
        expect(RoleGuard({ caller: ALICE, held: 0b100n, required: 0b11n })).toEqual({
            ok: false,
            violation: `${ALICE} holds none of roles 0x3`
        });
        expect(RoleGuard({ caller: NULL_PRINCIPAL, held: 1n, required: 1n }).ok).toBe(false);
    });

    test('anyOf passes when one gate passes', () => {
        expect(anyOf(failWith('x'), pass)(ALICE)).toEqual({ ok: true });
    });

    test('anyOf reports every violation when all fail', () => {
        expect(anyOf(failWith('x'), failWith('y'))(ALICE)).toEqual({ ok: false, violation: 'x; y' });
    });

    test('anyOf with no gates authorizes nobody', () => {
        expect(anyOf()(ALICE)).toEqual({ ok: false, violation: 'No gate configured' });
    });

    test('enforce throws UNAUTHORIZED with the operation name', () => {
        expect(() => enforce({ ok: true }, ALICE, 'op')).not.toThrow();
        expect(() => enforce({ ok: false, violation: 'x' }, ALICE, 'op')).toThrow('[Access:UNAUTHORIZED] op: x');
    });
});
