import { describe, test, expect } from '@jest/globals';
import { MemoryStateStore, decodeState, encodeState } from '../L2/State.js';
import { DEFAULT_ADMIN_ROLE, NULL_PRINCIPAL, genesisState } from '../L0/Ontology.js';
import type { AccessState } from '../L0/Ontology.js';
import { ALICE, BOB } from './helpers.js';

const populated: AccessState = {
    initialization: 'INITIALIZED',
    owner: ALICE,
    handovers: new Map([[BOB, 5_000]]),
    roles: new Map([[ALICE, (1n << 255n) | 1n]]),
    roleAdmins: new Map([[0, 1]])
};

describe('state codec', () => {
    test('genesis encodes to empty lists', () => {
        expect(encodeState(genesisState())).toBe(
            `{"initialization":"UNINITIALIZED","owner":"${NULL_PRINCIPAL}","handovers":[],"roles":[],"roleAdmins":[]}`
        );
    });

    test('role sets are written as hex and read back as bigint', () => {
        const encoded = encodeState(populated);
        expect(encoded).toContain(`["${ALICE}","0x8000000000000000000000000000000000000000000000000000000000000001"]`);

        const decoded = decodeState(encoded);
        expect(decoded.roles.get(ALICE)).toBe((1n << BigInt(DEFAULT_ADMIN_ROLE)) | 1n);
        expect(decoded.handovers.get(BOB)).toBe(5_000);
        expect(decoded.roleAdmins.get(0)).toBe(1);
        expect(decoded.owner).toBe(ALICE);
    });

    test('unreadable JSON is STATE_CORRUPTED', () => {
        expect(() => decodeState('{not json')).toThrow('[Access:STATE_CORRUPTED] Persisted state is not JSON');
    });

    test('an open initialization is never a valid persisted state', () => {
        const raw = encodeState({ ...genesisState(), initialization: 'INITIALIZING' });
        expect(() => decodeState(raw)).toThrow('[Access:STATE_CORRUPTED] Persisted state failed validation');
    });

    test('empty or oversized role sets are rejected', () => {
        const withRoles = (hex: string) =>
            JSON.stringify({ ...JSON.parse(encodeState(genesisState())), roles: [[ALICE, hex]] });

        expect(() => decodeState(withRoles('0x0'))).toThrow('[Access:STATE_CORRUPTED]');
        expect(() => decodeState(withRoles(`0x1${'0'.repeat(64)}`))).toThrow('[Access:STATE_CORRUPTED]');
        expect(decodeState(withRoles('0x2')).roles.get(ALICE)).toBe(2n);
    });
});

describe('MemoryStateStore', () => {
    test('unknown objects load as null', () => {
        const store = new MemoryStateStore();
        expect(store.load('missing')).toBeNull();
        expect(store.getLatest('missing')).toBeNull();
        expect(store.getHistory('missing')).toEqual([]);
    });

    test('loads return fresh copies of the committed state', () => {
        const store = new MemoryStateStore();
        store.commit('obj', populated, [], null);
        const first = store.load('obj');
        expect(first).toEqual(populated);
        expect(first).not.toBe(store.load('obj'));
    });

    test('a commit against a stale tip fails with STATE_CONFLICT and writes nothing', () => {
        const store = new MemoryStateStore();
        expect(() => store.commit('obj', populated, [], 'ev-missing')).toThrow(
            '[Access:STATE_CONFLICT] Object obj was modified concurrently'
        );
        expect(store.load('obj')).toBeNull();
    });
});
