import { describe, test, expect, beforeEach } from '@jest/globals';
import type { AccessKernel } from '../Kernel.js';
import type { InitializationGuard } from '../L0/Initialization.js';
import { Ownership, DEFAULT_HANDOVER_VALIDITY_MS } from '../L1/Ownership.js';
import { NULL_PRINCIPAL } from '../L0/Ontology.js';
import type { ManualClock } from '../../Platform/Ports.js';
import { ALICE, BOB, CAROL, START_TIME, makeKernel } from './helpers.js';

const VALIDITY = 1_000;

describe('Single-Owner Authorization', () => {
    let kernel: AccessKernel;
    let initialization: InitializationGuard;
    let clock: ManualClock;
    let ownership: Ownership;

    const initializeWith = (owner: string) =>
        initialization.initialize(ALICE, () => {
            ownership.initializeOwner(owner);
        });

    beforeEach(() => {
        ({ kernel, initialization, clock } = makeKernel());
        ownership = new Ownership(kernel, initialization, { handoverValidityMs: VALIDITY });
    });

    describe('before initialization', () => {
        test('owner is the null principal and every owner gate fails', () => {
            expect(ownership.owner()).toBe(NULL_PRINCIPAL);
            expect(() => ownership.requireOwner(ALICE)).toThrow('[Access:UNAUTHORIZED]');
            expect(() => ownership.transferOwnership(ALICE, BOB)).toThrow('[Access:UNAUTHORIZED]');
            expect(() => ownership.transferOwnership(NULL_PRINCIPAL, BOB)).toThrow('[Access:UNAUTHORIZED]');
        });

        test('initializeOwner outside initialize is rejected', () => {
            expect(() => ownership.initializeOwner(ALICE)).toThrow('[Access:INVALID_INITIALIZATION_ORDER]');
            expect(ownership.owner()).toBe(NULL_PRINCIPAL);
        });

        test('null initial owner is rejected and nothing is initialized', () => {
            expect(() => initializeWith(NULL_PRINCIPAL)).toThrow('[Access:INVALID_OWNER]');
            expect(initialization.state).toBe('UNINITIALIZED');
            expect(kernel.Audit.getHistory()).toHaveLength(0);
        });

        test('the default handover validity is 48 hours', () => {
            expect(DEFAULT_HANDOVER_VALIDITY_MS).toBe(172_800_000);
        });
    });

    describe('after initialization', () => {
        beforeEach(() => initializeWith(BOB));

        test('records the owner and emits the transfer before INITIALIZED', () => {
            expect(ownership.owner()).toBe(BOB);
            expect(kernel.Audit.getHistory().map((e) => e.event)).toEqual([
                { type: 'OWNERSHIP_TRANSFERRED', previousOwner: NULL_PRINCIPAL, newOwner: BOB },
                { type: 'INITIALIZED', by: ALICE }
            ]);
        });

        test('owner may transfer; others may not', () => {
            expect(() => ownership.transferOwnership(CAROL, CAROL)).toThrow('[Access:UNAUTHORIZED]');
            expect(ownership.owner()).toBe(BOB);

            ownership.transferOwnership(BOB, CAROL);
            expect(ownership.owner()).toBe(CAROL);
            expect(() => ownership.requireOwner(BOB)).toThrow('[Access:UNAUTHORIZED]');
            expect(() => ownership.requireOwner(CAROL)).not.toThrow();
        });

        test('transfer to the null principal fails with INVALID_OWNER', () => {
            expect(() => ownership.transferOwnership(BOB, NULL_PRINCIPAL)).toThrow('[Access:INVALID_OWNER]');
            expect(ownership.owner()).toBe(BOB);
        });

        test('renounce leaves no principal able to pass the owner gate', () => {
            ownership.renounceOwnership(BOB);

            expect(ownership.owner()).toBe(NULL_PRINCIPAL);
            for (const p of [ALICE, BOB, CAROL, NULL_PRINCIPAL]) {
                expect(ownership.gate()(p).ok).toBe(false);
            }
            expect(() => ownership.transferOwnership(BOB, BOB)).toThrow('[Access:UNAUTHORIZED]');
        });

        test('non-owner cannot renounce', () => {
            expect(() => ownership.renounceOwnership(CAROL)).toThrow('[Access:UNAUTHORIZED]');
            expect(ownership.owner()).toBe(BOB);
        });
    });

    describe('two-step handover', () => {
        beforeEach(() => initializeWith(BOB));

        test('request then complete moves ownership and clears the request', () => {
            expect(ownership.requestOwnershipHandover(CAROL)).toBe(START_TIME + VALIDITY);
            expect(ownership.ownershipHandoverExpiresAt(CAROL)).toBe(START_TIME + VALIDITY);

            ownership.completeOwnershipHandover(BOB, CAROL);

            expect(ownership.owner()).toBe(CAROL);
            expect(ownership.ownershipHandoverExpiresAt(CAROL)).toBe(0);
            expect(kernel.Audit.getHistory().slice(-2).map((e) => e.event)).toEqual([
                { type: 'OWNERSHIP_HANDOVER_REQUESTED', pendingOwner: CAROL, expiresAt: START_TIME + VALIDITY },
                { type: 'OWNERSHIP_TRANSFERRED', previousOwner: BOB, newOwner: CAROL }
            ]);
        });

        test('a request is still live at its expiry instant', () => {
            ownership.requestOwnershipHandover(CAROL);
            clock.set(START_TIME + VALIDITY);
            ownership.completeOwnershipHandover(BOB, CAROL);
            expect(ownership.owner()).toBe(CAROL);
        });

        test('an expired request cannot be completed', () => {
            ownership.requestOwnershipHandover(CAROL);
            clock.set(START_TIME + VALIDITY + 1);
            expect(() => ownership.completeOwnershipHandover(BOB, CAROL)).toThrow('[Access:NO_HANDOVER_REQUEST]');
            expect(ownership.owner()).toBe(BOB);
        });

        test('only the owner completes', () => {
            ownership.requestOwnershipHandover(CAROL);
            expect(() => ownership.completeOwnershipHandover(CAROL, CAROL)).toThrow('[Access:UNAUTHORIZED]');
            expect(ownership.ownershipHandoverExpiresAt(CAROL)).toBe(START_TIME + VALIDITY);
        });

        test('completing without a request fails', () => {
            expect(() => ownership.completeOwnershipHandover(BOB, CAROL)).toThrow('[Access:NO_HANDOVER_REQUEST]');
        });

        test('cancel removes the request and emits only when one existed', () => {
            ownership.requestOwnershipHandover(CAROL);
            ownership.cancelOwnershipHandover(CAROL);
            const length = kernel.Audit.getHistory().length;
            expect(kernel.Audit.getHistory()[length - 1]?.event).toEqual({
                type: 'OWNERSHIP_HANDOVER_CANCELED',
                pendingOwner: CAROL
            });

            ownership.cancelOwnershipHandover(CAROL);
            expect(kernel.Audit.getHistory()).toHaveLength(length);
            expect(() => ownership.completeOwnershipHandover(BOB, CAROL)).toThrow('[Access:NO_HANDOVER_REQUEST]');
        });

        test('a repeated request refreshes the expiry', () => {
            ownership.requestOwnershipHandover(CAROL);
            clock.advance(500);
            expect(ownership.requestOwnershipHandover(CAROL)).toBe(START_TIME + 500 + VALIDITY);
        });

        test('the null principal cannot request', () => {
            expect(() => ownership.requestOwnershipHandover(NULL_PRINCIPAL)).toThrow('[Access:UNAUTHORIZED]');
        });
    });
});
