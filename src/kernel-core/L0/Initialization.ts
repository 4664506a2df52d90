// src/kernel-core/L0/Initialization.ts
import { ErrorCode, AccessError } from '../Errors.js';
import type { AccessKernel, Transaction } from '../Kernel.js';
import type { InitializationState, Principal } from './Ontology.js';

/**
 * Initialization Guard
 *
 * Separates allocation from configuration: the owning object is constructed empty and
 * `initialize` runs exactly once. The state machine is
 *
 *   UNINITIALIZED -> INITIALIZING -> INITIALIZED
 *
 * and INITIALIZED is terminal. Setup and every layer it runs share one transaction, so a
 * failing layer rolls the whole sequence back to UNINITIALIZED.
 */
export class InitializationGuard {
    // Layers already run by the initialize() call in progress
    private completedLayers: Set<string> = new Set();

    constructor(private kernel: AccessKernel) { }

    public get state(): InitializationState {
        return this.kernel.view().initialization;
    }

    public isInitialized(): boolean {
        return this.state === 'INITIALIZED';
    }

    public initialize<T>(caller: Principal, setup: (tx: Transaction) => T): T {
        return this.kernel.transact('initialize', caller, (tx) => {
            if (tx.state.initialization !== 'UNINITIALIZED') {
                throw new AccessError(ErrorCode.ALREADY_INITIALIZED, `Object is ${tx.state.initialization}`, { caller });
            }

            tx.state.initialization = 'INITIALIZING';
            this.completedLayers = new Set();
            try {
                const result = setup(tx);
                tx.state.initialization = 'INITIALIZED';
                tx.emit({ type: 'INITIALIZED', by: caller });
                return result;
            } finally {
                this.completedLayers.clear();
            }
        });
    }

    /**
     * Returns the open initialization transaction, or fails with INVALID_INITIALIZATION_ORDER.
     */
    public requireInitializing(operation: string): Transaction {
        const tx = this.kernel.transaction;
        if (!tx || tx.state.initialization !== 'INITIALIZING') {
            throw new AccessError(
                ErrorCode.INVALID_INITIALIZATION_ORDER,
                `${operation} may only run inside initialize()`,
                { operation }
            );
        }
        return tx;
    }

    /**
     * Runs a named initializer layer once per initialization sequence.
     * A layer reached a second time (shared dependency of two layers) is a no-op.
     */
    public layer(name: string, fn: (tx: Transaction) => void): void {
        const tx = this.requireInitializing(`layer ${name}`);
        if (this.completedLayers.has(name)) return;

        this.completedLayers.add(name);
        fn(tx);
    }
}
