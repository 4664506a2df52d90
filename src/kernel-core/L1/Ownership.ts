import { ErrorCode, AccessError } from '../Errors.js';
import { NULL_PRINCIPAL, isNullPrincipal } from '../L0/Ontology.js';
import type { Principal } from '../L0/Ontology.js';
import { OwnerGuard, enforce } from '../L0/Guards.js';
import type { Gate } from '../L0/Guards.js';
import type { InitializationGuard } from '../L0/Initialization.js';
import type { AccessKernel, Transaction } from '../Kernel.js';

export const OWNABLE_LAYER = 'ownable';

/** Default validity of an ownership handover request: 48 hours. */
export const DEFAULT_HANDOVER_VALIDITY_MS = 48 * 60 * 60 * 1000;

export interface OwnershipOptions {
    handoverValidityMs?: number;
}

/**
 * Single-Owner Authorization
 *
 * Exactly one owner at a time. `renounceOwnership` moves the object to the null owner,
 * after which no owner-gated operation can pass again.
 */
export class Ownership {
    private readonly handoverValidityMs: number;

    constructor(
        private kernel: AccessKernel,
        private initialization: InitializationGuard,
        options: OwnershipOptions = {}
    ) {
        this.handoverValidityMs = options.handoverValidityMs ?? DEFAULT_HANDOVER_VALIDITY_MS;
    }

    public initializeOwner(principal: Principal): void {
        this.initialization.layer(OWNABLE_LAYER, (tx) => {
            if (isNullPrincipal(principal)) {
                throw new AccessError(ErrorCode.INVALID_OWNER, 'Initial owner cannot be the null principal');
            }
            this.setOwner(tx, principal);
        });
    }

    public owner(): Principal {
        return this.kernel.view().owner;
    }

    public gate(): Gate {
        return (caller) => OwnerGuard({ caller, owner: this.owner() });
    }

    public requireOwner(caller: Principal, operation: string = 'requireOwner'): void {
        enforce(this.gate()(caller), caller, operation);
    }

    public transferOwnership(caller: Principal, newOwner: Principal): void {
        this.kernel.transact('transferOwnership', caller, (tx) => {
            this.requireOwner(caller, 'transferOwnership');
            if (isNullPrincipal(newOwner)) {
                throw new AccessError(ErrorCode.INVALID_OWNER, 'New owner cannot be the null principal', { caller });
            }
            this.setOwner(tx, newOwner);
        });
    }

    public renounceOwnership(caller: Principal): void {
        this.kernel.transact('renounceOwnership', caller, (tx) => {
            this.requireOwner(caller, 'renounceOwnership');
            this.setOwner(tx, NULL_PRINCIPAL);
        });
    }

    // --- Two-step handover ---

    public requestOwnershipHandover(caller: Principal): number {
        return this.kernel.transact('requestOwnershipHandover', caller, (tx) => {
            if (isNullPrincipal(caller)) {
                throw new AccessError(ErrorCode.UNAUTHORIZED, 'Null principal cannot request ownership', { caller });
            }
            const expiresAt = tx.now + this.handoverValidityMs;
            tx.state.handovers.set(caller, expiresAt);
            tx.emit({ type: 'OWNERSHIP_HANDOVER_REQUESTED', pendingOwner: caller, expiresAt });
            return expiresAt;
        });
    }

    public cancelOwnershipHandover(caller: Principal): void {
        this.kernel.transact('cancelOwnershipHandover', caller, (tx) => {
            if (tx.state.handovers.delete(caller)) {
                tx.emit({ type: 'OWNERSHIP_HANDOVER_CANCELED', pendingOwner: caller });
            }
        });
    }

    public completeOwnershipHandover(caller: Principal, pendingOwner: Principal): void {
        this.kernel.transact('completeOwnershipHandover', caller, (tx) => {
            this.requireOwner(caller, 'completeOwnershipHandover');

            const expiresAt = tx.state.handovers.get(pendingOwner);
            if (expiresAt === undefined || tx.now > expiresAt) {
                throw new AccessError(ErrorCode.NO_HANDOVER_REQUEST, `No live handover request from ${pendingOwner}`, {
                    caller,
                    pendingOwner
                });
            }

            tx.state.handovers.delete(pendingOwner);
            this.setOwner(tx, pendingOwner);
        });
    }

    /** Expiry (epoch ms) of the pending request, or 0 when there is none. */
    public ownershipHandoverExpiresAt(pendingOwner: Principal): number {
        return this.kernel.view().handovers.get(pendingOwner) ?? 0;
    }

    private setOwner(tx: Transaction, newOwner: Principal): void {
        const previousOwner = tx.state.owner;
        tx.state.owner = newOwner;
        tx.emit({ type: 'OWNERSHIP_TRANSFERRED', previousOwner, newOwner });
    }
}
