import { createDraft, finishDraft, enableMapSet } from 'immer';
import type { Draft } from 'immer';
import { genesisState } from './L0/Ontology.js';
import type { AccessEvent, AccessState, Evidence, Principal } from './L0/Ontology.js';
import type { IStateStore } from './L2/State.js';
import { AuditLog } from './L5/Audit.js';
import type { ISystemClock } from '../Platform/Ports.js';
import type { Logger } from '../logging.js';

enableMapSet();

/**
 * An open, uncommitted unit of work against one object.
 */
export interface Transaction {
    readonly state: Draft<AccessState>;
    readonly caller: Principal;
    readonly operation: string;
    readonly now: number;
    emit(event: AccessEvent): void;
}

export type EvidenceListener = (evidence: Evidence) => void;

export interface KernelDependencies {
    store: IStateStore;
    clock: ISystemClock;
    logger: Logger;
}

/**
 * AccessKernel: per-object state holder and transaction runner.
 *
 * Operations execute synchronously on an immer draft. A transaction either commits
 * state and evidence together or leaves nothing behind; operations invoked while a
 * transaction is open join it.
 */
export class AccessKernel {
    private current: AccessState;
    private active: Transaction | undefined;
    private listeners: Set<EvidenceListener> = new Set();
    private audit: AuditLog;
    private store: IStateStore;
    private clock: ISystemClock;
    private log: Logger;

    constructor(public readonly objectId: string, deps: KernelDependencies) {
        this.store = deps.store;
        this.clock = deps.clock;
        this.log = deps.logger.child({ objectId });
        this.audit = new AuditLog(objectId, this.store);
        this.current = this.store.load(objectId) ?? genesisState();
    }

    /**
     * State as seen by the running operation: the open draft if any, else the committed state.
     */
    public view(): AccessState {
        return this.active ? this.active.state : this.committed;
    }

    public get committed(): AccessState {
        if (!this.active) this.sync();
        return this.current;
    }

    public get transaction(): Transaction | undefined {
        return this.active;
    }

    public get Audit(): AuditLog {
        return this.audit;
    }

    public transact<T>(operation: string, caller: Principal, fn: (tx: Transaction) => T): T {
        if (this.active) return fn(this.active);

        const { result, evidence } = this.run(operation, caller, fn);
        this.dispatch(evidence);
        return result;
    }

    public subscribe(listener: EvidenceListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    /**
     * Other instances bound to the same object id may have committed since this one last
     * looked. Reloads state and the audit tip when the stored tip has moved.
     */
    private sync(): void {
        const latest = this.store.getLatest(this.objectId);
        if (latest?.evidenceId === this.audit.getTip()?.evidenceId) return;

        this.current = this.store.load(this.objectId) ?? genesisState();
        this.audit.reset(latest);
        this.log.debug({ sequence: latest?.sequence }, 'resynced from store');
    }

    private run<T>(operation: string, caller: Principal, fn: (tx: Transaction) => T): { result: T; evidence: Evidence[] } {
        this.sync();
        const expectedTip = this.audit.getTip()?.evidenceId ?? null;
        const draft = createDraft(this.current);
        const pending: AccessEvent[] = [];
        const tx: Transaction = {
            state: draft,
            caller,
            operation,
            now: this.clock.now(),
            emit: (event) => {
                pending.push(event);
            }
        };

        this.active = tx;
        try {
            const result = fn(tx);
            const next: AccessState = finishDraft(draft);

            if (next === this.current && pending.length === 0) {
                return { result, evidence: [] };
            }

            const evidence = this.audit.seal(operation, caller, pending, tx.now);
            this.store.commit(this.objectId, next, evidence, expectedTip);
            this.audit.advance(evidence);
            this.current = next;

            this.log.debug({ operation, caller, events: pending.map((e) => e.type) }, 'committed');
            return { result, evidence };
        } catch (err) {
            this.log.debug({ operation, caller, err }, 'reverted');
            throw err;
        } finally {
            this.active = undefined;
        }
    }

    private dispatch(evidence: readonly Evidence[]): void {
        for (const entry of evidence) {
            for (const listener of this.listeners) {
                try {
                    listener(entry);
                } catch (err) {
                    // The operation is committed; a failing consumer cannot undo it.
                    this.log.error({ err, evidenceId: entry.evidenceId }, 'evidence listener failed');
                }
            }
        }
    }
}
