import { AccessKernel } from '../kernel-core/Kernel.js';
import type { EvidenceListener } from '../kernel-core/Kernel.js';
import { InitializationGuard } from '../kernel-core/L0/Initialization.js';
import { enforce } from '../kernel-core/L0/Guards.js';
import type { Gate } from '../kernel-core/L0/Guards.js';
import type { Evidence, InitializationState, Principal } from '../kernel-core/L0/Ontology.js';
import { CapabilityRegistry } from '../kernel-core/L6/Capabilities.js';
import type { CapabilityId } from '../kernel-core/L6/Capabilities.js';
import { MemoryStateStore } from '../kernel-core/L2/State.js';
import type { IStateStore } from '../kernel-core/L2/State.js';
import { SystemClock } from './Ports.js';
import type { ISystemClock } from './Ports.js';
import { silentLogger } from '../logging.js';
import type { Logger } from '../logging.js';

export interface ServiceOptions {
    /** Identity of the persisted storage region this instance is bound to. */
    objectId: string;
    store?: IStateStore;
    clock?: ISystemClock;
    logger?: Logger;
    handoverValidityMs?: number;
}

/**
 * Capability Surface
 *
 * Base of every concrete service. Authorization strategies are held as fields and
 * registered with the capability registry by the subclass; gated operations call
 * `require` with the gate (or `anyOf` several) before their effect.
 */
export abstract class AccessControlledService {
    protected readonly kernel: AccessKernel;
    protected readonly initialization: InitializationGuard;
    protected readonly capabilities = new CapabilityRegistry();
    protected readonly log: Logger;

    protected constructor(options: ServiceOptions) {
        this.log = (options.logger ?? silentLogger()).child({ service: this.constructor.name });
        this.kernel = new AccessKernel(options.objectId, {
            store: options.store ?? new MemoryStateStore(),
            clock: options.clock ?? new SystemClock(),
            logger: this.log
        });
        this.initialization = new InitializationGuard(this.kernel);
    }

    public get objectId(): string {
        return this.kernel.objectId;
    }

    public get initializationState(): InitializationState {
        return this.initialization.state;
    }

    public isInitialized(): boolean {
        return this.initialization.isInitialized();
    }

    public supportsCapability(id: CapabilityId): boolean {
        return this.capabilities.supports(id);
    }

    public listCapabilities(): CapabilityId[] {
        return this.capabilities.list();
    }

    public subscribe(listener: EvidenceListener): () => void {
        return this.kernel.subscribe(listener);
    }

    public history(): Evidence[] {
        return this.kernel.Audit.getHistory();
    }

    public verifyHistory(): boolean {
        return this.kernel.Audit.verifyChain();
    }

    protected require(caller: Principal, gate: Gate, operation: string): void {
        enforce(gate(caller), caller, operation);
    }
}
