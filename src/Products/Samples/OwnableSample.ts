import { AccessControlledService } from '../../Platform/AccessControlledService.js';
import type { ServiceOptions } from '../../Platform/AccessControlledService.js';
import { Ownership } from '../../kernel-core/L1/Ownership.js';
import { Capabilities } from '../../kernel-core/L6/Capabilities.js';
import type { Principal } from '../../kernel-core/L0/Ontology.js';

/**
 * Single-owner sample: one owner-gated operation.
 */
export class OwnableSample extends AccessControlledService {
    public readonly ownership: Ownership;

    constructor(options: ServiceOptions) {
        super(options);
        this.ownership = new Ownership(this.kernel, this.initialization, {
            handoverValidityMs: options.handoverValidityMs
        });
        this.capabilities.register(Capabilities.OWNABLE);
        this.capabilities.register(Capabilities.OWNERSHIP_HANDOVER);
    }

    public initialize(caller: Principal, owner: Principal): void {
        this.initialization.initialize(caller, () => {
            this.ownership.initializeOwner(owner);
        });
    }

    public onlyOwnerSampleFunction(caller: Principal): boolean {
        this.require(caller, this.ownership.gate(), 'onlyOwnerSampleFunction');
        return true;
    }
}
