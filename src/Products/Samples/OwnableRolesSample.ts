import { AccessControlledService } from '../../Platform/AccessControlledService.js';
import type { ServiceOptions } from '../../Platform/AccessControlledService.js';
import { Ownership } from '../../kernel-core/L1/Ownership.js';
import { RoleAuthority, ROLES_LAYER, roleBit, roleSet } from '../../kernel-core/L1/Roles.js';
import { anyOf } from '../../kernel-core/L0/Guards.js';
import { Capabilities } from '../../kernel-core/L6/Capabilities.js';
import type { Principal } from '../../kernel-core/L0/Ontology.js';
import { SampleRoles } from './RolesSample.js';

/**
 * Owner plus roles. Gates may require the owner, a role, or either.
 *
 * Initialization runs two layers; `roles` depends on `ownable`, so `ownable` is reached
 * twice and runs once.
 */
export class OwnableRolesSample extends AccessControlledService {
    public readonly ownership: Ownership;
    public readonly roles: RoleAuthority;

    constructor(options: ServiceOptions) {
        super(options);
        this.ownership = new Ownership(this.kernel, this.initialization, {
            handoverValidityMs: options.handoverValidityMs
        });
        this.roles = new RoleAuthority(this.kernel, this.initialization);

        this.capabilities.register(Capabilities.OWNABLE);
        this.capabilities.register(Capabilities.OWNERSHIP_HANDOVER);
        this.capabilities.register(Capabilities.ROLES);
    }

    public initialize(caller: Principal, owner: Principal): void {
        this.initialization.initialize(caller, () => {
            this.initializeRolesLayer(owner);
            this.ownership.initializeOwner(owner);
        });
    }

    private initializeRolesLayer(owner: Principal): void {
        this.initialization.layer(ROLES_LAYER, () => {
            this.ownership.initializeOwner(owner);
            this.roles.initializeRoles(owner, roleBit(SampleRoles.DEFAULT_ADMIN));
        });
    }

    public onlyOwnerSampleFunction(caller: Principal): boolean {
        this.require(caller, this.ownership.gate(), 'onlyOwnerSampleFunction');
        return true;
    }

    public onlyRolesSampleFunction(caller: Principal): boolean {
        this.require(caller, this.roles.gate(roleSet(SampleRoles.ROLE_0, SampleRoles.ROLE_1)), 'onlyRolesSampleFunction');
        return true;
    }

    public onlyOwnerOrRolesSampleFunction(caller: Principal): boolean {
        this.require(
            caller,
            anyOf(this.ownership.gate(), this.roles.gate(roleBit(SampleRoles.ROLE_0))),
            'onlyOwnerOrRolesSampleFunction'
        );
        return true;
    }
}
