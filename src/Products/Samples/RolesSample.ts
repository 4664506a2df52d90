import { AccessControlledService } from '../../Platform/AccessControlledService.js';
import type { ServiceOptions } from '../../Platform/AccessControlledService.js';
import { RoleAuthority, ROLES_LAYER, defineRoles, roleBit, roleSet } from '../../kernel-core/L1/Roles.js';
import { Capabilities } from '../../kernel-core/L6/Capabilities.js';
import { DEFAULT_ADMIN_ROLE } from '../../kernel-core/L0/Ontology.js';
import type { Principal } from '../../kernel-core/L0/Ontology.js';

export const SampleRoles = defineRoles({
    ROLE_0: 0,
    ROLE_1: 1,
    DEFAULT_ADMIN: DEFAULT_ADMIN_ROLE
});

/**
 * Role-only sample: the initial admin holds DEFAULT_ADMIN and hands out ROLE_0 / ROLE_1.
 */
export class RolesSample extends AccessControlledService {
    public readonly roles: RoleAuthority;

    constructor(options: ServiceOptions) {
        super(options);
        this.roles = new RoleAuthority(this.kernel, this.initialization);
        this.capabilities.register(Capabilities.ROLES);
    }

    public initialize(caller: Principal, admin: Principal): void {
        this.initialization.initialize(caller, () => {
            this.initialization.layer(ROLES_LAYER, () => {
                this.roles.initializeRoles(admin, roleBit(SampleRoles.DEFAULT_ADMIN));
            });
        });
    }

    public onlyRolesSampleFunction(caller: Principal): boolean {
        this.require(caller, this.roles.gate(roleSet(SampleRoles.ROLE_0, SampleRoles.ROLE_1)), 'onlyRolesSampleFunction');
        return true;
    }
}
