export * from './kernel-core/Errors.js';
export * from './kernel-core/L0/Ontology.js';
export * from './kernel-core/L0/Crypto.js';
export * from './kernel-core/L0/Guards.js';
export * from './kernel-core/L0/Initialization.js';
export * from './kernel-core/L1/Ownership.js';
export * from './kernel-core/L1/Roles.js';
export * from './kernel-core/L2/State.js';
export * from './kernel-core/L5/Audit.js';
export * from './kernel-core/L6/Capabilities.js';
export * from './kernel-core/Kernel.js';
export * from './Platform/Ports.js';
export * from './Platform/AccessControlledService.js';
export * from './Products/Samples/OwnableSample.js';
export * from './Products/Samples/RolesSample.js';
export * from './Products/Samples/OwnableRolesSample.js';
export * from './infrastructure/persistence/SQLiteStateStore.js';
export * from './server/Authentication.js';
export * from './server/Server.js';
export * from './config.js';
export * from './logging.js';
