export type { Role, RoleRecord, RoleUsage, CreateRoleInput, PermissionInput } from './role.js';
export { toRoleRecord } from './role.js';
export type { RoleRegistryOptions } from './registry.js';
export { RoleRegistry } from './registry.js';
