/**
 * Catalog Library
 * Public exports for the static permission vocabulary.
 */

export type {
    OperationId,
    ObjectId,
    ProfileId,
    PermissionId,
    OrganizationId,
    UserId,
    RoleId,
    Operation,
    CatalogObject,
    Permission,
    Profile,
    PermissionRef,
    CatalogSeed
} from './types.js';
export { permissionKey } from './types.js';

export { Catalog } from './catalog.js';
export type { LoadCatalogOptions } from './catalogIntegrity.js';
export { loadCatalog, computeCatalogHash } from './catalogIntegrity.js';
