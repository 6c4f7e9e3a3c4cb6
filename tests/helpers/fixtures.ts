/**
 * Shared test fixtures: a small catalog and a deterministic core.
 */

import { Catalog } from '../../libs/catalog/catalog.js';
import type { CatalogSeed } from '../../libs/catalog/types.js';
import { AccessCore, createAccessCore } from '../../libs/access/accessService.js';

export const TEST_SEED: CatalogSeed = {
    operations: [
        { id: 'read', label: 'Read' },
        { id: 'create', label: 'Create' },
        { id: 'edit', label: 'Edit' }
    ],
    objects: [
        { id: 'invoice', label: 'Invoice' },
        { id: 'invoice_line_item', label: 'Invoice line item' },
        { id: 'customer', label: 'Customer' }
    ],
    profiles: [
        { id: 'client', value: 'client', label: 'Client' },
        { id: 'admin', value: 'lawn-care-admin', label: 'Lawn Care Administrator' },
        { id: 'crew', value: 'crew', label: 'Crew Member' }
    ],
    permissions: [
        { operation: 'read', object: 'invoice' },
        { operation: 'create', object: 'invoice' },
        { operation: 'edit', object: 'invoice' },
        { operation: 'edit', object: 'invoice_line_item' },
        { operation: 'read', object: 'customer' }
    ],
    profilePermissions: [
        {
            profile: 'client',
            permissions: [
                { operation: 'read', object: 'invoice' },
                { operation: 'edit', object: 'invoice_line_item' }
            ]
        },
        {
            profile: 'admin',
            permissions: [
                { operation: 'read', object: 'invoice' },
                { operation: 'create', object: 'invoice' },
                { operation: 'edit', object: 'invoice' },
                { operation: 'edit', object: 'invoice_line_item' },
                { operation: 'read', object: 'customer' }
            ]
        },
        {
            profile: 'crew',
            permissions: [
                { operation: 'read', object: 'customer' }
            ]
        }
    ]
};

export function sequentialIds(prefix = 'role'): () => string {
    let next = 0;
    return () => {
        next += 1;
        return `${prefix}-${next}`;
    };
}

export function buildCatalog(): Catalog {
    return new Catalog(TEST_SEED);
}

export function buildCore(): AccessCore {
    return createAccessCore(buildCatalog(), { generateId: sequentialIds() });
}
