import { z } from 'zod';

/**
 * Input Validation Schemas
 * Shapes of catalog seeds and administrative inputs. Referential checks
 * (does this profile exist, is this permission assignable) live in the
 * catalog and registry; these schemas only enforce structure.
 */

const Identifier = z.string().trim().min(1).max(128);

/** Operation and object ids; ':' is reserved as the permission id separator. */
const VocabularyKey = Identifier.refine(id => !id.includes(':'), 'must not contain ":"');

// --- Catalog Seed ---

const LabelledEntrySchema = z.object({
    id: VocabularyKey,
    label: z.string().min(1).max(255),
});

const PermissionRefSchema = z.object({
    operation: VocabularyKey,
    object: VocabularyKey,
});

export const CatalogSeedSchema = z.object({
    operations: z.array(LabelledEntrySchema).min(1),
    objects: z.array(LabelledEntrySchema).min(1),
    profiles: z.array(z.object({
        id: Identifier,
        value: Identifier,
        label: z.string().min(1).max(255),
    })).min(1),
    permissions: z.array(PermissionRefSchema),
    profilePermissions: z.array(z.object({
        profile: Identifier,
        permissions: z.array(PermissionRefSchema),
    })),
});

// --- Administrative Inputs ---

export const RoleValueSchema = z.string()
    .min(1)
    .max(64)
    .regex(/^[a-z0-9]+(?:[-_][a-z0-9]+)*$/, 'value must be a lowercase slug');

export const CreateRoleInputSchema = z.object({
    profile: Identifier,
    organization: Identifier,
    label: z.string().trim().min(1).max(255),
    value: RoleValueSchema,
    permissions: z.array(Identifier),
});

