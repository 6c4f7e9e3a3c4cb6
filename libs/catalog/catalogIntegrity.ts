import crypto from "crypto";
import fs from "fs";
import path from "path";
import { Catalog } from "./catalog.js";
import { CatalogIntegrityError } from "../errors/accessErrors.js";
import { CatalogSeedSchema } from "../validation/schema.js";
import { validate } from "../validation/zod-middleware.js";
import { logger } from "../logging/logger.js";

export interface LoadCatalogOptions {
    /** Hex SHA-256 the file must hash to; unpinned when omitted. */
    expectedSha256?: string;
}

function normalizeCatalogPath(catalogPath: string): string {
    return catalogPath.replace(/\\/g, "/");
}

export function computeCatalogHash(contents: Buffer | string): string {
    return crypto.createHash("sha256").update(contents).digest("hex");
}

function parseJson(raw: string, displayPath: string): unknown {
    try {
        return JSON.parse(raw);
    } catch (error) {
        throw new CatalogIntegrityError(
            `Catalog file ${displayPath} is not valid JSON`,
            [error instanceof Error ? error.message : String(error)]
        );
    }
}

/**
 * Load the deployment catalog.
 * The file is hash-checked (when pinned), shape-checked and then
 * referentially checked by the Catalog constructor.
 */
export function loadCatalog(catalogPath: string, options: LoadCatalogOptions = {}): Catalog {
    const displayPath = normalizeCatalogPath(catalogPath);
    const absolutePath = path.resolve(process.cwd(), catalogPath);

    if (!fs.existsSync(absolutePath)) {
        throw new CatalogIntegrityError(`Catalog file missing at ${displayPath}`);
    }

    const contents = fs.readFileSync(absolutePath);

    if (options.expectedSha256) {
        const actualHash = computeCatalogHash(contents);
        if (actualHash !== options.expectedSha256.toLowerCase()) {
            throw new CatalogIntegrityError(`Catalog hash mismatch for ${displayPath}`, [
                `expected ${options.expectedSha256}`,
                `actual ${actualHash}`
            ]);
        }
    }

    const seed = validate(CatalogSeedSchema, parseJson(contents.toString("utf-8"), displayPath), `catalog:${displayPath}`);
    const catalog = new Catalog(seed);

    logger.info({
        catalogPath: displayPath,
        profiles: seed.profiles.length,
        permissions: seed.permissions.length,
        pinned: Boolean(options.expectedSha256)
    }, "Catalog loaded");

    return catalog;
}
