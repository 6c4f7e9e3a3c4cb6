import { AccessService } from "../access/accessService.js";
import { loadCatalog } from "../catalog/catalogIntegrity.js";
import { db, DbRole } from "../db/index.js";
import { logger } from "../logging/logger.js";
import { PgAccessRepository } from "../persistence/pgAccessRepository.js";
import { ConfigGuard } from "./config-guard.js";
import { CATALOG_CONFIG_GUARDS } from "./config/catalog-config.js";

/**
 * Boot the decision core: pinned catalog, database role probe, hydrated state.
 */
export async function bootstrap(role: DbRole = "rolegate_admin"): Promise<AccessService> {
    logger.info({ role }, "Bootstrapping access core");

    ConfigGuard.enforce(CATALOG_CONFIG_GUARDS);

    const catalog = loadCatalog(process.env.ROLEGATE_CATALOG_PATH ?? "", {
        expectedSha256: process.env.ROLEGATE_CATALOG_SHA256
    });

    await db.probeRoles();
    const service = await AccessService.load(catalog, new PgAccessRepository(role));

    logger.info({ role }, "Startup checks passed");
    return service;
}
