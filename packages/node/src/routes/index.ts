/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createVaultRoutes } from "./vault.js";
export { createReserveRoutes } from "./reserve.js";
export { createAuditRoutes } from "./audit.js";
export { createKeeperRoutes } from "./keeper.js";
export { createAdminRoutes } from "./admin.js";
