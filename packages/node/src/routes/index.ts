/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createAccessRoutes } from "./access.js";
export { createItemRoutes } from "./items.js";
export { createDocumentRoutes } from "./documents.js";
export { createAccountRoutes } from "./accounts.js";
export { createTreasuryRoutes } from "./treasury.js";
export { createEventRoutes } from "./events.js";
