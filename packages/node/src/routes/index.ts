/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createDepositRoutes } from "./deposits.js";
export { createWithdrawalRoutes } from "./withdrawals.js";
export { createAccountRoutes } from "./accounts.js";
export { createAdminRoutes } from "./admin.js";
export { createEventRoutes } from "./events.js";
