/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createExpenseRoutes } from "./expenses.js";
export { createDirectoryRoutes } from "./directory.js";
