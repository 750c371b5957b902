/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createStreamRoutes } from "./streams.js";
export { createWithdrawalRoutes } from "./withdrawals.js";
export { createOwnershipRoutes } from "./ownership.js";
export { createEventRoutes } from "./events.js";
export { createSnapshotRoutes } from "./snapshot.js";
