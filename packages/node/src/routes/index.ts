export { createHealthRoutes } from "./health.js";
export { createTierRoutes } from "./tiers.js";
export { createCertificateRoutes } from "./certificates.js";
export { createAccountRoutes } from "./accounts.js";
export { createEventRoutes } from "./events.js";
