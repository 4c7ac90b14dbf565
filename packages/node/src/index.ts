/**
 * @popchain/node: HTTP surface for the certificate stack.
 *
 * Importing this module starts nothing; `main.ts` is the server entry.
 */

export { PopchainService } from "./services/popchain-service.js";
export type {
  PopchainServiceConfig,
  MintInput,
  CertificateView,
} from "./services/popchain-service.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
