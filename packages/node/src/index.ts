/**
 * @vigil/node: HTTP service for the inheritance escrow.
 *
 * @packageDocumentation
 */

export { EscrowService } from "./services/escrow-service.js";
export type {
  EscrowServiceConfig,
  PlanView,
  ServiceStats,
  HealthReport,
} from "./services/escrow-service.js";
export {
  CustodyWallet,
  CUSTODY_EVENTS,
  CUSTODY_STREAM,
  registerCustodyEvents,
} from "./services/custody-wallet.js";
export type {
  CustodyWalletOptions,
  CustodyMovementPayload,
} from "./services/custody-wallet.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
