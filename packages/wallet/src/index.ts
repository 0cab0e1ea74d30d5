/**
 * @quorumgate/wallet — n-of-m approval gate over a shared pool of value.
 *
 * Transaction ledger and execution engine:
 * - propose / approve / execute with quorum evaluation
 * - commit-then-transfer execution with rollback on failure
 * - reentrancy guard spanning each execution
 * - hash-chained notification history
 *
 * Plus the ambient pieces: Zod configuration, pino logging, bootstrap.
 */

// Core engine
export { MultiSigWallet, transactionStatus } from "./wallet.js";
export { ReentrancyGuard } from "./reentrancy-guard.js";
export type { ReentrancyRejectedHandler } from "./reentrancy-guard.js";

// Types
export type {
  WalletOptions,
  MutatingOperation,
  WalletErrorCode,
  WalletErrorDetails,
} from "./types.js";
export { WalletError } from "./types.js";

// Configuration & logging
export { loadConfig, parseOwnerList, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger } from "./logger.js";
export { bootstrapWallet } from "./bootstrap.js";
export type { BootstrapResult } from "./bootstrap.js";
