/**
 * @quorumgate/wallet — Bootstrap.
 *
 * Wires configuration, logging and a wallet over the given pool.
 */

import type { Logger } from "pino";
import type { ValueTransfer } from "@quorumgate/pool";
import { loadConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { MultiSigWallet } from "./wallet.js";

export interface BootstrapResult {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly wallet: MultiSigWallet;
}

/**
 * Build a wallet from environment variables.
 *
 * @throws {z.ZodError} for invalid configuration
 * @throws RegistryError / WalletError for an invalid owner set or address
 */
export function bootstrapWallet(
  pool: ValueTransfer,
  env: Record<string, string | undefined> = process.env,
): BootstrapResult {
  const config = loadConfig(env);
  const logger = createLogger(config);

  const wallet = new MultiSigWallet({
    address: config.WALLET_ADDRESS,
    owners: config.WALLET_OWNERS,
    requiredApprovals: config.WALLET_REQUIRED_APPROVALS,
    pool,
    logger,
  });

  logger.info(
    { wallet: wallet.address, balance: wallet.getBalance().toString() },
    "Wallet ready",
  );

  return { config, logger, wallet };
}
