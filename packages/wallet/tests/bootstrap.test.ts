/**
 * Tests for bootstrapWallet and createLogger.
 */

import { describe, it, expect } from "vitest";
import { BalanceBook } from "@quorumgate/pool";
import { RegistryError } from "@quorumgate/registry";
import { bootstrapWallet } from "../src/bootstrap.js";
import { createLogger } from "../src/logger.js";
import { WalletError } from "../src/types.js";
import { WALLET, O1, O2, O3, ZERO } from "./helpers.js";

const env = {
  WALLET_ADDRESS: WALLET,
  WALLET_OWNERS: `${O1},${O2},${O3}`,
  WALLET_REQUIRED_APPROVALS: "2",
  LOG_LEVEL: "silent",
  NODE_ENV: "test",
};

describe("bootstrapWallet", () => {
  it("builds a wallet from the environment", () => {
    const book = new BalanceBook();
    book.mint(WALLET, 4n);

    const { wallet, config, logger } = bootstrapWallet(book, env);

    expect(wallet.address).toBe(WALLET);
    expect(wallet.listOwners()).toEqual([O1, O2, O3]);
    expect(wallet.getRequiredApprovals()).toBe(2);
    expect(wallet.getBalance()).toBe(4n);
    expect(config.WALLET_REQUIRED_APPROVALS).toBe(2);
    expect(logger.level).toBe("silent");
  });

  it("rejects an owner set the registry refuses", () => {
    expect(() =>
      bootstrapWallet(new BalanceBook(), { ...env, WALLET_OWNERS: `${O1},${O1}` }),
    ).toThrow(RegistryError);
    expect(() =>
      bootstrapWallet(new BalanceBook(), { ...env, WALLET_OWNERS: "" }),
    ).toThrow("Owners required");
  });

  it("rejects the null principal as wallet address", () => {
    expect(() =>
      bootstrapWallet(new BalanceBook(), { ...env, WALLET_ADDRESS: ZERO }),
    ).toThrow(WalletError);
  });
});

describe("createLogger", () => {
  it("uses the configured level", () => {
    expect(createLogger({ LOG_LEVEL: "warn", NODE_ENV: "production" }).level).toBe("warn");
  });
});
