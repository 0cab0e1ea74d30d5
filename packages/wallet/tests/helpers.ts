/**
 * Shared fixtures for wallet tests.
 */

import { pino } from "pino";
import type { Logger } from "pino";
import { BalanceBook } from "@quorumgate/pool";
import { MultiSigWallet } from "../src/wallet.js";
import { WalletError } from "../src/types.js";

export const WALLET = "0x00000000000000000000000000000000000000aa";
export const O1 = "0x0000000000000000000000000000000000000001";
export const O2 = "0x0000000000000000000000000000000000000002";
export const O3 = "0x0000000000000000000000000000000000000003";
export const STRANGER = "0x0000000000000000000000000000000000000bad";
export const RECIPIENT = "0x00000000000000000000000000000000000000cc";
export const DEPOSITOR = "0x00000000000000000000000000000000000000dd";
export const ZERO = "0x0000000000000000000000000000000000000000";

export interface LogLine {
  readonly level: number;
  readonly msg: string;
  readonly [key: string]: unknown;
}

/**
 * A debug-level logger whose output lands in `lines`.
 */
export function captureLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: "debug" },
    {
      write(msg: string) {
        lines.push(JSON.parse(msg));
      },
    },
  );
  return { logger, lines };
}

/**
 * A 2-of-3 wallet over a book that already holds `funds` for it.
 */
export function createWallet(funds = 10n, logger?: Logger) {
  const book = new BalanceBook();
  book.mint(WALLET, funds);
  const wallet = new MultiSigWallet({
    address: WALLET,
    owners: [O1, O2, O3],
    requiredApprovals: 2,
    pool: book,
    ...(logger ? { logger } : {}),
  });
  return { book, wallet };
}

/**
 * Run `fn` and return the WalletError it throws.
 */
export function walletError(fn: () => unknown): WalletError {
  try {
    fn();
  } catch (error: unknown) {
    if (error instanceof WalletError) return error;
    throw error;
  }
  throw new Error("Expected a WalletError");
}
