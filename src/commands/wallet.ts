import type { AxiosAdapter } from "axios";
import { EXIT_CODES, errorHint, errorMessage, type ExitCode } from "../lib/errors.js";
import { Reporter } from "../output/reporter.js";
import { createSigner } from "../payment/executor.js";
import { evmPaymentScheme, type PaymentScheme } from "../payment/scheme.js";
import { PRIVATE_KEY_ENV, getPrivateKey } from "../utils/config.js";
import { queryBalances, type WalletResult } from "../wallet/balance.js";
import { NETWORKS, type NetworkRegistry } from "../wallet/networks.js";
import { RpcClient } from "../wallet/rpc.js";

export interface WalletOptions {
  network?: string;
  json?: boolean;
}

export interface WalletContext {
  privateKey?: string;
  scheme: PaymentScheme;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  color?: boolean;
  registry?: NetworkRegistry;
  /** Replaces the network adapter for RPC calls (tests) */
  adapter?: AxiosAdapter;
}

/**
 * Shows the signer address and its USDC balance on each configured network.
 *
 * @param options - Network filter and output format
 * @param context - Credential, scheme, streams and registry
 * @returns The process exit code
 */
export async function showWallet(options: WalletOptions, context: WalletContext): Promise<ExitCode> {
  const reporter = new Reporter({
    mode: options.json ? "json" : "text",
    stdout: context.stdout,
    stderr: context.stderr,
    color: context.color,
  });
  const { logger } = reporter;
  const registry = context.registry ?? NETWORKS;
  const result: WalletResult = { address: "", balances: [] };

  try {
    const signer = createSigner(context.scheme, context.privateKey, `${PRIVATE_KEY_ENV} is required`);
    result.address = signer.address;

    logger.keyValue("Wallet", signer.address);
    logger.log("");

    const spinner = reporter.spinner("Querying balances").start();
    result.balances = await queryBalances({
      address: signer.address,
      network: options.network,
      rpc: new RpcClient({ adapter: context.adapter }),
      registry,
    }).catch((error: unknown) => {
      spinner.fail("Balance query failed");
      throw error;
    });
    spinner.stop();

    for (const entry of result.balances) {
      const name = registry[entry.network]?.name ?? entry.network;
      if (entry.balance === "error") {
        logger.log(`  ${`${name} (${entry.asset}):`.padEnd(18)}  error: ${entry.raw}`);
      } else {
        logger.log(`  ${`${name}:`.padEnd(18)}  ${entry.balance} ${entry.asset}`);
      }
    }
  } catch (error) {
    result.error = errorMessage(error);
    if (options.json) {
      reporter.printJson(result);
    } else {
      reporter.printError(result.error, errorHint(error));
    }
    return EXIT_CODES.ERROR;
  }

  if (options.json) {
    reporter.printJson(result);
  }
  return EXIT_CODES.SUCCESS;
}

/**
 * Commander action for `wallet`.
 */
export async function walletCommand(options: WalletOptions): Promise<void> {
  process.exitCode = await showWallet(options, {
    privateKey: getPrivateKey(),
    scheme: evmPaymentScheme,
    stdout: process.stdout,
    stderr: process.stderr,
  });
}
