import { toHuman } from "../lib/amount.js";
import { ConfigError, errorMessage } from "../lib/errors.js";
import { decodeUint256, encodeBalanceOf } from "./contract.js";
import {
  BALANCE_ASSET,
  NETWORKS,
  availableNetworks,
  type NetworkDescriptor,
  type NetworkRegistry,
} from "./networks.js";
import type { RpcClient } from "./rpc.js";

export interface BalanceEntry {
  network: string;
  chainId: string;
  asset: string;
  /** Human-readable balance, or "error" */
  balance: string;
  decimals: number;
  /** Atomic balance, or the error text */
  raw: string;
}

export interface WalletResult {
  address: string;
  balances: BalanceEntry[];
  error?: string;
}

export interface TokenBalance {
  balance: string;
  raw: string;
}

/**
 * Reads one token balance with `eth_call` at the latest block.
 *
 * @param rpc - JSON-RPC client
 * @param network - Network to query
 * @param address - Wallet address
 * @returns Human and atomic balance
 */
export async function queryTokenBalance(
  rpc: RpcClient,
  network: NetworkDescriptor,
  address: string,
): Promise<TokenBalance> {
  const data = encodeBalanceOf(address);
  const result = await rpc.ethCall(network.rpcUrl, { to: network.tokenContract, data });
  const raw = decodeUint256(result);
  return { balance: toHuman(raw, network.decimals), raw: raw.toString() };
}

/**
 * Picks the networks to query: one by name, or the whole registry.
 *
 * @param name - Network name from `--network`
 * @param registry - Network registry
 * @returns Name/descriptor pairs in registry order
 * @throws ConfigError for an unknown name
 */
export function selectNetworks(
  name: string | undefined,
  registry: NetworkRegistry = NETWORKS,
): Array<[string, NetworkDescriptor]> {
  if (name === undefined || name === "") {
    return Object.entries(registry);
  }
  if (!Object.hasOwn(registry, name)) {
    throw new ConfigError(`unknown network: ${name}`, {
      hint: `Available: ${availableNetworks(registry).join(", ")}`,
    });
  }
  return [[name, registry[name]]];
}

export interface QueryBalancesOptions {
  address: string;
  /** Single network; all networks when absent */
  network?: string;
  rpc: RpcClient;
  registry?: NetworkRegistry;
}

/**
 * Queries every targeted network concurrently. A failing network yields an
 * entry carrying its error and never affects the others.
 *
 * @param options - Address, network filter, client and registry
 * @returns One entry per network, in registry order
 */
export async function queryBalances(options: QueryBalancesOptions): Promise<BalanceEntry[]> {
  const { address, rpc } = options;
  const targets = selectNetworks(options.network, options.registry);

  return Promise.all(
    targets.map(async ([name, network]): Promise<BalanceEntry> => {
      const entry = {
        network: name,
        chainId: network.chainId,
        asset: BALANCE_ASSET,
        decimals: network.decimals,
      };
      try {
        const { balance, raw } = await queryTokenBalance(rpc, network, address);
        return { ...entry, balance, raw };
      } catch (error) {
        return { ...entry, balance: "error", raw: errorMessage(error) };
      }
    }),
  );
}
