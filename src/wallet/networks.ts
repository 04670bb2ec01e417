/**
 * RPC endpoint and stablecoin contract for one EVM network.
 */
export interface NetworkDescriptor {
  /** CAIP-2 chain identifier */
  readonly chainId: string;
  readonly rpcUrl: string;
  readonly tokenContract: string;
  readonly decimals: number;
  /** Display name */
  readonly name: string;
}

export type NetworkRegistry = Readonly<Record<string, NetworkDescriptor>>;

export const BALANCE_ASSET = "USDC";

function freezeRegistry(registry: Record<string, NetworkDescriptor>): NetworkRegistry {
  for (const descriptor of Object.values(registry)) {
    Object.freeze(descriptor);
  }
  return Object.freeze(registry);
}

/**
 * Networks queried by `wallet`, keyed by the name given to `--network`.
 */
export const NETWORKS: NetworkRegistry = freezeRegistry({
  base: {
    chainId: "eip155:8453",
    rpcUrl: "https://mainnet.base.org",
    tokenContract: "0x833589fCD6eDb6E08f4c7C32D4f71b54bdA02913",
    decimals: 6,
    name: "Base",
  },
  "base-sepolia": {
    chainId: "eip155:84532",
    rpcUrl: "https://sepolia.base.org",
    tokenContract: "0x036CbD53842c5426634e7929541eC2318f3dCF7e",
    decimals: 6,
    name: "Base Sepolia",
  },
  avalanche: {
    chainId: "eip155:43114",
    rpcUrl: "https://api.avax.network/ext/bc/C/rpc",
    tokenContract: "0xB97EF9Ef8734C71904D8002F8b6Bc66Dd9c48a6E",
    decimals: 6,
    name: "Avalanche",
  },
  "avalanche-fuji": {
    chainId: "eip155:43113",
    rpcUrl: "https://api.avax-test.network/ext/bc/C/rpc",
    tokenContract: "0x5425890298aed601595a70AB815c96711a31Bc65",
    decimals: 6,
    name: "Avalanche Fuji",
  },
});

export function availableNetworks(registry: NetworkRegistry = NETWORKS): string[] {
  return Object.keys(registry);
}
