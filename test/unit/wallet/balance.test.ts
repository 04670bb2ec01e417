import { describe, it, expect } from "vitest";
import { ConfigError } from "../../../src/lib/errors.js";
import { queryBalances, selectNetworks } from "../../../src/wallet/balance.js";
import { NETWORKS, availableNetworks, type NetworkRegistry } from "../../../src/wallet/networks.js";
import { RpcClient } from "../../../src/wallet/rpc.js";
import { TEST_SIGNER_ADDRESS, createStubAdapter } from "../../mocks/index.js";

const REGISTRY: NetworkRegistry = {
  alpha: {
    chainId: "eip155:1001",
    rpcUrl: "https://alpha.example.com",
    tokenContract: "0x3333333333333333333333333333333333333333",
    decimals: 6,
    name: "Alpha",
  },
  beta: {
    chainId: "eip155:1002",
    rpcUrl: "https://beta.example.com",
    tokenContract: "0x4444444444444444444444444444444444444444",
    decimals: 6,
    name: "Beta",
  },
};

function word(value: string): string {
  return `0x${value.padStart(64, "0")}`;
}

describe("selectNetworks", () => {
  it("returns every network when no name is given", () => {
    expect(selectNetworks(undefined, REGISTRY).map(([name]) => name)).toEqual(["alpha", "beta"]);
  });

  it("returns the named network", () => {
    expect(selectNetworks("beta", REGISTRY)).toEqual([["beta", REGISTRY.beta]]);
  });

  it("rejects unknown names with the available list", () => {
    const error = (() => {
      try {
        selectNetworks("gamma", REGISTRY);
      } catch (e) {
        return e;
      }
    })();
    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toHaveProperty("message", "unknown network: gamma");
    expect(error).toHaveProperty("hint", "Available: alpha, beta");
  });

  it("does not match inherited keys", () => {
    expect(() => selectNetworks("toString", REGISTRY)).toThrow("unknown network: toString");
  });
});

describe("queryBalances", () => {
  it("queries every network and keeps registry order", async () => {
    const stub = createStubAdapter(config => {
      const result = config.url === REGISTRY.alpha.rpcUrl ? word("16e360") : word("0");
      return { status: 200, body: JSON.stringify({ jsonrpc: "2.0", id: 1, result }) };
    });

    const balances = await queryBalances({
      address: TEST_SIGNER_ADDRESS,
      rpc: new RpcClient({ adapter: stub.adapter }),
      registry: REGISTRY,
    });

    expect(balances).toEqual([
      { network: "alpha", chainId: "eip155:1001", asset: "USDC", balance: "1.50", decimals: 6, raw: "1500000" },
      { network: "beta", chainId: "eip155:1002", asset: "USDC", balance: "0.000000", decimals: 6, raw: "0" },
    ]);
    expect(stub.calls).toHaveLength(2);
  });

  it("targets the token contract with balanceOf call data", async () => {
    const stub = createStubAdapter(() => ({
      status: 200,
      body: JSON.stringify({ jsonrpc: "2.0", id: 1, result: "0x" }),
    }));

    await queryBalances({
      address: TEST_SIGNER_ADDRESS,
      network: "alpha",
      rpc: new RpcClient({ adapter: stub.adapter }),
      registry: REGISTRY,
    });

    const request = JSON.parse(String(stub.calls[0].data));
    expect(request.method).toBe("eth_call");
    expect(request.params).toEqual([
      {
        to: REGISTRY.alpha.tokenContract,
        data: `0x70a08231000000000000000000000000${TEST_SIGNER_ADDRESS.slice(2)}`,
      },
      "latest",
    ]);
  });

  it("isolates a failing network", async () => {
    const stub = createStubAdapter(config => {
      if (config.url === REGISTRY.alpha.rpcUrl) {
        return { status: 200, body: JSON.stringify({ jsonrpc: "2.0", id: 1, error: { message: "boom" } }) };
      }
      return { status: 200, body: JSON.stringify({ jsonrpc: "2.0", id: 1, result: word("f4240") }) };
    });

    const balances = await queryBalances({
      address: TEST_SIGNER_ADDRESS,
      rpc: new RpcClient({ adapter: stub.adapter }),
      registry: REGISTRY,
    });

    expect(balances[0]).toMatchObject({ network: "alpha", balance: "error", raw: "rpc error: boom" });
    expect(balances[1]).toMatchObject({ network: "beta", balance: "1.000000", raw: "1000000" });
  });

  it("sends nothing for an unknown network", async () => {
    const stub = createStubAdapter(() => ({ status: 200, body: "{}" }));

    await expect(
      queryBalances({
        address: TEST_SIGNER_ADDRESS,
        network: "gamma",
        rpc: new RpcClient({ adapter: stub.adapter }),
        registry: REGISTRY,
      }),
    ).rejects.toThrow(ConfigError);
    expect(stub.calls).toHaveLength(0);
  });
});

describe("NETWORKS", () => {
  it("lists the supported networks", () => {
    expect(availableNetworks()).toEqual(["base", "base-sepolia", "avalanche", "avalanche-fuji"]);
  });

  it("cannot be modified", () => {
    expect(Object.isFrozen(NETWORKS)).toBe(true);
    expect(Object.isFrozen(NETWORKS.base)).toBe(true);
  });
});
