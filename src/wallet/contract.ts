import { encodeFunctionData, erc20Abi, hexToBigInt, isAddress, type Hex } from "viem";
import { ConfigError } from "../lib/errors.js";

/** `balanceOf(address)` */
export const BALANCE_OF_SELECTOR = "0x70a08231";

const HEX_DIGITS = /^[0-9a-fA-F]+$/;

/**
 * Call data for `balanceOf(owner)`: the selector followed by the owner
 * address left-padded to 32 bytes.
 *
 * @param owner - Wallet address
 * @returns ABI-encoded call data
 * @throws ConfigError when the address is malformed
 */
export function encodeBalanceOf(owner: string): Hex {
  const address = owner.trim().toLowerCase();
  if (!isAddress(address)) {
    throw new ConfigError(`invalid address: ${owner}`);
  }
  return encodeFunctionData({
    abi: erc20Abi,
    functionName: "balanceOf",
    args: [address],
  });
}

/**
 * Decodes an `eth_call` result holding a single uint256.
 * An empty result ("0x") counts as zero.
 *
 * @param result - Hex string from the RPC node
 * @returns The decoded integer
 */
export function decodeUint256(result: string): bigint {
  const digits = result.startsWith("0x") || result.startsWith("0X") ? result.slice(2) : result;
  if (digits === "") {
    return 0n;
  }
  if (!HEX_DIGITS.test(digits)) {
    throw new Error(`invalid hex: ${digits}`);
  }
  return hexToBigInt(`0x${digits}`);
}
