import type { AxiosInstance } from "axios";
import { wrapAxiosWithPayment } from "@x402/axios";
import { x402Client } from "@x402/core/client";
import { registerExactEvmScheme } from "@x402/evm/exact/client";
import { isHex } from "viem";
import { privateKeyToAccount, type PrivateKeyAccount } from "viem/accounts";

/**
 * Public identity of whoever signs payments.
 */
export interface PaymentSigner {
  readonly address: string;
}

/**
 * Seam to the payment-client library. The probe/pay flow only needs a
 * signer identity and a transport that pays on 402.
 */
export interface PaymentScheme<TSigner extends PaymentSigner = PaymentSigner> {
  /**
   * Derives the signer from a raw private key.
   *
   * @throws when the key material is malformed
   */
  createSigner(privateKey: string): TSigner;

  /**
   * Wraps a client so that a 402 response is answered with a signed payment
   * and the request is sent again once.
   */
  wrapTransport(client: AxiosInstance, signer: TSigner): AxiosInstance;
}

/**
 * Normalises a hex private key to a 0x-prefixed 32-byte value.
 *
 * @param privateKey - Key with or without 0x prefix
 * @returns The key as a viem Hex
 */
export function normalizePrivateKey(privateKey: string): `0x${string}` {
  const trimmed = privateKey.trim();
  const prefixed = trimmed.startsWith("0x") ? trimmed : `0x${trimmed}`;
  if (!isHex(prefixed, { strict: true }) || prefixed.length !== 66) {
    throw new Error("private key must be 32 bytes of hex");
  }
  return prefixed;
}

/**
 * Exact-amount EVM payments (EIP-3009 authorisations) on every eip155 network.
 */
export const evmPaymentScheme: PaymentScheme<PrivateKeyAccount> = {
  createSigner(privateKey) {
    return privateKeyToAccount(normalizePrivateKey(privateKey));
  },

  wrapTransport(client, signer) {
    const paymentClient = new x402Client();
    registerExactEvmScheme(paymentClient, { signer });
    return wrapAxiosWithPayment(client, paymentClient);
  },
};
