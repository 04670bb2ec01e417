import { describe, it, expect, vi } from "vitest";
import { runEndpoint, type RunOptions } from "../../../src/commands/run.js";
import {
  FakePaymentScheme,
  PAYMENT_SIGNATURE_HEADER,
  TEST_PRIVATE_KEY,
  TEST_SIGNER_ADDRESS,
  buildPaymentRequired,
  buildSettleResponse,
  captureStream,
  createStubAdapter,
  inputStream,
  networkFailure,
  paymentRequiredHeaders,
  paymentResponseHeaders,
  type StubHandler,
  type StubResponse,
} from "../../mocks/index.js";

const ENDPOINT = "https://api.example.com/paid";

const PAID: StubResponse = {
  status: 200,
  statusText: "OK",
  headers: paymentResponseHeaders(),
  body: '{"data":"paid"}',
};

/** 402 until the request carries a payment signature, then `paid`. */
function paywall(paid: StubResponse = PAID): StubHandler {
  return config =>
    config.headers.get(PAYMENT_SIGNATURE_HEADER)
      ? paid
      : { status: 402, statusText: "Payment Required", headers: paymentRequiredHeaders(), body: "{}" };
}

interface SetupOptions {
  privateKey?: string | null;
  stdin?: string;
  scheme?: FakePaymentScheme;
}

function setup(handler: StubHandler, setupOptions: SetupOptions = {}) {
  const stub = createStubAdapter(handler);
  const stdout = captureStream();
  const stderr = captureStream();
  const scheme = setupOptions.scheme ?? new FakePaymentScheme();
  const writeFile = vi.fn(async (_path: string, _data: string) => {});
  const run = (url: string | undefined, options: RunOptions = {}) =>
    runEndpoint(url, options, {
      privateKey: setupOptions.privateKey === null ? undefined : (setupOptions.privateKey ?? TEST_PRIVATE_KEY),
      scheme,
      stdin: inputStream(setupOptions.stdin ?? ""),
      stdout: stdout.stream,
      stderr: stderr.stream,
      color: false,
      adapter: stub.adapter,
      writeFile,
    });
  return { stub, stdout, stderr, scheme, writeFile, run };
}

describe("runEndpoint", () => {
  describe("step 1", () => {
    it("reports a free route with exit code 3", async () => {
      const { run, stdout, stub, scheme } = setup(() => ({ status: 200, statusText: "OK", body: "free content" }));

      await expect(run(ENDPOINT)).resolves.toBe(3);

      expect(stdout.text()).toBe(
        [
          "pay-probe 0.1.0",
          `Endpoint: ${ENDPOINT}`,
          "Method:   GET",
          "",
          "Step 1: Request without payment",
          "  Status: 200",
          "  Body: free content",
          "⚠ Endpoint did not return 402 Payment Required.",
          "ℹ The endpoint is accessible without payment (free route).",
          "",
        ].join("\n"),
      );
      expect(stub.calls).toHaveLength(1);
      expect(scheme.createdWith).toEqual([]);
    });

    it("reports a free route without a private key", async () => {
      const { run } = setup(() => ({ status: 200, body: "free content" }), { privateKey: null });
      await expect(run(ENDPOINT, { quiet: true })).resolves.toBe(3);
    });

    it("continues when the payment requirements do not decode", async () => {
      const { run, stdout } = setup(() => ({ status: 402, headers: { "payment-required": "%%%" } }));

      await expect(run(ENDPOINT, { json: true, skipVerify: true })).resolves.toBe(0);

      expect(JSON.parse(stdout.text()).probe).toEqual({ statusCode: 402, paymentRequired: true });
    });

    it("saves the body of a free route", async () => {
      const { run, writeFile } = setup(() => ({ status: 200, body: "free content" }));
      await run(ENDPOINT, { output: "out.txt" });
      expect(writeFile).toHaveBeenCalledWith("out.txt", "free content");
    });

    it("exits 0 when the endpoint answers without 402", async () => {
      const { run, stdout } = setup(() => ({ status: 404, body: "missing" }));

      await expect(run(ENDPOINT, { json: true })).resolves.toBe(0);

      expect(JSON.parse(stdout.text())).toEqual({
        version: "0.1.0",
        endpoint: ENDPOINT,
        method: "GET",
        status: "no_402",
        probe: { statusCode: 404, paymentRequired: false, body: "missing" },
      });
    });

    it("stops after step 1 with --skip-verify", async () => {
      const { run, stdout, stub, scheme } = setup(paywall(), { privateKey: null });

      await expect(run(ENDPOINT, { skipVerify: true })).resolves.toBe(0);

      expect(stdout.text()).toContain("ℹ --skip-verify: stopping after Step 1.\n");
      expect(stdout.text()).not.toContain("Step 2");
      expect(stub.calls).toHaveLength(1);
      expect(scheme.wrapCount).toBe(0);
    });

    it("shows the payment requirements header", async () => {
      const { run, stdout } = setup(paywall());
      await run(ENDPOINT, { skipVerify: true });
      expect(stdout.text()).toContain('PAYMENT-REQUIRED (decoded):\n  {\n    "x402Version": 2,');
    });

    it("implies POST when a body is sent", async () => {
      const { run, stub } = setup(() => ({ status: 200 }));
      await run(ENDPOINT, { data: '{"q":1}', header: ["Content-Type: application/json"] });
      expect(stub.calls[0].method).toBe("post");
      expect(stub.calls[0].data).toBe('{"q":1}');
      expect(stub.calls[0].headers.get("Content-Type")).toBe("application/json");
    });

    it("reports transport failures as errors", async () => {
      const { run, stdout } = setup(networkFailure("ENOTFOUND", "getaddrinfo ENOTFOUND api.example.com"));

      await expect(run(ENDPOINT, { json: true })).resolves.toBe(1);

      expect(JSON.parse(stdout.text())).toEqual({
        version: "0.1.0",
        endpoint: ENDPOINT,
        method: "GET",
        status: "error",
        probe: null,
        error: "getaddrinfo ENOTFOUND api.example.com",
      });
    });
  });

  describe("input errors", () => {
    it("requires a URL", async () => {
      const { run, stderr, stub } = setup(() => ({ status: 200 }));

      await expect(run(undefined)).resolves.toBe(1);

      expect(stderr.text()).toBe("Error: URL argument is required\nUsage: pay-probe [options] <url>\n");
      expect(stub.calls).toHaveLength(0);
    });

    it("rejects an invalid URL before sending anything", async () => {
      const { run, stdout, stub } = setup(() => ({ status: 200 }));

      await expect(run("not-a-url", { json: true })).resolves.toBe(1);

      expect(JSON.parse(stdout.text())).toEqual({
        version: "0.1.0",
        endpoint: "not-a-url",
        method: "GET",
        status: "error",
        probe: null,
        error: "invalid URL: not-a-url",
      });
      expect(stub.calls).toHaveLength(0);
    });

    it("records the implied method when the URL is invalid", async () => {
      const { run, stdout } = setup(() => ({ status: 200 }));

      await expect(run("not-a-url", { json: true, data: "q=1" })).resolves.toBe(1);

      expect(JSON.parse(stdout.text()).method).toBe("POST");
    });

    it("rejects an invalid timeout", async () => {
      const { run, stdout } = setup(() => ({ status: 200 }));
      await expect(run(ENDPOINT, { json: true, timeout: "soon" })).resolves.toBe(1);
      expect(JSON.parse(stdout.text()).error).toBe("invalid duration: soon");
    });

    it("prints the version and exits", async () => {
      const { run, stdout, stub } = setup(() => ({ status: 200 }));
      await expect(run(undefined, { version: true })).resolves.toBe(0);
      expect(stdout.text()).toBe("pay-probe 0.1.0\n");
      expect(stub.calls).toHaveLength(0);
    });
  });

  describe("step 2", () => {
    it("pays and reports the settlement", async () => {
      const { run, stdout, stub, scheme, writeFile } = setup(paywall());

      await expect(run(ENDPOINT, { output: "out.json" })).resolves.toBe(0);

      const text = stdout.text();
      expect(text).toContain("\nStep 2: Request with payment\n");
      expect(text).toContain(`  Signer: ${TEST_SIGNER_ADDRESS}\n`);
      expect(text).toContain("✓ Payment accepted!\n  Transaction: 0xabc123\n");
      expect(scheme.createdWith).toEqual([TEST_PRIVATE_KEY]);
      expect(stub.calls).toHaveLength(3);
      expect(writeFile).toHaveBeenCalledWith("out.json", '{"data":"paid"}');
    });

    it("emits one JSON document for a paid run", async () => {
      const { run, stdout, stderr } = setup(paywall());

      await expect(run(ENDPOINT, { json: true, quiet: true })).resolves.toBe(0);

      expect(stderr.text()).toBe("");
      expect(JSON.parse(stdout.text())).toEqual({
        version: "0.1.0",
        endpoint: ENDPOINT,
        method: "GET",
        status: "accepted",
        probe: {
          statusCode: 402,
          paymentRequired: true,
          paymentRequirements: buildPaymentRequired(),
          body: "{}",
        },
        payment: {
          statusCode: 200,
          accepted: true,
          signer: TEST_SIGNER_ADDRESS,
          paymentResponse: buildSettleResponse(),
          body: '{"data":"paid"}',
        },
      });
    });

    it("prints nothing in quiet mode", async () => {
      const { run, stdout, stderr } = setup(paywall());
      await expect(run(ENDPOINT, { quiet: true })).resolves.toBe(0);
      expect(stdout.text()).toBe("");
      expect(stderr.text()).toBe("");
    });

    it("exits 2 when the payment is rejected", async () => {
      const { run, stdout } = setup(paywall({ status: 402, body: '{"error":"insufficient_funds"}' }));

      await expect(run(ENDPOINT)).resolves.toBe(2);

      expect(stdout.text()).toContain(
        "✗ Payment was rejected. Check wallet balance and facilitator logs.\n",
      );
    });

    it("treats other statuses after payment as errors", async () => {
      const { run, stdout } = setup(paywall({ status: 500, body: "settlement failed" }));

      await expect(run(ENDPOINT, { json: true })).resolves.toBe(1);

      const result = JSON.parse(stdout.text());
      expect(result.status).toBe("error");
      expect(result.error).toBe("unexpected status 500");
      expect(result.payment).toEqual({ statusCode: 500, accepted: false, signer: TEST_SIGNER_ADDRESS, body: "settlement failed" });
    });

    it("reports an unexpected status once, on stderr", async () => {
      const { run, stdout, stderr } = setup(paywall({ status: 500, body: "settlement failed" }));

      await expect(run(ENDPOINT)).resolves.toBe(1);

      expect(stdout.text()).not.toContain("nexpected status");
      expect(stderr.text()).toContain("Error: unexpected status 500\n");
      expect(stderr.text().match(/unexpected status/g)).toHaveLength(1);
    });

    it("fails without a private key and sends no payment", async () => {
      const { run, stderr, stub, scheme } = setup(paywall(), { privateKey: null });

      await expect(run(ENDPOINT)).resolves.toBe(1);

      expect(stderr.text()).toContain(
        "Error: EVM_PRIVATE_KEY is required for Step 2 (payment)\nSet it with: export EVM_PRIVATE_KEY=0x...\n",
      );
      expect(stub.calls).toHaveLength(1);
      expect(scheme.wrapCount).toBe(0);
    });

    it("reports a malformed key", async () => {
      const { run, stdout } = setup(paywall(), { scheme: new FakePaymentScheme(true) });
      await expect(run(ENDPOINT, { json: true })).resolves.toBe(1);
      expect(JSON.parse(stdout.text()).error).toBe("failed to create signer: invalid private key");
    });
  });

  describe("--dry-run", () => {
    it("stops after step 1 in JSON mode", async () => {
      const { run, stdout, stub } = setup(paywall());

      await expect(run(ENDPOINT, { json: true, dryRun: true })).resolves.toBe(0);

      expect(JSON.parse(stdout.text()).status).toBe("payment_required");
      expect(stub.calls).toHaveLength(1);
    });

    it("aborts when the operator declines", async () => {
      const { run, stdout, stub } = setup(paywall(), { stdin: "n\n" });

      await expect(run(ENDPOINT, { dryRun: true })).resolves.toBe(0);

      expect(stdout.text()).toContain(
        [
          "--- Payment Summary ---",
          "Resource: https://api.example.com/paid",
          "Cost:     10000 USDC (atomic units)",
          "Network:  eip155:84532",
          "Pay to:   0x2222222222222222222222222222222222222222",
          "",
          "Proceed with payment? [y/N] Aborted.",
          "",
        ].join("\n"),
      );
      expect(stub.calls).toHaveLength(1);
    });

    it("aborts at end of input", async () => {
      const { run, stub } = setup(paywall());
      await expect(run(ENDPOINT, { dryRun: true })).resolves.toBe(0);
      expect(stub.calls).toHaveLength(1);
    });

    it("pays once confirmed", async () => {
      const { run, stdout, stub } = setup(paywall(), { stdin: "y\n" });

      await expect(run(ENDPOINT, { dryRun: true })).resolves.toBe(0);

      expect(stdout.text()).toContain("✓ Payment accepted!");
      expect(stub.calls).toHaveLength(3);
    });

    it("skips the prompt with --yes", async () => {
      const { run, stdout, stub } = setup(paywall());

      await expect(run(ENDPOINT, { dryRun: true, yes: true })).resolves.toBe(0);

      expect(stdout.text()).not.toContain("Proceed with payment?");
      expect(stub.calls).toHaveLength(3);
    });
  });
});
