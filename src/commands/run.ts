import type { AxiosAdapter } from "axios";
import { truncate } from "../lib/encoding.js";
import { ConfigError, EXIT_CODES, errorHint, errorMessage, type ExitCode } from "../lib/errors.js";
import { HttpTransport, createEndpointTarget, resolveMethod } from "../lib/http.js";
import { SettleResponseSchema } from "../lib/schemas.js";
import { Reporter, resolveOutputMode } from "../output/reporter.js";
import { RunResultBuilder } from "../output/result.js";
import { confirmPayment, summarizePayment } from "../payment/confirm.js";
import {
  PAYMENT_RESPONSE_HEADER,
  classifyPayment,
  executePayment,
} from "../payment/executor.js";
import { PAYMENT_REQUIRED_HEADER, classifyProbe, probeEndpoint } from "../payment/probe.js";
import { evmPaymentScheme, type PaymentScheme } from "../payment/scheme.js";
import { DEFAULT_TIMEOUT, getPrivateKey, parseDuration } from "../utils/config.js";
import { CLI_NAME, VERSION } from "../version.js";

const PROBE_BODY_PREVIEW = 300;
const PAYMENT_BODY_PREVIEW = 500;

export interface RunOptions {
  insecure?: boolean;
  timeout?: string;
  method?: string;
  data?: string;
  header?: string[];
  verbose?: boolean;
  dryRun?: boolean;
  json?: boolean;
  yes?: boolean;
  quiet?: boolean;
  output?: string;
  skipVerify?: boolean;
  version?: boolean;
}

export interface RunContext {
  privateKey?: string;
  scheme: PaymentScheme;
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  color?: boolean;
  /** Replaces the network adapter (tests) */
  adapter?: AxiosAdapter;
  writeFile?: (path: string, data: string) => Promise<void>;
}

/**
 * Probes an endpoint and, when it asks for payment, pays and retries.
 *
 * Step 1 sends the request without payment. A 200 ends the run as a free
 * route, any status other than 402 ends it as `no_402`. On 402 the run may
 * stop (`--skip-verify`, declined or JSON `--dry-run`), otherwise Step 2
 * signs a payment and sends the request again.
 *
 * @param url - Endpoint URL from the command line
 * @param options - Parsed command options
 * @param context - Credential, payment scheme and streams
 * @returns The process exit code
 */
export async function runEndpoint(
  url: string | undefined,
  options: RunOptions,
  context: RunContext,
): Promise<ExitCode> {
  const reporter = new Reporter({
    mode: resolveOutputMode(options),
    verbose: options.verbose,
    stdout: context.stdout,
    stderr: context.stderr,
    color: context.color,
    writeFile: context.writeFile,
  });
  const { logger } = reporter;

  if (options.version) {
    reporter.printVersion(CLI_NAME, VERSION);
    return EXIT_CODES.SUCCESS;
  }

  const result = new RunResultBuilder(VERSION, url ?? "");

  try {
    result.setMethod(resolveMethod(options.method, options.data));
    if (!url) {
      throw new ConfigError("URL argument is required", {
        hint: `Usage: ${CLI_NAME} [options] <url>`,
      });
    }

    const timeoutMs = parseDuration(options.timeout ?? DEFAULT_TIMEOUT);
    const target = createEndpointTarget({
      url,
      method: options.method,
      data: options.data,
      headers: options.header,
    });

    logger.log(`${CLI_NAME} ${VERSION}`);
    logger.log(`Endpoint: ${target.url}`);
    logger.log(`Method:   ${target.method}`);

    const transport = new HttpTransport({
      insecure: options.insecure,
      timeoutMs,
      adapter: context.adapter,
    });

    // Step 1: request without payment
    logger.header("Step 1: Request without payment");
    reporter.dumpRequest(target);

    const probeSpinner = reporter.spinner("Sending request").start();
    const probe = await probeEndpoint(transport, target).catch((error: unknown) => {
      probeSpinner.fail("Request failed");
      throw error;
    });
    probeSpinner.stop();

    reporter.dumpResponse(probe);
    reporter.printEncodedHeader(PAYMENT_REQUIRED_HEADER, probe.encodedRequirements);
    logger.keyValue("Status", String(probe.statusCode));
    if (!reporter.verbose) {
      logger.keyValue("Body", truncate(probe.body, PROBE_BODY_PREVIEW));
    }
    result.recordProbe(probe);

    const classification = classifyProbe(probe.statusCode);
    if (classification !== "payment_required") {
      logger.warn("Endpoint did not return 402 Payment Required.");
      if (classification === "free") {
        logger.info("The endpoint is accessible without payment (free route).");
        await reporter.saveOutput(options.output, probe.body);
        return reporter.emit(result.finish("free"));
      }
      return reporter.emit(result.finish("no_402"));
    }

    if (options.skipVerify) {
      logger.info("--skip-verify: stopping after Step 1.");
      return reporter.emit(result.finish("payment_required"));
    }

    if (options.dryRun && !options.yes) {
      if (reporter.mode === "json") {
        return reporter.emit(result.finish("payment_required"));
      }
      reporter.print(summarizePayment(probe.paymentRequirements, probe.body));
      reporter.print([""]);
      const confirmed = await confirmPayment(context.stdin, context.stdout);
      if (!confirmed) {
        reporter.print(["Aborted."]);
        return reporter.emit(result.finish("payment_required"));
      }
    }

    // Step 2: request with payment
    logger.header("Step 2: Request with payment");

    const paySpinner = reporter.spinner("Paying and retrying request");
    const payment = await executePayment({
      transport,
      target,
      scheme: context.scheme,
      privateKey: context.privateKey,
      onSigner: signer => {
        logger.keyValue("Signer", signer.address);
        paySpinner.start();
      },
    }).catch((error: unknown) => {
      if (paySpinner.isSpinning) {
        paySpinner.fail("Payment request failed");
      }
      throw error;
    });
    paySpinner.stop();

    reporter.dumpResponse(payment);
    reporter.printEncodedHeader(PAYMENT_RESPONSE_HEADER, payment.encodedResponse);
    logger.keyValue("Status", String(payment.statusCode));
    if (!reporter.verbose) {
      logger.keyValue("Body", truncate(payment.body, PAYMENT_BODY_PREVIEW));
    }
    result.recordPayment(payment);

    await reporter.saveOutput(options.output, payment.body);

    switch (classifyPayment(payment.statusCode)) {
      case "accepted": {
        logger.success("Payment accepted!");
        const settlement = SettleResponseSchema.safeParse(payment.paymentResponse);
        if (settlement.success && settlement.data.transaction) {
          logger.keyValue("Transaction", settlement.data.transaction);
        }
        return reporter.emit(result.finish("accepted"));
      }
      case "rejected":
        logger.error("Payment was rejected. Check wallet balance and facilitator logs.");
        return reporter.emit(result.finish("rejected"));
      case "unexpected":
        return reporter.emit(result.finish("error", `unexpected status ${payment.statusCode}`));
    }
  } catch (error) {
    if (result.isFinished) {
      throw error;
    }
    return reporter.emit(result.finish("error", errorMessage(error)), errorHint(error));
  }
}

/**
 * Commander action for the default command.
 */
export async function runCommand(url: string | undefined, options: RunOptions): Promise<void> {
  process.exitCode = await runEndpoint(url, options, {
    privateKey: getPrivateKey(),
    scheme: evmPaymentScheme,
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
  });
}
