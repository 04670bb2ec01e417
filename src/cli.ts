#!/usr/bin/env node

import { Command } from "commander";
import { runCommand } from "./commands/run.js";
import { walletCommand } from "./commands/wallet.js";
import { DEFAULT_TIMEOUT, PRIVATE_KEY_ENV, loadEnv } from "./utils/config.js";
import { availableNetworks } from "./wallet/networks.js";
import { CLI_NAME } from "./version.js";

loadEnv();

const collect = (value: string, previous: string[]) => [...previous, value];

const program = new Command();

program
  .name(CLI_NAME)
  .description("CLI tool for testing HTTP 402 payment-protected endpoints")
  .addHelpText(
    "after",
    `
Exit codes:
  0  Success (payment accepted or probe completed)
  1  Error (network, config, or unexpected failure)
  2  Payment rejected by facilitator
  3  Route is free (no payment needed)

Environment:
  ${PRIVATE_KEY_ENV}    Private key for signing payments`,
  );

program
  .command("run", { isDefault: true })
  .description("Probe an endpoint and pay for it when it answers 402 Payment Required")
  .argument("[url]", "Endpoint URL")
  .option("-k, --insecure", "Skip TLS certificate verification")
  .option("--timeout <duration>", "Request timeout (e.g. 30s, 500ms, 1m)", DEFAULT_TIMEOUT)
  .option("-X, --method <method>", "HTTP method (default: GET, or POST with --data)")
  .option("-d, --data <body>", "Request body (implies POST if -X is not set)")
  .option("-H, --header <header>", "Custom header 'Key: Value' (repeatable)", collect, [])
  .option("-v, --verbose", "Show full request/response headers")
  .option("--dry-run", "Show payment cost and ask for confirmation before paying")
  .option("--json", "Output structured JSON (for agents and scripts)")
  .option("-y, --yes", "Auto-confirm payment without prompting")
  .option("-q, --quiet", "Suppress human-readable output, only print JSON or exit code")
  .option("-o, --output <file>", "Save response body to file")
  .option("--skip-verify", "Only send Step 1 (no payment)")
  .option("--version", "Print version and exit")
  .addHelpText(
    "after",
    `
Examples:
  $ ${CLI_NAME} https://api.example.com/paid-endpoint
  $ ${CLI_NAME} -k https://podinfo.localhost/api/info
  $ ${CLI_NAME} -X POST -d '{"query": "hello"}' -H 'Content-Type: application/json' https://api.example.com/ask
  $ ${CLI_NAME} -v --dry-run https://api.example.com/paid-endpoint
  $ ${CLI_NAME} --json -y -o response.json https://api.example.com/paid-endpoint`,
  )
  .action(runCommand);

program
  .command("wallet")
  .description(`Show wallet address and USDC balances derived from ${PRIVATE_KEY_ENV}`)
  .option("-n, --network <name>", `Query one network (${availableNetworks().join(", ")})`)
  .option("--json", "Output JSON")
  .action(walletCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
