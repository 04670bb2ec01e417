import { EXIT_CODES, type ExitCode } from "../lib/errors.js";
import type { PaymentOutcome } from "../payment/executor.js";
import type { ProbeOutcome } from "../payment/probe.js";

export const RUN_STATUSES = [
  "free",
  "payment_required",
  "no_402",
  "accepted",
  "rejected",
  "error",
] as const;

export type RunStatus = (typeof RUN_STATUSES)[number];

export interface ProbeReport {
  statusCode: number;
  paymentRequired: boolean;
  paymentRequirements?: Readonly<Record<string, unknown>>;
  body?: string;
}

export interface PaymentReport {
  statusCode: number;
  accepted: boolean;
  signer?: string;
  paymentResponse?: Readonly<Record<string, unknown>>;
  body?: string;
}

/**
 * The document printed by `--json`. Keys follow the order they are printed in.
 */
export interface RunResult {
  readonly version: string;
  readonly endpoint: string;
  readonly method: string;
  readonly status: RunStatus;
  readonly probe: ProbeReport | null;
  readonly payment?: PaymentReport;
  readonly error?: string;
}

const EXIT_CODE_BY_STATUS: Record<RunStatus, ExitCode> = {
  free: EXIT_CODES.FREE_ROUTE,
  payment_required: EXIT_CODES.SUCCESS,
  no_402: EXIT_CODES.SUCCESS,
  accepted: EXIT_CODES.SUCCESS,
  rejected: EXIT_CODES.PAYMENT_REJECTED,
  error: EXIT_CODES.ERROR,
};

export function exitCodeFor(status: RunStatus): ExitCode {
  return EXIT_CODE_BY_STATUS[status];
}

export function toProbeReport(outcome: ProbeOutcome): ProbeReport {
  return {
    statusCode: outcome.statusCode,
    paymentRequired: outcome.paymentRequired,
    ...(outcome.paymentRequirements ? { paymentRequirements: outcome.paymentRequirements } : {}),
    ...(outcome.body ? { body: outcome.body } : {}),
  };
}

export function toPaymentReport(outcome: PaymentOutcome): PaymentReport {
  return {
    statusCode: outcome.statusCode,
    accepted: outcome.accepted,
    ...(outcome.signer ? { signer: outcome.signer } : {}),
    ...(outcome.paymentResponse ? { paymentResponse: outcome.paymentResponse } : {}),
    ...(outcome.body ? { body: outcome.body } : {}),
  };
}

/**
 * Collects the run result phase by phase. `finish` freezes it; nothing can
 * be recorded afterwards.
 */
export class RunResultBuilder {
  private method: string;
  private probe: ProbeReport | null = null;
  private payment?: PaymentReport;
  private finished = false;

  constructor(
    private readonly version: string,
    private readonly endpoint: string,
    method = "",
  ) {
    this.method = method;
  }

  setMethod(method: string): this {
    this.assertOpen();
    this.method = method;
    return this;
  }

  recordProbe(outcome: ProbeOutcome): this {
    this.assertOpen();
    this.probe = toProbeReport(outcome);
    return this;
  }

  recordPayment(outcome: PaymentOutcome): this {
    this.assertOpen();
    this.payment = toPaymentReport(outcome);
    return this;
  }

  get isFinished(): boolean {
    return this.finished;
  }

  finish(status: RunStatus, error?: string): RunResult {
    this.assertOpen();
    this.finished = true;
    return Object.freeze({
      version: this.version,
      endpoint: this.endpoint,
      method: this.method,
      status,
      probe: this.probe,
      ...(this.payment ? { payment: this.payment } : {}),
      ...(error ? { error } : {}),
    });
  }

  private assertOpen(): void {
    if (this.finished) {
      throw new Error("Run result has already been emitted");
    }
  }
}
