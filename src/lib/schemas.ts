import { z } from "zod";

// ============================================================================
// Payment requirements (PAYMENT-REQUIRED header, or the 402 body)
// ============================================================================

/**
 * One accepted way to pay. Only the fields shown to the operator are
 * required; everything else passes through untouched.
 */
export const PaymentOptionSchema = z
  .object({
    scheme: z.string().optional(),
    network: z.string(),
    asset: z.string(),
    amount: z.string().optional(),
    /** Older documents name the amount this way */
    maxAmountRequired: z.string().optional(),
    payTo: z.string(),
    extra: z
      .object({
        name: z.string().optional(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();
export type PaymentOption = z.infer<typeof PaymentOptionSchema>;

export const PaymentRequiredSchema = z
  .object({
    x402Version: z.number().optional(),
    error: z.string().optional(),
    resource: z
      .object({
        url: z.string(),
        description: z.string().optional(),
      })
      .passthrough()
      .optional(),
    accepts: z.array(PaymentOptionSchema),
  })
  .passthrough();
export type PaymentRequiredDocument = z.infer<typeof PaymentRequiredSchema>;

// ============================================================================
// Settlement result (PAYMENT-RESPONSE header)
// ============================================================================

export const SettleResponseSchema = z
  .object({
    success: z.boolean(),
    errorReason: z.string().optional(),
    payer: z.string().optional(),
    transaction: z.string().optional(),
    network: z.string().optional(),
  })
  .passthrough();
export type SettleResponseDocument = z.infer<typeof SettleResponseSchema>;

/**
 * Amount of a payment option in atomic units, whichever field carries it.
 *
 * @param option - The accepted payment option
 * @returns The amount string, or undefined when neither field is set
 */
export function optionAmount(option: PaymentOption): string | undefined {
  return option.amount ?? option.maxAmountRequired;
}

/**
 * Display name of the option's asset: `extra.name` when present, else the asset id.
 *
 * @param option - The accepted payment option
 * @returns The asset label
 */
export function optionAssetName(option: PaymentOption): string {
  return option.extra?.name || option.asset;
}
