import { z } from "zod";

/** Envelope every Deriv API response shares. */
export const DerivEnvelopeSchema = z
  .object({
    msg_type: z.string().optional(),
    req_id: z.number().int().optional(),
    error: z.object({ code: z.string(), message: z.string() }).optional(),
    subscription: z.object({ id: z.string() }).optional()
  })
  .passthrough();
export type DerivEnvelope = z.infer<typeof DerivEnvelopeSchema>;

export const DerivAuthorizeSchema = z.object({
  authorize: z.object({
    loginid: z.string(),
    currency: z.string().default(""),
    balance: z.number(),
    is_virtual: z.union([z.literal(0), z.literal(1), z.boolean()]).transform((v) => v === 1 || v === true)
  })
});
export type DerivAuthorize = z.infer<typeof DerivAuthorizeSchema>["authorize"];

export const DerivTickSchema = z.object({
  tick: z.object({
    symbol: z.string(),
    quote: z.number(),
    epoch: z.number().int(),
    pip_size: z.number().int().optional()
  })
});

export const DerivBuySchema = z.object({
  buy: z.object({
    contract_id: z.number().int(),
    buy_price: z.number(),
    balance_after: z.number().optional(),
    transaction_id: z.number().int().optional()
  })
});

export const DerivOpenContractSchema = z.object({
  proposal_open_contract: z
    .object({
      contract_id: z.number().int().optional(),
      is_sold: z.union([z.literal(0), z.literal(1), z.boolean()]).optional(),
      status: z.string().nullable().optional(),
      profit: z.number().optional(),
      exit_tick_display_value: z.string().optional()
    })
    .passthrough()
});
export type DerivOpenContract = z.infer<typeof DerivOpenContractSchema>["proposal_open_contract"];

export const DerivBalanceSchema = z.object({
  balance: z.object({
    balance: z.number(),
    currency: z.string()
  })
});

export class DerivApiError extends Error {
  constructor(
    readonly code: string,
    message: string
  ) {
    super(`Deriv ${code}: ${message}`);
    this.name = "DerivApiError";
  }
}
