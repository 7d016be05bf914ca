import { z } from 'zod';

// Largest Unix time, in seconds, that a JavaScript Date can represent
const MAX_TIMESTAMP_SECONDS = 8_640_000_000_000;

/**
 * Null or absent user accounts are read as the empty string
 */
const HeliusUserAccountSchema = z
  .string()
  .nullish()
  .transform((val) => val ?? '');

/**
 * Schema for a native (lamport) transfer in a Helius enhanced transaction
 */
export const HeliusNativeTransferSchema = z.object({
  amount: z.number().int('Amount must be an integer number of lamports').nonnegative('Amount must be non-negative'),
  fromUserAccount: HeliusUserAccountSchema,
  toUserAccount: HeliusUserAccountSchema,
});

/**
 * Unscaled token amount: integer in the token's smallest unit plus its decimals
 */
export const HeliusRawTokenAmountSchema = z.object({
  decimals: z.number().int().nonnegative('Decimals must be non-negative'),
  tokenAmount: z.union([
    z.string().regex(/^\d+$/, 'Raw token amount must be an integer string'),
    z.number().int().nonnegative(),
  ]),
});

/**
 * Schema for an SPL token transfer. `tokenAmount` is already scaled by the
 * mint's decimals; `rawTokenAmount` wins when both are present.
 */
export const HeliusTokenTransferSchema = z
  .object({
    fromUserAccount: HeliusUserAccountSchema,
    mint: z.string().min(1, 'Mint must not be empty'),
    rawTokenAmount: HeliusRawTokenAmountSchema.nullish(),
    toUserAccount: HeliusUserAccountSchema,
    tokenAmount: z
      .union([
        z.number().nonnegative('Token amount must be non-negative'),
        z.string().regex(/^\d+(\.\d+)?$/, 'Token amount must be a decimal string'),
      ])
      .nullish(),
    tokenStandard: z.string().nullish(),
  })
  .refine((transfer) => (transfer.rawTokenAmount ?? transfer.tokenAmount ?? undefined) !== undefined, {
    message: 'Token transfer carries no amount',
    path: ['tokenAmount'],
  });

/**
 * Schema for a Helius enhanced transaction, restricted to the fields the ledger reads
 */
export const HeliusEnhancedTransactionSchema = z.object({
  description: z.string().nullish(),
  fee: z
    .number()
    .int()
    .nonnegative('Fee must be non-negative')
    .nullish()
    .transform((val) => val ?? 0),
  nativeTransfers: z
    .array(HeliusNativeTransferSchema)
    .nullish()
    .transform((val) => val ?? []),
  signature: z.string().min(1, 'Signature must not be empty'),
  source: z.string().nullish(),
  timestamp: z
    .number()
    .int('Timestamp must be in whole seconds')
    .nonnegative('Timestamp must be non-negative')
    .max(MAX_TIMESTAMP_SECONDS, 'Timestamp is out of range'),
  tokenTransfers: z
    .array(HeliusTokenTransferSchema)
    .nullish()
    .transform((val) => val ?? []),
  type: z.string().nullish(),
});

/**
 * A page from `/v0/addresses/{address}/transactions`. Items are checked one by
 * one by the mapper so a malformed transaction does not invalidate its page.
 */
export const HeliusTransactionPageSchema = z.array(z.unknown());

export type HeliusNativeTransfer = z.infer<typeof HeliusNativeTransferSchema>;
export type HeliusTokenTransfer = z.infer<typeof HeliusTokenTransferSchema>;
export type HeliusEnhancedTransaction = z.infer<typeof HeliusEnhancedTransactionSchema>;
