import { z } from 'zod';

export const DEFAULT_OUTPUT_PATH = 'transactions.csv';

/**
 * Export command options
 */
export const ExportCommandOptionsSchema = z.object({
  address: z
    .string({ required_error: 'Wallet address is required (-a, --address)' })
    .trim()
    .min(1, 'Wallet address is required (-a, --address)'),
  output: z.string().trim().min(1, 'Output path must not be empty').default(DEFAULT_OUTPUT_PATH),
});
