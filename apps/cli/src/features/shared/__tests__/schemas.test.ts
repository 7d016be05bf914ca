import { describe, expect, it } from 'vitest';

import { ExportCommandOptionsSchema } from '../schemas.js';

describe('ExportCommandOptionsSchema', () => {
  it('defaults the output path', () => {
    expect(ExportCommandOptionsSchema.parse({ address: 'wallet' })).toEqual({
      address: 'wallet',
      output: 'transactions.csv',
    });
  });

  it('requires an address', () => {
    const result = ExportCommandOptionsSchema.safeParse({ output: 'out.csv' });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe('Wallet address is required (-a, --address)');
  });

  it('rejects a blank address', () => {
    const result = ExportCommandOptionsSchema.safeParse({ address: '  ' });

    expect(result.error?.issues[0]?.message).toBe('Wallet address is required (-a, --address)');
  });
});
