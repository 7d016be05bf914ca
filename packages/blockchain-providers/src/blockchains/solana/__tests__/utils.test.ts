import { describe, expect, it } from 'vitest';

import { isValidSolanaAddress, lamportsToSol, SOL_DECIMALS, SOL_NATIVE_MINT, tokenAmountToDecimal } from '../utils.js';

describe('isValidSolanaAddress', () => {
  it('accepts base58 strings of 32 to 44 characters', () => {
    expect(isValidSolanaAddress(SOL_NATIVE_MINT)).toBe(true);
    expect(isValidSolanaAddress('1'.repeat(32))).toBe(true);
    expect(isValidSolanaAddress('1'.repeat(44))).toBe(true);
  });

  it('rejects strings of the wrong length', () => {
    expect(isValidSolanaAddress('')).toBe(false);
    expect(isValidSolanaAddress('1'.repeat(31))).toBe(false);
    expect(isValidSolanaAddress('1'.repeat(45))).toBe(false);
  });

  it('rejects characters outside the base58 alphabet', () => {
    expect(isValidSolanaAddress(`0${'1'.repeat(40)}`)).toBe(false);
    expect(isValidSolanaAddress(`O${'1'.repeat(40)}`)).toBe(false);
    expect(isValidSolanaAddress(`I${'1'.repeat(40)}`)).toBe(false);
    expect(isValidSolanaAddress(`l${'1'.repeat(40)}`)).toBe(false);
    expect(isValidSolanaAddress(`0x${'a'.repeat(40)}`)).toBe(false);
  });
});

describe('lamportsToSol', () => {
  it('scales lamports by nine decimals', () => {
    expect(SOL_DECIMALS).toBe(9);
    expect(lamportsToSol(1_500_000_000).toFixed()).toBe('1.5');
    expect(lamportsToSol(5000).toFixed()).toBe('0.000005');
    expect(lamportsToSol('1').toFixed()).toBe('0.000000001');
  });
});

describe('tokenAmountToDecimal', () => {
  it('scales raw amounts by their decimals', () => {
    expect(tokenAmountToDecimal({ decimals: 6, kind: 'raw', rawAmount: '2500000' }).toFixed()).toBe('2.5');
    expect(tokenAmountToDecimal({ decimals: 0, kind: 'raw', rawAmount: '42' }).toFixed()).toBe('42');
  });

  it('reads scaled amounts as they are', () => {
    expect(tokenAmountToDecimal({ amount: '0.25', kind: 'scaled' }).toFixed()).toBe('0.25');
  });
});
