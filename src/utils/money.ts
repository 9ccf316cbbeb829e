/**
 * Amounts are decimal numbers with two fraction digits
 */
export const roundMoney = (value: number): number => Math.round(value * 100) / 100;

export const addMoney = (a: number, b: number): number => roundMoney(a + b);

export const hasAtMostTwoDecimals = (value: number): boolean =>
  Math.abs(value * 100 - Math.round(value * 100)) < 1e-6;
