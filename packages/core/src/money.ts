// Copyright (c) 2026 Ahmad Faruk (Signal18 ID). All rights reserved.
// Ownership: Ahmad Faruk (Signal18 ID)

const MONEY_SCALE = 100;

export function normalizeMoney(value: number): number {
  return Math.round((value + Number.EPSILON) * MONEY_SCALE) / MONEY_SCALE;
}

export function sumMoney(values: readonly number[]): number {
  let totalMinor = 0;
  for (const value of values) {
    totalMinor += Math.round(value * MONEY_SCALE);
  }
  return totalMinor / MONEY_SCALE;
}
