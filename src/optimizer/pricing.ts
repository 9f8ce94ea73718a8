import { HOURS_PER_MONTH } from "./classifier.js";

/** USD rates keyed by instance type / volume type, with a fallback. */
export type PriceTable = {
  readonly defaultRate: number;
  readonly rates: Readonly<Record<string, number>>;
};

export function lookupRate(table: PriceTable, key: string | undefined): number {
  if (key === undefined) return table.defaultRate;
  return Object.hasOwn(table.rates, key) ? table.rates[key] : table.defaultRate;
}

/** Convert a per-GB-month storage price into an hourly cost. */
export function storageHourlyCost(sizeGb: number, gbMonthRate: number): number {
  if (!Number.isFinite(sizeGb) || sizeGb <= 0) return 0;
  return (sizeGb * gbMonthRate) / HOURS_PER_MONTH;
}
