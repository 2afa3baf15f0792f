import { Decimal } from "decimal.js";
import type { FactRow, IsoDate, MonthlyAggregate, Scenario } from "../lib/reporting/types";

export const fact = (monthEndDate: IsoDate, scenario: Scenario, accountCode: string, amount: string): FactRow => ({
  monthEndDate,
  scenario,
  accountCode,
  amount: new Decimal(amount),
});

export const aggregate = (
  monthEndDate: IsoDate,
  scenario: Scenario,
  revenue: string,
  cogs = "0",
  opex = "0"
): MonthlyAggregate => {
  const r = new Decimal(revenue);
  const c = new Decimal(cogs);
  const o = new Decimal(opex);
  return { monthEndDate, scenario, revenue: r, cogs: c, opex: o, ebitda: r.plus(c).plus(o) };
};

/** Decimal or null as a 2-dp string, for compact assertions */
export const money = (value: Decimal | null): string | null => (value === null ? null : value.toFixed(2));
