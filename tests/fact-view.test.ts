import test from "node:test";
import assert from "node:assert/strict";
import { buildFactView, quarterOf } from "../lib/reporting/fact-view";
import { buildMonthEndCalendar, daysInMonth, monthEndDate } from "../lib/reporting/calendar";
import { fact } from "./helpers";

test("buildFactView adds year, month and quarter", () => {
  const view = buildFactView([fact("2024-02-29", "ACTUAL", "4001", "1.00"), fact("2023-11-30", "BUDGET", "6001", "-2.00")]);

  assert.deepEqual(
    view.map((r) => [r.monthEndDate, r.year, r.monthNumber, r.quarter, r.accountCode]),
    [
      ["2024-02-29", 2024, 2, "Q1", "4001"],
      ["2023-11-30", 2023, 11, "Q4", "6001"],
    ]
  );
  assert.equal(view[1].amount.toFixed(2), "-2.00");
});

test("quarterOf maps months to calendar quarters", () => {
  assert.deepEqual(
    [1, 3, 4, 6, 7, 9, 10, 12].map(quarterOf),
    ["Q1", "Q1", "Q2", "Q2", "Q3", "Q3", "Q4", "Q4"]
  );
});

test("buildMonthEndCalendar lists month ends inclusively across years", () => {
  assert.deepEqual(buildMonthEndCalendar("2023-11", "2024-02"), ["2023-11-30", "2023-12-31", "2024-01-31", "2024-02-29"]);
  assert.deepEqual(buildMonthEndCalendar("2023-02", "2023-02"), ["2023-02-28"]);
  assert.equal(monthEndDate(2024, 4), "2024-04-30");
});

test("buildMonthEndCalendar keeps four-digit years below 100", () => {
  assert.deepEqual(buildMonthEndCalendar("0050-01", "0050-02"), ["0050-01-31", "0050-02-28"]);
  assert.equal(monthEndDate(2000, 2), "2000-02-29");
  assert.equal(monthEndDate(1900, 2), "1900-02-28");
  assert.deepEqual([1, 4, 9, 12].map((m) => daysInMonth(2023, m)), [31, 30, 30, 31]);
});

test("buildMonthEndCalendar rejects bad bounds", () => {
  assert.throws(() => buildMonthEndCalendar("2024-13", "2024-12"), RangeError);
  assert.throws(() => buildMonthEndCalendar("2024-05", "2024-01"), RangeError);
  assert.throws(() => buildMonthEndCalendar("2024/01", "2024-02"), RangeError);
});
