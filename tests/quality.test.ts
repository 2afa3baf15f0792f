import test from "node:test";
import assert from "node:assert/strict";
import { findCoverageGaps, findDuplicateKeys, runQualityChecks } from "../lib/quality";
import { fact } from "./helpers";

const quarter = ["2024-01-31", "2024-02-29", "2024-03-31"];

const clean = [
  fact("2024-01-31", "ACTUAL", "4001", "10.00"),
  fact("2024-01-31", "BUDGET", "4001", "10.00"),
  fact("2024-02-29", "ACTUAL", "4001", "10.00"),
  fact("2024-02-29", "BUDGET", "4001", "10.00"),
  fact("2024-03-31", "ACTUAL", "4001", "10.00"),
  fact("2024-03-31", "BUDGET", "4001", "10.00"),
];

test("findDuplicateKeys is empty when every key is unique", () => {
  assert.deepEqual(findDuplicateKeys(clean), []);
});

test("one repeated key yields exactly one group with count 2", () => {
  const duplicates = findDuplicateKeys([...clean, fact("2024-02-29", "ACTUAL", "4001", "99.00")]);

  assert.deepEqual(duplicates, [{ monthEndDate: "2024-02-29", scenario: "ACTUAL", accountCode: "4001", rowCount: 2 }]);
});

test("duplicates are ordered by count, then month, scenario and account", () => {
  const rows = [
    fact("2024-03-31", "ACTUAL", "6001", "1.00"),
    fact("2024-03-31", "ACTUAL", "6001", "1.00"),
    fact("2024-01-31", "BUDGET", "5001", "1.00"),
    fact("2024-01-31", "BUDGET", "5001", "1.00"),
    fact("2024-01-31", "ACTUAL", "5002", "1.00"),
    fact("2024-01-31", "ACTUAL", "5002", "1.00"),
    fact("2024-02-29", "ACTUAL", "4001", "1.00"),
    fact("2024-02-29", "ACTUAL", "4001", "1.00"),
    fact("2024-02-29", "ACTUAL", "4001", "1.00"),
  ];

  assert.deepEqual(
    findDuplicateKeys(rows).map((d) => `${d.monthEndDate} ${d.scenario} ${d.accountCode} x${d.rowCount}`),
    [
      "2024-02-29 ACTUAL 4001 x3",
      "2024-01-31 ACTUAL 5002 x2",
      "2024-01-31 BUDGET 5001 x2",
      "2024-03-31 ACTUAL 6001 x2",
    ]
  );
});

test("coverage reports the single missing month/scenario pair", () => {
  const rows = clean.filter((r) => !(r.monthEndDate === "2024-02-29" && r.scenario === "ACTUAL"));

  assert.deepEqual(findCoverageGaps(rows, quarter), [{ monthEndDate: "2024-02-29", scenario: "ACTUAL" }]);
});

test("any account counts as coverage", () => {
  const rows = [fact("2024-01-31", "ACTUAL", "7001", "0.00"), fact("2024-01-31", "BUDGET", "9999", "1.00")];

  assert.deepEqual(findCoverageGaps(rows, ["2024-01-31"]), []);
});

test("coverage gaps are sorted by month then scenario and the calendar is de-duplicated", () => {
  const calendar = ["2024-03-31", new Date(Date.UTC(2024, 0, 31)), "2024-01-31"];

  assert.deepEqual(findCoverageGaps([fact("2024-03-31", "BUDGET", "4001", "1.00")], calendar), [
    { monthEndDate: "2024-01-31", scenario: "ACTUAL" },
    { monthEndDate: "2024-01-31", scenario: "BUDGET" },
    { monthEndDate: "2024-03-31", scenario: "ACTUAL" },
  ]);
});

test("facts outside the calendar are not gaps and an empty calendar has none", () => {
  assert.deepEqual(findCoverageGaps(clean, []), []);
  assert.deepEqual(findCoverageGaps([], []), []);
});

test("runQualityChecks combines both checks", () => {
  const ok = runQualityChecks(clean, quarter);
  assert.equal(ok.passed, true);
  assert.deepEqual(ok.duplicates, []);
  assert.deepEqual(ok.coverageGaps, []);

  const failing = runQualityChecks([...clean, clean[0]], [...quarter, "2024-04-30"]);
  assert.equal(failing.passed, false);
  assert.equal(failing.duplicates.length, 1);
  assert.deepEqual(failing.coverageGaps, [
    { monthEndDate: "2024-04-30", scenario: "ACTUAL" },
    { monthEndDate: "2024-04-30", scenario: "BUDGET" },
  ]);
});

test("runQualityChecks skips coverage without a calendar", () => {
  const report = runQualityChecks(clean);
  assert.equal(report.coverageGaps, null);
  assert.equal(report.passed, true);
});
