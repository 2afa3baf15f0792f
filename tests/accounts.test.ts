import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  chartFromMapping,
  createAccountClassifier,
  defaultAccountChart,
  loadAccountChart,
  parseAccountChart,
} from "../lib/accounts";
import { InvalidAccountChartError } from "../lib/errors";

test("default chart classifies the standard P&L accounts", () => {
  const classifier = createAccountClassifier(defaultAccountChart());

  assert.equal(classifier.codeWidth, 4);
  assert.equal(classifier.classify("4010"), "REVENUE");
  assert.equal(classifier.classify("5003"), "COGS");
  assert.equal(classifier.classify("6006"), "OPEX");
  assert.equal(classifier.classify("7001"), "OTHER");
  assert.equal(classifier.classify("9999"), null);
});

test("exact codes take precedence over ranges", () => {
  const classifier = createAccountClassifier(
    parseAccountChart({
      codeWidth: 4,
      accounts: [{ code: "6005", class: "OTHER" }],
      ranges: [
        { from: "6000", to: "6999", class: "opex" },
        { from: "4000", to: "4999", class: "Revenue" },
      ],
    })
  );

  assert.equal(classifier.classify("6001"), "OPEX");
  assert.equal(classifier.classify("6005"), "OTHER");
  assert.equal(classifier.classify("4500"), "REVENUE");
  assert.equal(classifier.classify("7000"), null);
});

test("chart codes are padded to the code width", () => {
  const classifier = createAccountClassifier(
    parseAccountChart({ codeWidth: 6, accounts: [{ code: "4001", class: "REVENUE" }], ranges: [{ from: "500", to: "599", class: "COGS" }] })
  );

  assert.equal(classifier.classify("004001"), "REVENUE");
  assert.equal(classifier.classify("000550"), "COGS");
  assert.equal(classifier.classify("005000"), null);
});

test("chartFromMapping accepts a flat code to class mapping", () => {
  const classifier = createAccountClassifier(chartFromMapping({ "4001": "Revenue", "5001": "COGS", "6001": "OPEX" }));

  assert.equal(classifier.classify("4001"), "REVENUE");
  assert.equal(classifier.classify("5001"), "COGS");
  assert.equal(classifier.classify("6001"), "OPEX");
});

test("parseAccountChart keeps only code, name and class per account", () => {
  const chart = parseAccountChart({
    accounts: [{ code: "5001", name: "COGS - Materials", class: "cogs", naturalSign: -1 }],
  });

  assert.deepEqual(chart.accounts, [{ code: "5001", name: "COGS - Materials", class: "COGS" }]);
});

test("parseAccountChart rejects invalid configuration", () => {
  assert.throws(
    () => parseAccountChart({ accounts: [{ code: "4001", class: "EQUITY" }] }),
    InvalidAccountChartError
  );
  assert.throws(
    () => parseAccountChart({ ranges: [{ from: "6999", to: "6000", class: "OPEX" }] }),
    (err: unknown) => err instanceof InvalidAccountChartError && err.issues.some((i) => i.includes("reversed"))
  );
  assert.throws(
    () =>
      parseAccountChart({
        accounts: [
          { code: "4001", class: "REVENUE" },
          { code: "4001", class: "COGS" },
        ],
      }),
    (err: unknown) => err instanceof InvalidAccountChartError && err.issues.some((i) => i.includes("listed twice"))
  );
  assert.throws(
    () => parseAccountChart({ codeWidth: 3, accounts: [{ code: "4001", class: "REVENUE" }] }),
    InvalidAccountChartError
  );
});

test("loadAccountChart returns the bundled chart without a path", async () => {
  const chart = await loadAccountChart();
  assert.equal(chart.accounts.length, 14);
  assert.deepEqual(
    chart.accounts.filter((a) => a.class === "REVENUE").map((a) => a.code),
    ["4001", "4002", "4010"]
  );
});

test("loadAccountChart reads a JSON chart file", async (t) => {
  const dir = await mkdtemp(join(tmpdir(), "kpi-chart-"));
  t.after(() => rm(dir, { recursive: true, force: true }));
  const path = join(dir, "chart.json");
  await writeFile(path, JSON.stringify({ codeWidth: 5, ranges: [{ from: "40000", to: "49999", class: "REVENUE" }] }));

  const chart = await loadAccountChart(path);
  assert.equal(chart.codeWidth, 5);
  assert.equal(createAccountClassifier(chart).classify("41000"), "REVENUE");

  await assert.rejects(loadAccountChart(join(dir, "missing.json")), InvalidAccountChartError);
});
