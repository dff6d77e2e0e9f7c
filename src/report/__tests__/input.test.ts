import assert from "node:assert/strict";
import { test } from "node:test";
import { AggregateReportInvalidError } from "../../errors/report.errors.js";
import { parseAggregateReport } from "../input.js";

test("parses resources and normalizes severities", () => {
  const report = parseAggregateReport({
    schemaVersion: 2,
    clusterName: "test-cluster",
    vulnerabilities: [
      {
        namespace: "default",
        kind: "Deployment",
        name: "web",
        results: [
          {
            target: "nginx:1.25",
            class: "os-pkgs",
            type: "debian",
            vulnerabilities: [
              { vulnerabilityId: "CVE-2024-0001", pkgName: "openssl", severity: "HIGH", fixedVersion: "3.0.13" }
            ]
          }
        ]
      }
    ],
    misconfigurations: [
      {
        kind: "ClusterRole",
        name: "admin",
        error: "partial scan",
        results: [
          {
            target: "ClusterRole/admin",
            class: "config",
            type: "kubernetes",
            misconfSummary: { successes: 4, failures: 1 },
            misconfigurations: [{ id: "KSV050", severity: "bogus", status: "fail" }]
          }
        ]
      }
    ]
  });

  assert.equal(report.schemaVersion, 2);
  assert.equal(report.clusterName, "test-cluster");
  assert.deepStrictEqual(report.vulnerabilities[0]?.results[0]?.vulnerabilities, [
    { vulnerabilityId: "CVE-2024-0001", pkgName: "openssl", severity: "high", fixedVersion: "3.0.13" }
  ]);

  const role = report.misconfigurations[0];
  assert.equal(role?.namespace, "");
  assert.equal(role?.error, "partial scan");
  assert.deepStrictEqual(role?.results[0]?.misconfSummary, { successes: 4, failures: 1 });
  assert.deepStrictEqual(role?.results[0]?.misconfigurations, [{ id: "KSV050", severity: "unknown", status: "FAIL" }]);
});

test("missing sides default to empty lists", () => {
  assert.deepStrictEqual(parseAggregateReport({ clusterName: "empty" }), {
    schemaVersion: 0,
    clusterName: "empty",
    vulnerabilities: [],
    misconfigurations: []
  });
});

test("rejects unknown result classes", () => {
  assert.throws(
    () =>
      parseAggregateReport({
        misconfigurations: [{ kind: "Pod", name: "a", results: [{ target: "Pod/a", class: "bogus" }] }]
      }),
    AggregateReportInvalidError
  );
});

test("rejects resources without a kind", () => {
  assert.throws(
    () => parseAggregateReport({ vulnerabilities: [{ name: "a" }] }),
    /vulnerabilities\[0\]\.kind must be a non-empty string/
  );
});

test("rejects non-object input", () => {
  assert.throws(() => parseAggregateReport([]), AggregateReportInvalidError);
});
