import assert from "node:assert/strict";
import { test } from "node:test";
import type { AggregateReport, Result, ScannedResource } from "../../types.js";
import {
  cloneResource,
  countFindings,
  createResource,
  filterBySeverity,
  fullname,
  reportFailed,
  sortByFullname
} from "../resource.js";

const makeResource = (namespace: string, kind: string, name: string, results: Result[] = []): ScannedResource => ({
  namespace,
  kind,
  name,
  results
});

test("fullname lowercases namespace, kind and name", () => {
  assert.equal(fullname(makeResource("Kube-System", "Pod", "API-Server")), "kube-system/pod/api-server");
});

test("fullname keeps an empty segment for cluster-scoped resources", () => {
  assert.equal(fullname(makeResource("", "ClusterRole", "admin")), "/clusterrole/admin");
});

test("createResource points kubernetes targets at the resource", () => {
  const resource = createResource(
    { namespace: "default", kind: "Deployment", name: "web" },
    [
      { target: "/tmp/manifest-123.yaml", class: "config", type: "kubernetes", misconfigurations: [] },
      { target: "nginx:1.25 (debian 12)", class: "os-pkgs", type: "debian", vulnerabilities: [] }
    ]
  );

  assert.deepStrictEqual(
    resource.results.map((result) => result.target),
    ["Deployment/web", "nginx:1.25 (debian 12)"]
  );
  assert.equal(resource.error, undefined);
  assert.equal("report" in resource, false);
});

test("createResource records the scan error message", () => {
  const resource = createResource({ kind: "ClusterRole", name: "view" }, [], new Error("scan timed out"));

  assert.equal(resource.namespace, "");
  assert.equal(resource.error, "scan timed out");
});

test("createResource does not touch the input results", () => {
  const results: Result[] = [{ target: "/tmp/a.yaml", class: "config", type: "kubernetes" }];
  createResource({ namespace: "default", kind: "Pod", name: "a" }, results);
  assert.equal(results[0]?.target, "/tmp/a.yaml");
});

test("countFindings sums every finding kind", () => {
  const resource = makeResource("default", "Pod", "a", [
    {
      target: "Pod/a",
      class: "config",
      type: "kubernetes",
      misconfigurations: [{ id: "KSV001", severity: "low" }]
    },
    {
      target: "alpine:3.19",
      class: "os-pkgs",
      type: "alpine",
      vulnerabilities: [{ vulnerabilityId: "CVE-2024-0001", pkgName: "musl", severity: "high" }],
      secrets: [{ ruleId: "aws-access-key-id", severity: "critical" }]
    }
  ]);
  assert.equal(countFindings(resource), 3);
});

test("reportFailed ignores passing misconfigurations", () => {
  const passing: AggregateReport = {
    schemaVersion: 0,
    clusterName: "test",
    vulnerabilities: [],
    misconfigurations: [
      makeResource("default", "Pod", "a", [
        {
          target: "Pod/a",
          class: "config",
          type: "kubernetes",
          misconfigurations: [{ id: "KSV001", severity: "low", status: "PASS" }]
        }
      ])
    ]
  };
  assert.equal(reportFailed(passing), false);

  const failing: AggregateReport = {
    ...passing,
    vulnerabilities: [
      makeResource("default", "Pod", "a", [
        {
          target: "alpine:3.19",
          class: "os-pkgs",
          type: "alpine",
          vulnerabilities: [{ vulnerabilityId: "CVE-2024-0001", pkgName: "musl", severity: "high" }]
        }
      ])
    ]
  };
  assert.equal(reportFailed(failing), true);
});

test("reportFailed only counts findings at the selected severities", () => {
  const lowOnly: AggregateReport = {
    schemaVersion: 0,
    clusterName: "test",
    vulnerabilities: [
      makeResource("default", "Pod", "a", [
        {
          target: "alpine:3.19",
          class: "os-pkgs",
          type: "alpine",
          vulnerabilities: [{ vulnerabilityId: "CVE-2024-0002", pkgName: "busybox", severity: "low" }]
        }
      ])
    ],
    misconfigurations: [
      makeResource("default", "Pod", "a", [
        {
          target: "Pod/a",
          class: "config",
          type: "kubernetes",
          misconfigurations: [{ id: "KSV001", severity: "low", status: "FAIL" }]
        }
      ])
    ]
  };

  assert.equal(reportFailed(lowOnly), true);
  assert.equal(reportFailed(lowOnly, ["critical"]), false);
  assert.equal(reportFailed(lowOnly, ["critical", "low"]), true);
});

test("filterBySeverity keeps matching findings and leaves the input alone", () => {
  const resource = makeResource("default", "Pod", "a", [
    {
      target: "alpine:3.19",
      class: "os-pkgs",
      type: "alpine",
      vulnerabilities: [
        { vulnerabilityId: "CVE-2024-0001", pkgName: "musl", severity: "high" },
        { vulnerabilityId: "CVE-2024-0002", pkgName: "busybox", severity: "low" }
      ]
    }
  ]);

  const filtered = filterBySeverity(resource, ["high"]);
  assert.deepStrictEqual(
    filtered.results[0]?.vulnerabilities?.map((v) => v.vulnerabilityId),
    ["CVE-2024-0001"]
  );
  assert.equal(resource.results[0]?.vulnerabilities?.length, 2);
});

test("cloneResource copies every nested finding list", () => {
  const resource = makeResource("default", "Pod", "a", [
    {
      target: "Pod/a",
      class: "config",
      type: "kubernetes",
      misconfSummary: { successes: 2, failures: 1 },
      misconfigurations: [{ id: "KSV001", severity: "low" }]
    }
  ]);

  const copy = cloneResource(resource);
  assert.deepStrictEqual(copy, resource);
  assert.notEqual(copy.results, resource.results);
  assert.notEqual(copy.results[0], resource.results[0]);
  assert.notEqual(copy.results[0]?.misconfigurations, resource.results[0]?.misconfigurations);
  assert.notEqual(copy.results[0]?.misconfSummary, resource.results[0]?.misconfSummary);
});

test("sortByFullname orders resources by their lowercase key", () => {
  const sorted = sortByFullname([
    makeResource("default", "Pod", "b"),
    makeResource("", "ClusterRole", "admin"),
    makeResource("default", "Deployment", "a")
  ]);
  assert.deepStrictEqual(sorted.map(fullname), ["/clusterrole/admin", "default/deployment/a", "default/pod/b"]);
});
