import assert from "node:assert/strict";
import { test } from "node:test";
import type { AggregateReport, Result, ScannedResource } from "../../types.js";
import { consolidateReport } from "../consolidate.js";
import { fullname, sortByFullname } from "../resource.js";

const misconfigResult = (target: string, ...ids: string[]): Result => ({
  target,
  class: "config",
  type: "kubernetes",
  misconfigurations: ids.map((id) => ({ id, severity: "medium" }))
});

const vulnResult = (target: string, ...ids: string[]): Result => ({
  target,
  class: "os-pkgs",
  type: "debian",
  vulnerabilities: ids.map((id) => ({ vulnerabilityId: id, pkgName: "openssl", severity: "high" }))
});

const makeResource = (namespace: string, kind: string, name: string, results: Result[]): ScannedResource => ({
  namespace,
  kind,
  name,
  results
});

const makeReport = (vulnerabilities: ScannedResource[], misconfigurations: ScannedResource[]): AggregateReport => ({
  schemaVersion: 2,
  clusterName: "test-cluster",
  vulnerabilities,
  misconfigurations
});

test("resources present on both sides merge into one entry", () => {
  const report = makeReport(
    [makeResource("kube-system", "Pod", "api-server", [vulnResult("k8s.gcr.io/kube-apiserver", "CVE-2024-0001")])],
    [
      makeResource("kube-system", "Pod", "api-server", [
        misconfigResult("Pod/api-server", "KCV0001", "KSV012")
      ])
    ]
  );

  const consolidated = consolidateReport(report);

  assert.equal(consolidated.clusterName, "test-cluster");
  assert.equal(consolidated.schemaVersion, 2);
  assert.equal(consolidated.findings.length, 1);
  const [merged] = consolidated.findings;
  assert.equal(merged?.results.length, 2);
  assert.deepStrictEqual(
    merged?.results.map((result) => result.target),
    ["Pod/api-server", "k8s.gcr.io/kube-apiserver"]
  );
});

test("misconfiguration results always come before vulnerability results", () => {
  const report = makeReport(
    [makeResource("default", "Deployment", "web", [vulnResult("nginx", "CVE-1"), vulnResult("sidecar", "CVE-2")])],
    [makeResource("default", "Deployment", "web", [misconfigResult("Deployment/web", "KSV001")])]
  );

  const [merged] = consolidateReport(report).findings;
  assert.deepStrictEqual(
    merged?.results.map((result) => result.target),
    ["Deployment/web", "nginx", "sidecar"]
  );
});

test("merge matching is case-insensitive and keeps the misconfiguration identity", () => {
  const misconfig: ScannedResource = {
    ...makeResource("Default", "Deployment", "Web", [misconfigResult("Deployment/Web", "KSV001")]),
    error: "partial scan"
  };
  const vuln: ScannedResource = {
    ...makeResource("default", "deployment", "web", [vulnResult("nginx", "CVE-1")]),
    error: "image pull failed"
  };

  const findings = consolidateReport(makeReport([vuln], [misconfig])).findings;

  assert.equal(findings.length, 1);
  assert.equal(findings[0]?.namespace, "Default");
  assert.equal(findings[0]?.kind, "Deployment");
  assert.equal(findings[0]?.name, "Web");
  assert.equal(findings[0]?.error, "partial scan");
});

test("unmatched resources from both sides are kept as they are", () => {
  const report = makeReport(
    [makeResource("default", "Deployment", "web", [vulnResult("nginx", "CVE-1")])],
    [makeResource("", "ClusterRole", "admin", [misconfigResult("ClusterRole/admin", "KSV050")])]
  );

  const findings = sortByFullname(consolidateReport(report).findings);
  assert.deepStrictEqual(findings.map(fullname), ["/clusterrole/admin", "default/deployment/web"]);
  assert.deepStrictEqual(findings[1], report.vulnerabilities[0]);
});

test("consolidation leaves its inputs untouched", () => {
  const misconfig = makeResource("default", "Pod", "a", [misconfigResult("Pod/a", "KSV001")]);
  const vuln = makeResource("default", "Pod", "a", [vulnResult("alpine", "CVE-1")]);

  const [merged] = consolidateReport(makeReport([vuln], [misconfig])).findings;

  assert.equal(misconfig.results.length, 1);
  assert.equal(vuln.results.length, 1);
  assert.notEqual(merged?.results, misconfig.results);
});

test("empty sides give an empty consolidated report", () => {
  assert.deepStrictEqual(consolidateReport(makeReport([], [])).findings, []);
});

test("consolidating an already consolidated report changes nothing", () => {
  const report = makeReport(
    [
      makeResource("default", "Pod", "a", [vulnResult("alpine", "CVE-1")]),
      makeResource("default", "Pod", "b", [vulnResult("busybox", "CVE-2")])
    ],
    [
      makeResource("default", "Pod", "a", [misconfigResult("Pod/a", "KSV001")]),
      makeResource("default", "Pod", "c", [misconfigResult("Pod/c", "KSV002")])
    ]
  );

  const once = consolidateReport(report);
  const twice = consolidateReport(makeReport(once.findings, []));

  assert.deepStrictEqual(sortByFullname(twice.findings), sortByFullname(once.findings));
});
