#!/usr/bin/env node
import path from "node:path";
import { Command, Option } from "commander";
import pc from "picocolors";
import { loadConfig, type ConfigInput } from "./config/loadConfig.js";
import { loadAggregateReport } from "./report/input.js";
import { renderReport } from "./report/formatters.js";
import { reportFailed } from "./report/resource.js";
import { loadComplianceSpecs } from "./compliance/loadSpec.js";
import { checkIdsByCategory } from "./compliance/scanners.js";
import { UnrecognizedCheckIdError } from "./errors/compliance.errors.js";
import { openCommandLogger, type Logger } from "./logging/logger.js";

const program = new Command();

function splitList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
}

function logCliError(logger: Logger, err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  logger.error(`Error: ${message}`);
}

program
  .name("fleetlens")
  .description("Consolidate and route Kubernetes scan findings into assessment reports")
  .version("0.1.0");

program
  .command("report <input>")
  .description("Render an aggregate scan report (JSON)")
  .option("-c, --config <path>", "Path to fleetlens.config.json")
  .addOption(new Option("-f, --format <format>", "Output format").choices(["table", "json"]))
  .addOption(new Option("--report <mode>", "Report mode").choices(["all", "summary"]))
  .option("--scanners <list>", "Comma-separated scanners (vuln,misconfig,secret,rbac)")
  .option("--components <list>", "Comma-separated components (workload,infra)")
  .option("-s, --severity <list>", "Comma-separated severities to include")
  .option("--exit-code <code>", "Exit code when the report has failing results", "0")
  .option("--debug", "Echo debug logging to the terminal")
  .action(async (
    input: string,
    options: {
      config?: string;
      format?: string;
      report?: string;
      scanners?: string;
      components?: string;
      severity?: string;
      exitCode: string;
      debug?: boolean;
    }
  ) => {
    const { logger, close } = await openCommandLogger({
      projectRoot: process.cwd(),
      command: "report",
      debug: Boolean(options.debug)
    });
    try {
      const overrides: ConfigInput = {
        scanners: splitList(options.scanners),
        components: splitList(options.components),
        severities: splitList(options.severity),
        report: options.report,
        format: options.format
      };
      const config = await loadConfig({ projectRoot: process.cwd(), configPath: options.config, overrides });
      logger.debug("Loaded configuration", { ...config });

      const report = await loadAggregateReport(path.resolve(process.cwd(), input));
      logger.info(
        `Loaded report for ${report.clusterName || "unnamed cluster"} ` +
          `(${report.vulnerabilities.length} vulnerability, ${report.misconfigurations.length} misconfiguration resources)`
      );

      const output = renderReport(report, {
        format: config.format,
        report: config.report,
        scanners: config.scanners,
        components: config.components,
        severities: config.severities,
        logger
      });
      console.log(output);

      const exitCode = Number.parseInt(options.exitCode, 10);
      if (Number.isFinite(exitCode) && exitCode !== 0 && reportFailed(report, config.severities)) {
        process.exitCode = exitCode;
      }
    } catch (err) {
      logCliError(logger, err);
      process.exitCode = 1;
    } finally {
      await close();
    }
  });

program
  .command("compliance <patterns...>")
  .description("Resolve which scanners each compliance spec needs")
  .option("--json", "Print JSON instead of text")
  .option("--debug", "Echo debug logging to the terminal")
  .action(async (patterns: string[], options: { json?: boolean; debug?: boolean }) => {
    const { logger, close } = await openCommandLogger({
      projectRoot: process.cwd(),
      command: "compliance",
      debug: Boolean(options.debug)
    });
    try {
      const specs = await loadComplianceSpecs(process.cwd(), patterns);
      if (specs.length === 0) {
        logger.warn(`No compliance specs matched ${patterns.join(", ")}.`);
        return;
      }

      const summaries: { path: string; id: string; checks: Record<string, string[]> }[] = [];
      for (const { path: specPath, spec } of specs) {
        try {
          const grouped = checkIdsByCategory(spec);
          summaries.push({ path: specPath, id: spec.id, checks: Object.fromEntries(grouped) });
        } catch (err) {
          if (!(err instanceof UnrecognizedCheckIdError)) throw err;
          logger.error(`${specPath}: ${err.message}`, { checkId: err.checkId, controlId: err.controlId });
          process.exitCode = 1;
        }
      }

      if (options.json) {
        console.log(JSON.stringify(summaries, null, 2));
        return;
      }
      for (const summary of summaries) {
        console.log(`${pc.bold(summary.id)} ${pc.dim(`(${summary.path})`)}`);
        for (const [scanner, ids] of Object.entries(summary.checks)) {
          console.log(`  ${pc.cyan(scanner)}: ${ids.join(", ")}`);
        }
      }
    } catch (err) {
      logCliError(logger, err);
      process.exitCode = 1;
    } finally {
      await close();
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(pc.red(`Error: ${message}`));
  process.exitCode = 1;
});
