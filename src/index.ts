#!/usr/bin/env node
import fs from "fs";
import path from "path";
import { HELP, parseArgs } from "./cli";
import { createProgressReporter } from "./progress";
import { buildDurationReport, formatFailures, formatProcessingStart, formatStatistics } from "./report";
import { resolveRoot } from "./scan";
import { ParsedArgs } from "./types";

function printUsage(): void {
  console.error("Usage: audiotally [options] <directory>");
  console.error("Run audiotally --help for usage");
}

function readVersion(): string {
  const manifest: unknown = JSON.parse(
    fs.readFileSync(path.join(__dirname, "..", "package.json"), "utf8")
  );
  if (typeof manifest === "object" && manifest !== null && "version" in manifest) {
    return String(manifest.version);
  }
  return "unknown";
}

async function main(): Promise<void> {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(process.argv.slice(2));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error: ${message}`);
    printUsage();
    process.exitCode = 1;
    return;
  }

  if (parsed.help) {
    console.log(HELP);
    return;
  }

  if (parsed.version) {
    console.log(readVersion());
    return;
  }

  if (!parsed.directory) {
    console.error("Error: no directory specified");
    printUsage();
    process.exitCode = 1;
    return;
  }

  let rootDir: string;
  try {
    rootDir = await resolveRoot(parsed.directory);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(message);
    process.exitCode = 1;
    return;
  }

  console.log(`Scanning directory: ${rootDir}`);

  const progress = createProgressReporter(parsed.progress && process.stderr.isTTY === true);

  try {
    const report = await buildDurationReport(rootDir, {
      workerCount: parsed.workerCount,
      jobTimeoutMs: parsed.jobTimeoutMs,
      successCriterion: parsed.successCriterion,
      progress,
      onStart: (totalFiles, workerCount) => console.log(formatProcessingStart(totalFiles, workerCount))
    });

    console.log(`\n${formatStatistics(report.outcome.stats)}`);

    if (report.outcome.earlyStops > 0) {
      console.log(`MP3 files with undecodable trailing data: ${report.outcome.earlyStops}`);
    }

    if (parsed.showErrors && report.failures.length > 0) {
      console.log(`\nFailed files:\n${formatFailures(report.failures)}`);
    }
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(message);
    process.exitCode = 1;
  }
}

main().catch((err) => {
  console.error("Error:", err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
