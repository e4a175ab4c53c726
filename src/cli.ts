import { isSuccessCriterion, SUCCESS_CRITERIA } from "./config";
import { ParsedArgs } from "./types";

export const HELP = `
audiotally - Sum the playback duration of every audio file in a directory

Usage:
  audiotally [options] <directory>

Options:
  -w, --workers <n>     Number of concurrent workers (default: CPU core count)
  -t, --timeout <ms>    Fail a file whose parse takes longer than this (default: 0, no limit)
  --success <mode>      How successes are counted: ${SUCCESS_CRITERIA.join(" | ")} (default: no-error)
  --no-progress         Do not draw the progress bar
  --show-errors         List every file that could not be measured
  -h, --help            Show this help message
  -v, --version         Show version number

Supported formats: mp3, wav, m4a (ogg and flac are found but reported as not implemented)
`.trim();

function parseInteger(flag: string, value: string | undefined, min: number): number {
  if (value === undefined) {
    throw new Error(`${flag} requires a numeric argument`);
  }
  if (!/^\d+$/.test(value)) {
    throw new Error(`invalid value for ${flag}: ${value}`);
  }
  const parsed = parseInt(value, 10);
  if (parsed < min) {
    throw new Error(`${flag} must be at least ${min}, got ${parsed}`);
  }
  return parsed;
}

/**
 * Parses command-line arguments (without the node and script entries).
 * Options may be given as `--flag value` or `--flag=value`.
 *
 * @throws Error on unknown options, missing or invalid option values, or
 *   more than one directory
 */
export function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = {
    progress: true,
    showErrors: false,
    help: false,
    version: false
  };

  for (let i = 0; i < args.length; i++) {
    let arg = args[i];
    let inline: string | undefined;

    const eq = arg.indexOf("=");
    if (arg.startsWith("--") && eq > 0) {
      inline = arg.slice(eq + 1);
      arg = arg.slice(0, eq);
    }
    const takeValue = (): string | undefined => inline ?? args[++i];

    if (arg === "-h" || arg === "--help") {
      result.help = true;
      return result;
    }

    if (arg === "-v" || arg === "--version") {
      result.version = true;
      return result;
    }

    if (arg === "-w" || arg === "--workers") {
      result.workerCount = parseInteger("--workers", takeValue(), 1);
      continue;
    }

    if (arg === "-t" || arg === "--timeout") {
      result.jobTimeoutMs = parseInteger("--timeout", takeValue(), 0);
      continue;
    }

    if (arg === "--success") {
      const value = takeValue();
      if (value === undefined || !isSuccessCriterion(value)) {
        throw new Error(`--success must be one of: ${SUCCESS_CRITERIA.join(", ")}`);
      }
      result.successCriterion = value;
      continue;
    }

    if (arg === "--no-progress") {
      result.progress = false;
      continue;
    }

    if (arg === "--show-errors") {
      result.showErrors = true;
      continue;
    }

    if (arg.startsWith("-")) {
      throw new Error(`unknown option: ${arg}`);
    }

    if (result.directory !== undefined) {
      throw new Error(`unexpected argument: ${arg}`);
    }
    result.directory = arg;
  }

  return result;
}
