import { PnmlError, loadPnmlFile, summarize } from "@pnml-check/core";
import type { ModelReport } from "@pnml-check/core";
import { formatJson, formatReport, formatStrictFailure } from "./format.js";

export const USAGE = `Usage: pnml-check <model.pnml> [options]

Options:
  --json     Output JSON
  --strict   Exit 1 if structural errors are found
  --help     Show this help`;

const FLAGS = new Set(["--json", "--strict", "--help"]);

function isFsError(err: unknown): err is Error & { code: string } {
  return err instanceof Error && "code" in err && typeof err.code === "string";
}

/** Runs the command line and resolves to the process exit code. */
export async function run(args: string[]): Promise<number> {
  if (args.includes("--help")) {
    console.log(USAGE);
    return 0;
  }

  const unknown = args.find((a) => a.startsWith("--") && !FLAGS.has(a));
  if (unknown) {
    console.error(`Unknown option: ${unknown}`);
    console.error(USAGE);
    return 1;
  }

  const files = args.filter((a) => !FLAGS.has(a));
  const file = files[0];
  if (!file || files.length > 1) {
    console.error(USAGE);
    return 1;
  }

  let report: ModelReport;
  try {
    report = summarize(await loadPnmlFile(file));
  } catch (err) {
    // Nothing is printed on stdout when the document cannot be read
    if (err instanceof PnmlError) {
      console.error(`Error: ${err.message}`);
      return 1;
    }
    if (isFsError(err)) {
      console.error(`Error reading ${file}: ${err.message}`);
      return 1;
    }
    throw err;
  }

  console.log(args.includes("--json") ? formatJson(report) : formatReport(report));

  if (args.includes("--strict") && report.errors.length > 0) {
    console.error(`\n${formatStrictFailure(report.errors.length)}`);
    return 1;
  }
  return 0;
}
