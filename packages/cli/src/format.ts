import type { Finding, ModelReport } from "@pnml-check/core";

const useColor =
  !process.env.NO_COLOR && process.stdout.isTTY;

const BOLD = useColor ? "\x1b[1m" : "";
const GREEN = useColor ? "\x1b[32m" : "";
const RED = useColor ? "\x1b[31m" : "";
const YELLOW = useColor ? "\x1b[33m" : "";
const CYAN = useColor ? "\x1b[36m" : "";
const RESET = useColor ? "\x1b[0m" : "";

function findingBlock(title: string, color: string, findings: Finding[]): string[] {
  return ["", `${BOLD}${color}${title}:${RESET}`, ...findings.map((f) => `  ${f.message}`)];
}

export function formatReport(report: ModelReport): string {
  const lines: string[] = [];

  lines.push(`${BOLD}${CYAN}=== Petri Net Summary ===${RESET}`);
  lines.push(`Places: ${report.counts.places}`);
  lines.push(`Transitions: ${report.counts.transitions}`);
  lines.push(`Arcs: ${report.counts.arcs}`);

  lines.push("");
  lines.push("Places with initial marking = 1:");
  for (const place of report.markedPlaces) {
    lines.push(place.name === undefined ? ` - ${place.id}` : ` - ${place.id} (${place.name})`);
  }

  if (report.errors.length > 0) {
    lines.push(...findingBlock("Errors", RED, report.errors));
  }
  if (report.warnings.length > 0) {
    lines.push(...findingBlock("Warnings", YELLOW, report.warnings));
  }
  if (report.errors.length === 0 && report.warnings.length === 0) {
    lines.push("");
    lines.push(`${GREEN}No errors or warnings detected.${RESET}`);
  }

  return lines.join("\n");
}

export function formatJson(report: ModelReport): string {
  return JSON.stringify(report, null, 2);
}

export function formatStrictFailure(errorCount: number): string {
  return `${RED}STRICT: ${errorCount} structural error(s)${RESET}`;
}
