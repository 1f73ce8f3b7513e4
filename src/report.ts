import type { Finding } from "./lint/model";

const RED = "\x1b[31m";
const YELLOW = "\x1b[33m";
const DIM = "\x1b[2m";
const BOLD = "\x1b[1m";
const RESET = "\x1b[0m";

export interface FormatOptions {
  color?: boolean;
}

function paint(text: string, codes: string, color: boolean): string {
  return color && codes ? `${codes}${text}${RESET}` : text;
}

/** One block per file, findings listed under it as `line  severity  message  rule` */
export function formatFindings(findings: Finding[], options: FormatOptions = {}): string {
  const color = options.color ?? false;
  const byFile = new Map<string, Finding[]>();
  for (const finding of findings) {
    const group = byFile.get(finding.file) ?? [];
    group.push(finding);
    byFile.set(finding.file, group);
  }

  const blocks: string[] = [];
  for (const [file, group] of byFile) {
    const lines = group.map((finding) => {
      const location = finding.line !== undefined ? `${finding.line}`.padStart(4) : "    ";
      const severity =
        finding.severity === "error"
          ? paint("error  ", RED, color)
          : paint("warning", YELLOW, color);
      return `  ${location}  ${severity}  ${finding.message}  ${paint(finding.rule, DIM, color)}`;
    });
    blocks.push(`${paint(file || "(site)", BOLD, color)}\n${lines.join("\n")}`);
  }
  return blocks.join("\n\n");
}

export function formatSummary(
  counts: { error: number; warning: number },
  documentCount: number,
  options: FormatOptions = {}
): string {
  const color = options.color ?? false;
  const checked = `Checked ${documentCount} document${documentCount === 1 ? "" : "s"}`;
  if (counts.error === 0 && counts.warning === 0) {
    return `${checked}: no problems found`;
  }
  const errors = `${counts.error} error${counts.error === 1 ? "" : "s"}`;
  const warnings = `${counts.warning} warning${counts.warning === 1 ? "" : "s"}`;
  return `${checked}: ${paint(errors, counts.error > 0 ? RED : "", color)}, ${paint(
    warnings,
    counts.warning > 0 ? YELLOW : "",
    color
  )}`;
}

export function formatFindingsJson(findings: Finding[], documentCount: number): string {
  return JSON.stringify({ documentCount, findings }, null, 2);
}

export function formatMissingVariableWarning(context: string, missing: string[]): string {
  const icon = "⚠️";
  const header = `${YELLOW}${BOLD}${icon} [contentkit] Missing template variables in ${context} (${missing.length})${RESET}`;
  const lines = missing.map((item) => `${YELLOW}  - ${item}${RESET}`).join("\n");
  return `${header}\n${lines}`;
}
