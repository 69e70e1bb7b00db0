import pc from "picocolors";
import type { OutputGrouping } from "../config/loadConfig.js";
import { repositoryKey } from "../github/repositoryRef.js";
import type { AuditErrorRecord, Finding, RunResult, Severity } from "../types.js";
import { groupByRepository, groupByRule } from "./grouping.js";

export type FormatOptions = {
  format: OutputGrouping;
  color?: boolean;
};

type Colors = ReturnType<typeof pc.createColors>;

function severityLabel(colors: Colors, severity: Severity): string {
  return severity === "error" ? colors.red("error") : colors.yellow("warning");
}

function formatErrorLine(colors: Colors, record: AuditErrorRecord): string {
  if (record.scope === "selection") {
    return `repository listing: ${colors.red("failed")} ${record.errorName}: ${record.message}`;
  }
  const repo = repositoryKey(record.repository);
  const scope = record.scope === "rule" ? ` [${record.ruleId}]` : "";
  return `${repo}: ${colors.red("failed")} ${record.errorName}: ${record.message}${scope}`;
}

/** Each finding on one line, ordered by the chosen grouping. */
export function formatFindingLines(result: Pick<RunResult, "findings">, options: FormatOptions): string[] {
  const colors = pc.createColors(options.color ?? pc.isColorSupported);
  const lines: string[] = [];
  if (options.format === "rule") {
    for (const [ruleId, entries] of groupByRule(result)) {
      for (const { repository, finding } of entries) {
        lines.push(
          `${ruleId}: ${severityLabel(colors, finding.severity)} ${finding.message} [${repositoryKey(repository)}]`
        );
      }
    }
    return lines;
  }
  for (const [key, group] of groupByRepository(result)) {
    for (const finding of group.findings) {
      lines.push(`${key}: ${severityLabel(colors, finding.severity)} ${finding.message} [${finding.ruleId}]`);
    }
  }
  return lines;
}

function countBySeverity(findings: readonly Finding[], severity: Severity): number {
  return findings.filter((finding) => finding.severity === severity).length;
}

function plural(count: number, noun: string, nounPlural = `${noun}s`): string {
  return `${count} ${count === 1 ? noun : nounPlural}`;
}

function repositories(count: number): string {
  return plural(count, "repository", "repositories");
}

/** Summary lines; a clean run and an incomplete one never read the same. */
export function formatSummary(result: RunResult): string[] {
  const lines: string[] = [];
  const repoFailures = new Set<string>();
  for (const record of result.errors) {
    if (record.scope === "repository") repoFailures.add(repositoryKey(record.repository));
  }
  const selectionFailed = result.errors.some((record) => record.scope === "selection");
  const ruleFailures = result.errors.filter((record) => record.scope === "rule").length;
  const checked = repositories(result.evaluated.length);

  if (result.findings.length === 0) {
    lines.push(`No violations found in ${checked}.`);
  } else {
    const errors = countBySeverity(result.findings, "error");
    const warnings = countBySeverity(result.findings, "warning");
    lines.push(
      `${plural(result.findings.length, "finding")} (${plural(errors, "error")}, ${plural(warnings, "warning")}) in ${checked}.`
    );
  }
  if (repoFailures.size > 0 || ruleFailures > 0) {
    lines.push(
      `Audit could not complete for ${repositories(repoFailures.size)} / ${plural(ruleFailures, "rule evaluation")}.`
    );
  }
  if (selectionFailed) {
    lines.push("Repository listing failed; repositories after that point were not audited.");
  }
  if (result.cancelled) {
    lines.push(
      `Run cancelled; ${repositories(result.notStarted.length)} not started.`
    );
  }
  return lines;
}

export function formatRunResultText(result: RunResult, options: FormatOptions): string {
  const colors = pc.createColors(options.color ?? pc.isColorSupported);
  const lines = formatFindingLines(result, options);
  if (result.errors.length > 0) {
    if (lines.length) lines.push("");
    lines.push(...result.errors.map((record) => formatErrorLine(colors, record)));
  }
  if (lines.length) lines.push("");
  lines.push(...formatSummary(result).map((line) => colors.dim(line)));
  return lines.join("\n");
}

function findingJson(finding: Finding) {
  return {
    ruleId: finding.ruleId,
    repository: repositoryKey(finding.repository),
    severity: finding.severity,
    message: finding.message,
    fixable: finding.fixable
  };
}

function errorJson(record: AuditErrorRecord) {
  return {
    scope: record.scope,
    ...(record.scope === "selection" ? {} : { repository: repositoryKey(record.repository) }),
    ...(record.scope === "rule" ? { ruleId: record.ruleId } : {}),
    errorName: record.errorName,
    message: record.message
  };
}

export function formatRunResultJson(result: RunResult, options: Pick<FormatOptions, "format">): string {
  const groups =
    options.format === "rule"
      ? [...groupByRule(result)].map(([ruleId, entries]) => ({
          ruleId,
          findings: entries.map((entry) => findingJson(entry.finding))
        }))
      : [...groupByRepository(result)].map(([repository, group]) => ({
          repository,
          findings: group.findings.map(findingJson)
        }));
  return JSON.stringify(
    {
      format: options.format,
      groups,
      errors: result.errors.map(errorJson),
      evaluated: result.evaluated.map(repositoryKey),
      notStarted: result.notStarted.map(repositoryKey),
      cancelled: result.cancelled,
      selectedRules: result.selectedRules,
      durationMs: result.durationMs
    },
    null,
    2
  );
}
