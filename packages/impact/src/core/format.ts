/**
 * Markdown renderers for reports, suitable for review comments.
 */

import type { BreakingChange, BreakingChangeReport, BreakingSeverity, FileImpact } from "./model.js";

const SECTIONS: Array<[BreakingSeverity, string]> = [
  ["critical", "### 🔴 Critical Breaking Changes"],
  ["error", "### 🟠 Error-Level Breaking Changes"],
  ["warning", "### 🟡 Warnings"],
];

/** References are listed individually up to this many. */
const MAX_LISTED_REFERENCES = 10;

export function isBreaking(report: BreakingChangeReport): boolean {
  return report.hasBreaking;
}

/**
 * Critical and error changes, in report order.
 */
export function getBreakingChanges(report: BreakingChangeReport): BreakingChange[] {
  return report.changes.filter((c) => c.severity === "critical" || c.severity === "error");
}

function formatChange(change: BreakingChange): string {
  const lines = [`**${change.type}** \`${change.symbol.name}\` (line ${change.line})`, `- ${change.description}`];
  if (change.oldValue && change.newValue) {
    lines.push(`- Changed: \`${change.oldValue}\` → \`${change.newValue}\``);
  }
  if (change.suggestion) {
    lines.push(`- 💡 ${change.suggestion}`);
  }
  return lines.join("\n") + "\n\n";
}

/**
 * Render a report grouped by severity. Empty when there is nothing to flag.
 */
export function formatBreakingChangeReport(report: BreakingChangeReport): string {
  if (!report.hasBreaking && report.warningCount === 0) {
    return "";
  }

  let out = "## ⚠️ Breaking Change Analysis\n\n";
  out += `**File:** \`${report.filePath}\`\n`;
  out += `**Summary:** ${report.summary}\n\n`;

  for (const [severity, heading] of SECTIONS) {
    const changes = report.changes.filter((c) => c.severity === severity);
    if (changes.length === 0) continue;

    out += `${heading}\n\n`;
    for (const change of changes) {
      out += formatChange(change);
    }
  }

  return out;
}

export function formatImpactReport(impact: FileImpact): string {
  let out = `## Impact Analysis for ${impact.filePath}\n\n`;
  out += `**Overall Severity:** ${impact.overallSeverity.toUpperCase()}\n`;
  out += `**Changed Symbols:** ${impact.changedSymbols.length}\n`;
  out += `**Total References:** ${impact.totalReferences}\n`;
  out += `**Affected Files:** ${impact.affectedFiles.length}\n\n`;

  if (impact.affectedFiles.length > 0) {
    out += "### Affected Files\n";
    for (const file of impact.affectedFiles) {
      out += `- ${file}\n`;
    }
    out += "\n";
  }

  if (impact.impacts.length > 0) {
    out += "### Symbol Changes\n";
    for (const item of impact.impacts) {
      out += `\n#### ${item.changedSymbol.kind} \`${item.changedSymbol.name}\`\n`;
      out += `- **Severity:** ${item.severity}\n`;
      out += `- **Description:** ${item.description}\n`;
      out += `- **References:** ${item.references.length}\n`;

      if (item.references.length > 0 && item.references.length <= MAX_LISTED_REFERENCES) {
        out += "- **Used in:**\n";
        for (const ref of item.references) {
          out += `  - ${ref.filePath}:${ref.line}\n`;
        }
      }
    }
  }

  return out;
}
