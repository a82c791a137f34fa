/**
 * Markdown report of a batch, grouped by primary category.
 */
import * as fs from 'fs';
import * as path from 'path';
import { REPORT_KEYWORD_COUNT } from '../constants';
import { PipelineError, errorMessage } from '../errors';
import { type StructuredField, keyFindings, summaryField, summaryText } from '../summary';
import type { ProcessedDocument } from './types';

const REPORT_FIELDS: ReadonlyArray<[StructuredField, string]> = [
  ['Title', 'Title'],
  ['Author(s)', 'Author(s)'],
  ['Year Published', 'Year'],
  ['Journal', 'Journal'],
];

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as "YYYY-MM-DD HH:MM:SS" */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/** "summary_report_YYYYMMDD_HHMMSS.md" in local time */
export function reportFileName(date: Date): string {
  const stamp =
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `summary_report_${stamp}.md`;
}

/** "self_help" → "Self_Help" */
export function titleCase(value: string): string {
  return value.replace(/[A-Za-z]+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

function documentSection(doc: ProcessedDocument): string {
  let section = `### ${doc.metadata.title || doc.metadata.filename}\n\n`;
  section += `**Keywords:** ${doc.keywords.slice(0, REPORT_KEYWORD_COUNT).join(', ')}\n\n`;

  const summary = doc.summary;
  if (summary.kind !== 'structured') {
    return `${section}${summaryText(summary)}\n\n---\n\n`;
  }

  for (const [field, label] of REPORT_FIELDS) {
    const value = summaryField(summary, field);
    if (value !== undefined) section += `**${label}:** ${value}\n\n`;
  }
  const bibtex = summaryField(summary, 'BibTeX Citation');
  if (bibtex !== undefined) section += `**BibTeX Citation:**\n\`\`\`\n${bibtex}\n\`\`\`\n\n`;
  const type = summaryField(summary, 'Type');
  if (type !== undefined) section += `**Type:** ${type}\n\n`;
  const method = summaryField(summary, 'Method');
  if (method !== undefined) section += `**Method:** ${method}\n\n`;

  const findings = keyFindings(summary);
  if (findings.length > 0) {
    section += '**Key Findings:**\n';
    for (const [name, description] of findings) {
      section += `- ${name}: ${description}\n`;
    }
    section += '\n';
  }

  const takeaways = summaryField(summary, 'Key Takeaways');
  if (takeaways !== undefined) section += `**Key Takeaways:** ${takeaways}\n\n`;

  return `${section}---\n\n`;
}

export function buildCategoryReport(docs: readonly ProcessedDocument[], now: Date): string {
  if (docs.length === 0) {
    return '';
  }

  const byCategory = new Map<string, ProcessedDocument[]>();
  for (const doc of docs) {
    const category = doc.categorization.primaryCategory;
    byCategory.set(category, [...(byCategory.get(category) ?? []), doc]);
  }

  let report = `# Document Summary Report\n\nGenerated on: ${formatTimestamp(now)}\n\n`;
  report += `Total documents processed: ${docs.length}\n\n`;

  for (const category of [...byCategory.keys()].sort()) {
    const group = byCategory.get(category) ?? [];
    report += `## ${titleCase(category)} (${group.length} documents)\n\n`;
    for (const doc of group) {
      report += documentSection(doc);
    }
  }

  return report;
}

/**
 * Write the report into `outputDir`; returns its path, or null when there is nothing to report.
 */
export async function writeCategoryReport(
  docs: readonly ProcessedDocument[],
  outputDir: string,
  now: Date = new Date(),
): Promise<string | null> {
  const report = buildCategoryReport(docs, now);
  if (!report) {
    return null;
  }

  const reportPath = path.join(outputDir, reportFileName(now));
  try {
    await fs.promises.mkdir(outputDir, { recursive: true });
    await fs.promises.writeFile(reportPath, report, 'utf8');
  } catch (error) {
    throw new PipelineError('OUTPUT_WRITE_FAILED', `Could not write report ${reportPath}: ${errorMessage(error)}`, {
      reportPath,
    });
  }
  console.log(`[Pipeline] Report saved: ${reportPath}`);
  return reportPath;
}
