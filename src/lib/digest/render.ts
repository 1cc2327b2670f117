/**
 * Plain-text digest rendering
 */

import type { DigestEntry } from "../model";

export interface RenderOptions {
  title?: string;
  generatedAt?: Date;
}

export type Renderer = (entries: DigestEntry[]) => string;

const DESIGN_NAMES: Record<string, string> = {
  systematic_review: "Systematic review",
  meta_analysis: "Meta-analysis",
  rct: "Randomized trial",
  cohort: "Cohort study",
  case_control: "Case-control study",
  cross_sectional: "Cross-sectional study",
  case_series: "Case series",
  case_report: "Case report",
  narrative_review: "Narrative review",
  editorial: "Editorial",
};

function formatAuthors(authors: string[]): string {
  if (authors.length === 0) {
    return "Unknown authors";
  }
  if (authors.length <= 3) {
    return authors.join(", ");
  }
  return `${authors.slice(0, 3).join(", ")} et al.`;
}

function formatEntry(entry: DigestEntry, position: number): string {
  const lines = [`${position}. ${entry.title}`, `   ${formatAuthors(entry.authors)}`];

  const meta = [entry.source, entry.publishedDate, DESIGN_NAMES[entry.designLabel]]
    .filter((part): part is string => Boolean(part))
    .join(" | ");
  lines.push(`   ${meta} | relevance ${Math.round(entry.relevance * 100)}%`);

  if (entry.summary) {
    lines.push(`   ${entry.summary.replace(/\s+/g, " ").trim()}`);
  }
  if (entry.url) {
    lines.push(`   ${entry.url}`);
  }
  return lines.join("\n");
}

export function renderTextDigest(entries: DigestEntry[], options: RenderOptions = {}): string {
  const title = options.title ?? "Research Digest";
  const generatedAt = (options.generatedAt ?? new Date()).toISOString().slice(0, 16).replace("T", " ");
  const header = `${title} (${entries.length} ${entries.length === 1 ? "paper" : "papers"}, ${generatedAt} UTC)`;

  const body = entries.map((entry, index) => formatEntry(entry, index + 1));
  return [header, "=".repeat(header.length), "", body.join("\n\n"), ""].join("\n");
}
