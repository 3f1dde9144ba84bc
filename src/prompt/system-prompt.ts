import type { FunctionTool } from "../types.js";
import { EXPORT_TOOL_NAME } from "../tools/export.js";

/**
 * System prompt builder.
 *
 * Assembles the priming message every session starts with:
 *   base instructions + data accuracy rules + export guidelines + tools + extras
 */

export interface SystemPromptParts {
  /** Tenant the session is bound to */
  routingKey: string;
  /** yyyy-MM-dd */
  currentDate: string;
  tools: FunctionTool[];
  /** Name of the export tool, when one is registered */
  exportToolName?: string;
  extraSections?: PromptSection[];
}

export interface PromptSection {
  heading: string;
  content: string;
}

export function buildSystemPrompt(parts: SystemPromptParts): string {
  const sections: string[] = [buildBaseSection(parts), buildAccuracySection()];

  const exportTool = parts.exportToolName ?? EXPORT_TOOL_NAME;
  if (parts.tools.some((t) => t.function.name === exportTool)) {
    sections.push(buildExportSection(exportTool));
  }

  if (parts.tools.length > 0) {
    sections.push(buildToolsSection(parts.tools));
  }

  if (parts.extraSections) {
    for (const sec of parts.extraSections) {
      sections.push(`## ${sec.heading}\n\n${sec.content}`);
    }
  }

  return sections.join("\n\n---\n\n");
}

function buildBaseSection(parts: SystemPromptParts): string {
  return [
    "You are a helpful assistant that helps users query database information.",
    "Use the available tools to retrieve data when necessary.",
    "If required parameters are missing, ask the user to provide them. " +
      "Do NOT make assumptions or infer missing values.",
    `The current tenant is ${parts.routingKey}; its identifier is supplied to the tools automatically.`,
    "In user-facing responses, provide names or descriptions only. Do NOT include internal IDs or GUIDs.",
    `The current date is ${parts.currentDate}.`,
  ].join("\n");
}

function buildAccuracySection(): string {
  return [
    "## Data Accuracy",
    "",
    "- NEVER fabricate, extrapolate, or infer data that was not returned by a tool.",
    "- If a tool returns aggregate totals, do NOT break them down by period yourself. " +
      "Call the tool once per period instead.",
    "- When presenting results, include ALL relevant fields returned unless the user asks otherwise.",
    "- Present data in a clear, structured format (table, list, or bullet points).",
  ].join("\n");
}

function buildExportSection(exportTool: string): string {
  return [
    "## Export Guidelines",
    "",
    `- To export data you already retrieved, call ${exportTool} with the COMPLETE array of results in 'data'.`,
    "- Do NOT truncate, sample, or omit records when passing data for export.",
    "- For large result sets (more than 10 records), offer an export instead of displaying everything.",
    "- When an export succeeds, present the download_url as a link: 'Download your file: [download_url]'.",
  ].join("\n");
}

function buildToolsSection(tools: FunctionTool[]): string {
  const lines = ["## Available Tools", ""];
  for (const t of tools) {
    lines.push(`- **${t.function.name}**: ${t.function.description}`);
  }
  return lines.join("\n");
}

/** yyyy-MM-dd in local time */
export function formatDate(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}
