/**
 * Frontmatter extraction for markdown runbooks
 *
 * A runbook may start with a YAML block delimited by `---` lines:
 *
 * ```markdown
 * ---
 * title: High Memory Usage
 * tags: [memory, oom]
 * applicable_shapes:
 *   - "t3.*"
 * ---
 * ```
 */

import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { RunbookMetadata } from "./types";

const FRONTMATTER_PATTERN = /^---[ \t]*\n(?:([\s\S]*?)\n)?---[ \t]*(?:\n|$)/;

const optionalText = z.preprocess(
  (value) => (value === null || value === undefined ? undefined : String(value)),
  z.string().optional()
);

const stringList = z.preprocess((value) => {
  if (value === null || value === undefined) return [];
  if (Array.isArray(value)) return value.map((item) => String(item).trim());
  return String(value).split(",").map((item) => item.trim());
}, z.array(z.string()).transform((items) => items.filter(Boolean)));

const FrontmatterSchema = z.object({
  title: optionalText,
  tags: stringList,
  applicable_shapes: stringList,
});

export interface FrontmatterResult {
  metadata: RunbookMetadata;
  /** Markdown body with the frontmatter block removed */
  body: string;
}

export function emptyMetadata(): RunbookMetadata {
  return { tags: [], applicableShapes: [] };
}

/**
 * Split a markdown document into frontmatter metadata and body.
 * Expects LF line endings.
 */
export function extractFrontmatter(content: string, path = "<unknown>"): FrontmatterResult {
  const match = content.match(FRONTMATTER_PATTERN);
  if (!match) {
    return { metadata: emptyMetadata(), body: content };
  }

  const body = content.slice(match[0].length);

  let raw: unknown;
  try {
    // An empty block has no capture
    raw = parseYaml(match[1] ?? "");
  } catch (error) {
    console.warn(
      `[Frontmatter] Invalid YAML in ${path}, ignoring metadata:`,
      error instanceof Error ? error.message : error
    );
    return { metadata: emptyMetadata(), body };
  }

  const parsed = FrontmatterSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    console.warn(
      `[Frontmatter] Unexpected frontmatter in ${path}, ignoring metadata: ${parsed.error.issues
        .map((issue) => issue.message)
        .join("; ")}`
    );
    return { metadata: emptyMetadata(), body };
  }

  const metadata: RunbookMetadata = {
    tags: parsed.data.tags,
    applicableShapes: parsed.data.applicable_shapes,
  };
  if (parsed.data.title) {
    metadata.title = parsed.data.title;
  }

  return { metadata, body };
}
