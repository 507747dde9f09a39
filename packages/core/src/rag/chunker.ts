/**
 * Runbook Chunker
 *
 * Splits a markdown runbook into section-bounded, size-limited chunks.
 * Sections start at level-2 and level-3 headers; a section over the size
 * budget is split at the last paragraph break that fits, then sentence end,
 * line break, word gap, and only as a last resort a hard character cut.
 *
 * Chunk ids are `<sourcePath>#<chunkIndex>`, so chunking the same bytes
 * always yields the same ids and re-ingestion replaces rather than duplicates.
 */

import { extractFrontmatter } from "./frontmatter";
import type { ChunkingOptions, ParsedChunk, RunbookDocument, RunbookMetadata } from "./types";

export const DEFAULT_MAX_CHUNK_SIZE = 2000;

const HEADER_PATTERN = /^(#{2,3})[ \t]+(.+?)(?:[ \t]+#+)?[ \t]*$/;
const FENCE_PATTERN = /^[ \t]*(```|~~~)/;
const DEFAULT_SECTION_TITLE = "Introduction";

interface Section {
  title: string;
  content: string;
}

/**
 * Finds a cut position in `text` (longer than `maxSize`) so that
 * `text.slice(0, cut)` fits the budget. Returns -1 when no boundary exists.
 */
type BoundaryFinder = (text: string, maxSize: number) => number;

const paragraphBoundary: BoundaryFinder = (text, maxSize) => {
  const index = text.lastIndexOf("\n\n", maxSize);
  return index > 0 ? index : -1;
};

const sentenceBoundary: BoundaryFinder = (text, maxSize) => {
  for (let i = maxSize - 1; i > 0; i--) {
    if (".!?".includes(text[i]) && /\s/.test(text[i + 1] ?? "")) {
      return i + 1;
    }
  }
  return -1;
};

const lineBoundary: BoundaryFinder = (text, maxSize) => {
  const index = text.lastIndexOf("\n", maxSize);
  return index > 0 ? index : -1;
};

const wordBoundary: BoundaryFinder = (text, maxSize) => {
  for (let i = maxSize; i > 0; i--) {
    if (/\s/.test(text[i])) {
      return i;
    }
  }
  return -1;
};

// In order of preference
const BOUNDARY_FINDERS: BoundaryFinder[] = [
  paragraphBoundary,
  sentenceBoundary,
  lineBoundary,
  wordBoundary,
];

function findCut(text: string, maxSize: number): number {
  for (const find of BOUNDARY_FINDERS) {
    const cut = find(text, maxSize);
    if (cut > 0) {
      return cut;
    }
  }
  // A single token longer than the budget
  return maxSize;
}

/**
 * Split text into pieces of at most `maxSize` characters at natural boundaries
 */
export function splitAtBoundaries(text: string, maxSize: number): string[] {
  const parts: string[] = [];
  let rest = text.trim();

  while (rest.length > maxSize) {
    const cut = findCut(rest, maxSize);
    parts.push(rest.slice(0, cut).trimEnd());
    rest = rest.slice(cut).trimStart();
  }

  if (rest) {
    parts.push(rest);
  }

  return parts;
}

/**
 * Split a markdown body into sections at level-2/3 headers, ignoring
 * header-like lines inside fenced code blocks
 */
export function splitSections(body: string, preambleTitle = DEFAULT_SECTION_TITLE): Section[] {
  const sections: Section[] = [];
  let title = preambleTitle;
  let lines: string[] = [];
  let inFence = false;

  const flush = () => {
    const content = lines.join("\n").trim();
    if (content) {
      sections.push({ title, content });
    }
    lines = [];
  };

  for (const line of body.split("\n")) {
    if (FENCE_PATTERN.test(line)) {
      inFence = !inFence;
      lines.push(line);
      continue;
    }

    const header = inFence ? null : line.match(HEADER_PATTERN);
    if (header) {
      flush();
      title = header[2].trim();
      continue;
    }

    lines.push(line);
  }

  flush();
  return sections;
}

export function chunkId(sourcePath: string, chunkIndex: number): string {
  return `${sourcePath}#${chunkIndex}`;
}

export class RunbookChunker {
  readonly maxChunkSize: number;

  constructor(options: ChunkingOptions = {}) {
    const maxChunkSize = options.maxChunkSize ?? DEFAULT_MAX_CHUNK_SIZE;
    if (!Number.isInteger(maxChunkSize) || maxChunkSize < 1) {
      throw new RangeError(`maxChunkSize must be a positive integer, got ${maxChunkSize}`);
    }
    this.maxChunkSize = maxChunkSize;
  }

  /**
   * Chunk a runbook. Empty documents yield an empty array.
   */
  chunk(document: RunbookDocument): ParsedChunk[] {
    const normalized = document.content.replace(/\r\n?/g, "\n");
    if (!normalized.trim()) {
      return [];
    }

    const { metadata, body } = extractFrontmatter(normalized, document.path);
    const sections = splitSections(body, metadata.title ?? DEFAULT_SECTION_TITLE);

    const chunks: ParsedChunk[] = [];

    for (const section of sections) {
      for (const content of splitAtBoundaries(section.content, this.maxChunkSize)) {
        const chunkIndex = chunks.length;
        chunks.push({
          id: chunkId(document.path, chunkIndex),
          sourcePath: document.path,
          sectionTitle: section.title,
          content,
          chunkIndex,
          metadata: copyMetadata(metadata),
        });
      }
    }

    return chunks;
  }
}

function copyMetadata(metadata: RunbookMetadata): RunbookMetadata {
  return {
    ...metadata,
    tags: [...metadata.tags],
    applicableShapes: [...metadata.applicableShapes],
  };
}
