import { InvalidConfigurationError } from "./errors";
import { PAGE_SEPARATOR, type Chunk, type PageText } from "./types";

export interface ChunkingOptions {
  /** Maximum characters per chunk. */
  chunkSize: number;
  /** Characters shared by consecutive chunks. Must be < chunkSize. */
  chunkOverlap: number;
}

/** Break candidates, strongest first. */
const SEPARATORS = ["\n\n", "\n", " "];

/** @throws {InvalidConfigurationError} */
export function validateChunking({ chunkSize, chunkOverlap }: ChunkingOptions): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new InvalidConfigurationError(`chunkSize must be a positive integer (got ${chunkSize})`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
    throw new InvalidConfigurationError(
      `chunkOverlap must be a non-negative integer (got ${chunkOverlap})`,
    );
  }
  if (chunkOverlap >= chunkSize) {
    throw new InvalidConfigurationError(
      `chunkOverlap (=${chunkOverlap}) must be smaller than chunkSize (=${chunkSize})`,
    );
  }
}

/**
 * Join page texts into the single document string that chunk spans refer to.
 * `pageStarts[i]` is the offset where `pages[i]` begins.
 */
export function joinPages(pages: readonly PageText[]): { text: string; pageStarts: number[] } {
  const pageStarts: number[] = [];
  let text = "";
  pages.forEach((page, i) => {
    if (i > 0) text += PAGE_SEPARATOR;
    pageStarts.push(text.length);
    text += page.text;
  });
  return { text, pageStarts };
}

function pageAt(offset: number, pages: readonly PageText[], pageStarts: number[]): number {
  let found = 0;
  for (let i = 0; i < pageStarts.length; i++) {
    if (pageStarts[i] <= offset) found = i;
    else break;
  }
  return pages[found]?.pageNumber ?? 1;
}

/**
 * Pull a window end back to the last separator that still leaves more than
 * `overlap` characters after `start`, so the next window makes progress.
 */
function softEnd(text: string, start: number, end: number, overlap: number): number {
  const floor = start + overlap;
  for (const sep of SEPARATORS) {
    const idx = text.lastIndexOf(sep, end - sep.length);
    if (idx >= floor) return idx + sep.length;
  }
  return end;
}

/**
 * Split a document into overlapping chunks.
 *
 * Every chunk is at most `chunkSize` characters; each chunk after the first
 * starts exactly `chunkOverlap` characters before the previous one ended; the
 * last chunk ends at the end of the text. A chunk that crosses a page break is
 * attributed to the page it starts on. Pure.
 *
 * @throws {InvalidConfigurationError} If the options cannot make progress.
 */
export function chunkDocument(
  documentId: string,
  pages: readonly PageText[],
  opts: ChunkingOptions,
): Chunk[] {
  validateChunking(opts);
  const { chunkSize, chunkOverlap } = opts;
  const { text, pageStarts } = joinPages(pages);

  const out: Chunk[] = [];
  let start = 0;
  while (start < text.length) {
    let end = Math.min(text.length, start + chunkSize);
    if (end < text.length) end = softEnd(text, start, end, chunkOverlap);
    out.push({
      id: `${documentId}#${out.length}`,
      documentId,
      index: out.length,
      page: pageAt(start, pages, pageStarts),
      start,
      end,
      text: text.slice(start, end),
    });
    if (end >= text.length) break;
    start = end - chunkOverlap;
  }
  return out;
}

/** Rebuild the document text from chunks in sequence order, dropping overlaps. */
export function reassembleChunks(chunks: readonly Chunk[]): string {
  let out = "";
  let covered = 0;
  for (const c of [...chunks].sort((a, b) => a.index - b.index)) {
    out += c.text.slice(Math.max(0, covered - c.start));
    covered = Math.max(covered, c.end);
  }
  return out;
}
