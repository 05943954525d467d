/**
 * Turns a file on disk into page-tagged contract text.
 *
 *   .pdf        one page per PDF page (via pdf-parse)
 *   .txt / .md  pages separated by form feeds; a single page otherwise
 *
 * No OCR: a scanned PDF without a text layer yields empty pages.
 */
import fs from "node:fs/promises";
import path from "node:path";
import { createHash } from "node:crypto";
import { PDFParse } from "pdf-parse";
import { InvalidArgumentError } from "./errors";
import { componentLogger } from "./logger";
import type { ContractDocument, PageText } from "./types";

const log = componentLogger("document-reader");

const TEXT_EXTENSIONS = new Set([".txt", ".md", ".markdown"]);

export function isPdf(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === ".pdf";
}

/** First 16 hex characters of the SHA-256 of the file bytes. */
export function contentId(data: Buffer): string {
  return createHash("sha256").update(data).digest("hex").slice(0, 16);
}

export function splitTextPages(text: string): PageText[] {
  return text
    .replace(/\r\n/g, "\n")
    .split("\f")
    .map((page, i) => ({ pageNumber: i + 1, text: page }));
}

async function readPdfPages(data: Buffer): Promise<PageText[]> {
  const parser = new PDFParse({ data });
  try {
    const result = await parser.getText();
    return result.pages.map((page, i) => ({ pageNumber: i + 1, text: page.text }));
  } finally {
    await parser.destroy();
  }
}

/**
 * @param documentId Defaults to {@link contentId} of the file, so re-reading
 *   an unchanged file yields the same id.
 * @throws {InvalidArgumentError} Unreadable file or unsupported extension.
 */
export async function readDocumentFile(
  filePath: string,
  ownerId: string,
  documentId?: string,
): Promise<ContractDocument> {
  const ext = path.extname(filePath).toLowerCase();
  if (!isPdf(filePath) && !TEXT_EXTENSIONS.has(ext)) {
    throw new InvalidArgumentError(`Unsupported file type "${ext || "(none)"}": expected .pdf, .txt or .md`);
  }

  let data: Buffer;
  try {
    data = await fs.readFile(filePath);
  } catch (e) {
    throw new InvalidArgumentError(`Cannot read ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }

  let pages: PageText[];
  if (isPdf(filePath)) {
    log.debug({ file: path.basename(filePath) }, "extracting PDF text");
    try {
      pages = await readPdfPages(data);
    } catch (e) {
      throw new InvalidArgumentError(
        `Cannot extract text from ${path.basename(filePath)}: ${e instanceof Error ? e.message : String(e)}`,
      );
    }
  } else {
    pages = splitTextPages(data.toString("utf8"));
  }

  const id = documentId?.trim() || contentId(data);
  log.info({ documentId: id, file: path.basename(filePath), pages: pages.length }, "document read");
  return {
    id,
    ownerId,
    pages,
    title: path.basename(filePath),
    createdAt: new Date().toISOString(),
  };
}
