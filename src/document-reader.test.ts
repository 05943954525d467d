import { describe, it, expect, beforeAll, afterAll } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { contentId, isPdf, readDocumentFile, splitTextPages } from "./document-reader";
import { InvalidArgumentError } from "./errors";

describe("splitTextPages", () => {
  it("splits on form feeds and normalizes line endings", () => {
    expect(splitTextPages("one\r\ntwo\fthree")).toEqual([
      { pageNumber: 1, text: "one\ntwo" },
      { pageNumber: 2, text: "three" },
    ]);
  });

  it("returns a single page when there is no form feed", () => {
    expect(splitTextPages("just text")).toEqual([{ pageNumber: 1, text: "just text" }]);
  });
});

describe("readDocumentFile", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "doc-reader-"));
    await fs.writeFile(path.join(dir, "lease.txt"), "Page one\fMonthly Rent: SGD $100");
    await fs.writeFile(path.join(dir, "notes.docx"), "binary");
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("reads a text file into pages with a content-derived id", async () => {
    const doc = await readDocumentFile(path.join(dir, "lease.txt"), "user-1");
    const expectedId = contentId(Buffer.from("Page one\fMonthly Rent: SGD $100"));

    expect(doc.id).toBe(expectedId);
    expect(doc.id).toMatch(/^[0-9a-f]{16}$/);
    expect(doc.ownerId).toBe("user-1");
    expect(doc.title).toBe("lease.txt");
    expect(doc.pages).toEqual([
      { pageNumber: 1, text: "Page one" },
      { pageNumber: 2, text: "Monthly Rent: SGD $100" },
    ]);
  });

  it("uses an explicit document id when given", async () => {
    const doc = await readDocumentFile(path.join(dir, "lease.txt"), "user-1", "lease-2024");
    expect(doc.id).toBe("lease-2024");
  });

  it("rejects unsupported and missing files", async () => {
    await expect(readDocumentFile(path.join(dir, "notes.docx"), "user-1")).rejects.toBeInstanceOf(
      InvalidArgumentError,
    );
    await expect(readDocumentFile(path.join(dir, "missing.txt"), "user-1")).rejects.toBeInstanceOf(
      InvalidArgumentError,
    );
  });

  it("recognizes PDFs by extension", () => {
    expect(isPdf("/tmp/Lease.PDF")).toBe(true);
    expect(isPdf("/tmp/lease.txt")).toBe(false);
  });
});
