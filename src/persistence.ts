import fs from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import { z } from "zod";
import type { Chunk } from "./types";

/**
 * Keyed storage for serialized vector indexes, one entry per document.
 * Values are opaque strings produced by {@link encodeIndex}.
 */
export interface IndexStore {
  read(documentId: string): Promise<string | null>;
  write(documentId: string, data: string): Promise<void>;
  delete(documentId: string): Promise<void>;
  list(): Promise<string[]>;
}

/** Metadata stored alongside the vectors to allow compatibility checks on load. */
export interface IndexMeta {
  documentId: string;
  fingerprint: string;
  chunkSize: number;
  chunkOverlap: number;
  modelName: string;
  dimension: number;
}

export interface IndexEntry {
  chunk: Chunk;
  vector: Float32Array;
}

const persistedSchema = z.object({
  version: z.literal(1),
  meta: z.object({
    documentId: z.string(),
    fingerprint: z.string(),
    chunkSize: z.number().int(),
    chunkOverlap: z.number().int(),
    modelName: z.string(),
    dimension: z.number().int().nonnegative(),
    savedAt: z.string(),
    embEncoding: z.literal("f32-base64"),
  }),
  chunks: z.array(
    z.object({
      id: z.string(),
      index: z.number().int().nonnegative(),
      page: z.number().int(),
      start: z.number().int().nonnegative(),
      end: z.number().int().nonnegative(),
      text: z.string(),
      emb: z.string(),
    }),
  ),
});

function encodeVector(v: Float32Array): string {
  return Buffer.from(v.buffer, v.byteOffset, v.byteLength).toString("base64");
}

function decodeVector(s: string): Float32Array | null {
  const buf = Buffer.from(s, "base64");
  if (buf.byteLength % 4 !== 0) return null;
  // Copy into a fresh (4-byte aligned) buffer; pooled Buffers may start at any offset.
  return new Float32Array(new Uint8Array(buf).buffer);
}

/**
 * Serialize an index as JSON. Embeddings are stored as base64-encoded 32-bit
 * floats (little-endian on every supported platform) under `emb`.
 */
export function encodeIndex(meta: IndexMeta, entries: readonly IndexEntry[]): string {
  return JSON.stringify({
    version: 1,
    meta: { ...meta, savedAt: new Date().toISOString(), embEncoding: "f32-base64" },
    chunks: entries.map(({ chunk, vector }) => ({
      id: chunk.id,
      index: chunk.index,
      page: chunk.page,
      start: chunk.start,
      end: chunk.end,
      text: chunk.text,
      emb: encodeVector(vector),
    })),
  });
}

/**
 * Parse a serialized index. Returns null for malformed input, including any
 * vector whose length disagrees with the recorded dimension.
 */
export function decodeIndex(raw: string): { meta: IndexMeta; entries: IndexEntry[] } | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = persistedSchema.safeParse(json);
  if (!parsed.success) return null;
  const { savedAt: _savedAt, embEncoding: _enc, ...meta } = parsed.data.meta;
  const entries: IndexEntry[] = [];
  for (const c of parsed.data.chunks) {
    const vector = decodeVector(c.emb);
    if (!vector || vector.length !== meta.dimension) return null;
    const { emb: _emb, ...rest } = c;
    entries.push({ chunk: { ...rest, documentId: meta.documentId }, vector });
  }
  return { meta, entries };
}

/**
 * Index store backed by one JSON file per document under `dir`. Writes go to a
 * temporary file first and are renamed into place, so a reader never sees a
 * half-written index.
 */
export class FileIndexStore implements IndexStore {
  private readonly dir: string;

  public constructor(dir: string) {
    this.dir = dir;
  }

  private fileFor(documentId: string): string {
    return path.join(this.dir, `${encodeURIComponent(documentId)}.json`);
  }

  public async read(documentId: string): Promise<string | null> {
    try {
      return await fs.readFile(this.fileFor(documentId), "utf8");
    } catch (e) {
      if (e instanceof Error && "code" in e && e.code === "ENOENT") return null;
      throw e;
    }
  }

  public async write(documentId: string, data: string): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    const target = this.fileFor(documentId);
    const tmp = `${target}.${process.pid}.tmp`;
    await fs.writeFile(tmp, data, "utf8");
    await fs.rename(tmp, target);
  }

  public async delete(documentId: string): Promise<void> {
    await fs.rm(this.fileFor(documentId), { force: true });
  }

  public async list(): Promise<string[]> {
    const files = await fg("*.json", { cwd: this.dir, onlyFiles: true });
    return files.map((f) => decodeURIComponent(f.slice(0, -".json".length))).sort();
  }
}

export class MemoryIndexStore implements IndexStore {
  private readonly data = new Map<string, string>();

  public async read(documentId: string): Promise<string | null> {
    return this.data.get(documentId) ?? null;
  }

  public async write(documentId: string, data: string): Promise<void> {
    this.data.set(documentId, data);
  }

  public async delete(documentId: string): Promise<void> {
    this.data.delete(documentId);
  }

  public async list(): Promise<string[]> {
    return [...this.data.keys()].sort();
  }
}

/** Metadata of the index stored for `documentId`, or null when none is readable. */
export async function readStoredMeta(store: IndexStore, documentId: string): Promise<IndexMeta | null> {
  const raw = await store.read(documentId);
  return raw === null ? null : (decodeIndex(raw)?.meta ?? null);
}
