import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { InvalidConfigurationError } from "./errors";
// Import version directly from package.json (requires tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };

// Centralized single dotenv.config() call.
// If executing from src/ (or a build/ copy), resolve ../.env (project root). Otherwise use default.
(() => {
  try {
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = path.dirname(__filename);
    const rootEnv = path.resolve(__dirname, "../.env");
    if (fsSync.existsSync(rootEnv)) {
      dotenv.config({ path: rootEnv });
      return;
    }
  } catch {
    /* fall back to the default lookup below */
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

export interface Config {
  /** Root for every persisted artifact (indexes and the cache database). */
  DATA_DIR: string;
  INDEX_DIR: string;
  CACHE_DB_PATH: string;
  /** When set, load_document only reads files beneath this directory. */
  DOCUMENTS_DIR: string | undefined;
  VERBOSE: boolean;
  CHUNK_SIZE: number;
  CHUNK_OVERLAP: number;
  TOP_K: number;
  MIN_SCORE: number;
  MEMORY_WINDOW: number;
  OPENAI_API_KEY: string | undefined;
  OPENAI_MODEL: string;
  OPENAI_EMBEDDING_MODEL: string;
  TEMPERATURE: number;
  MAX_TOKENS: number;
  PROVIDER_TIMEOUT_MS: number;
  RETRY_MAX_ATTEMPTS: number;
  RETRY_BASE_DELAY_MS: number;
  CACHE_MEMORY_ENTRIES: number;
  MCP_TRANSPORT: string;
  MCP_PORT: number;
  HOST: string;
  /** Explicit host[:port] allow-list for the HTTP transport; empty means local-only defaults. */
  ALLOWED_HOSTS: string[];
  ENABLE_DNS_REBINDING_PROTECTION: boolean;
}

function intSetting(raw: string | undefined, fallback: number, min: number, max: number): number {
  const v = raw?.trim();
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n >= min ? Math.min(max, Math.floor(n)) : fallback;
}

function floatSetting(raw: string | undefined, fallback: number, min: number, max: number): number {
  const v = raw?.trim();
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n >= min && n <= max ? n : fallback;
}

// Tolerant truthy parsing (supports several common forms).
function flagSetting(raw: string | undefined): boolean {
  const v = (raw ?? "").trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

/**
 * Parse and normalize all runtime configuration. Out-of-range numbers fall
 * back to their defaults (or are clamped to a sane upper bound); only an
 * overlap that would stall the chunker is rejected outright.
 *
 * @throws {InvalidConfigurationError} If CHUNK_OVERLAP >= CHUNK_SIZE.
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const DATA_DIR = path.resolve(env.DATA_DIR?.trim() || ".rag-data");

  // Defaults follow the contract-sized windows: 2000 chars with 200 overlap.
  const CHUNK_SIZE = intSetting(env.CHUNK_SIZE, 2000, 1, 8000);
  const CHUNK_OVERLAP = intSetting(env.CHUNK_OVERLAP, 200, 0, 4000);
  if (CHUNK_OVERLAP >= CHUNK_SIZE) {
    throw new InvalidConfigurationError(
      `CHUNK_OVERLAP (=${CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (=${CHUNK_SIZE})`,
    );
  }

  const documentsDir = env.DOCUMENTS_DIR?.trim();

  return {
    DATA_DIR,
    INDEX_DIR: path.join(DATA_DIR, "indexes"),
    CACHE_DB_PATH: path.join(DATA_DIR, "cache.db"),
    DOCUMENTS_DIR: documentsDir ? path.resolve(documentsDir) : undefined,
    VERBOSE: flagSetting(env.VERBOSE),
    CHUNK_SIZE,
    CHUNK_OVERLAP,
    TOP_K: intSetting(env.TOP_K, 5, 1, 50),
    MIN_SCORE: floatSetting(env.MIN_SCORE, 0.2, -1, 1),
    MEMORY_WINDOW: intSetting(env.MEMORY_WINDOW, 5, 1, 50),
    OPENAI_API_KEY: env.OPENAI_API_KEY?.trim() || undefined,
    OPENAI_MODEL: env.OPENAI_MODEL?.trim() || "gpt-4o-mini",
    OPENAI_EMBEDDING_MODEL: env.OPENAI_EMBEDDING_MODEL?.trim() || "text-embedding-3-small",
    TEMPERATURE: floatSetting(env.TEMPERATURE, 0.01, 0, 2),
    MAX_TOKENS: intSetting(env.MAX_TOKENS, 500, 1, 16000),
    PROVIDER_TIMEOUT_MS: intSetting(env.PROVIDER_TIMEOUT_MS, 30000, 1000, 600000),
    RETRY_MAX_ATTEMPTS: intSetting(env.RETRY_MAX_ATTEMPTS, 3, 1, 10),
    RETRY_BASE_DELAY_MS: intSetting(env.RETRY_BASE_DELAY_MS, 500, 0, 60000),
    CACHE_MEMORY_ENTRIES: intSetting(env.CACHE_MEMORY_ENTRIES, 500, 0, 100000),
    // Transport mode: 'stdio' (default) or 'http'/'streamable-http'.
    MCP_TRANSPORT: (env.MCP_TRANSPORT ?? "").trim().toLowerCase(),
    MCP_PORT: intSetting(env.MCP_PORT, 3000, 1, 65535),
    HOST: env.HOST?.trim() || "127.0.0.1",
    ALLOWED_HOSTS: (env.ALLOWED_HOSTS ?? "")
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean),
    ENABLE_DNS_REBINDING_PROTECTION: (env.ENABLE_DNS_REBINDING_PROTECTION ?? "true").trim() !== "false",
  };
}
