import { describe, it, expect } from "vitest";
import path from "node:path";
import { getConfig } from "./config";
import { InvalidConfigurationError } from "./errors";

describe("getConfig", () => {
  it("applies defaults", () => {
    const config = getConfig({});
    expect(config).toMatchObject({
      DATA_DIR: path.resolve(".rag-data"),
      INDEX_DIR: path.join(path.resolve(".rag-data"), "indexes"),
      CHUNK_SIZE: 2000,
      CHUNK_OVERLAP: 200,
      TOP_K: 5,
      MIN_SCORE: 0.2,
      MEMORY_WINDOW: 5,
      OPENAI_API_KEY: undefined,
      DOCUMENTS_DIR: undefined,
      MCP_PORT: 3000,
      HOST: "127.0.0.1",
      ALLOWED_HOSTS: [],
      ENABLE_DNS_REBINDING_PROTECTION: true,
      VERBOSE: false,
    });
  });

  it("parses and clamps numeric settings", () => {
    const config = getConfig({ CHUNK_SIZE: "99999", TOP_K: "abc", MIN_SCORE: "1.5", MEMORY_WINDOW: "3.7" });
    expect(config.CHUNK_SIZE).toBe(8000);
    expect(config.TOP_K).toBe(5);
    expect(config.MIN_SCORE).toBe(0.2);
    expect(config.MEMORY_WINDOW).toBe(3);
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() => getConfig({ CHUNK_SIZE: "500", CHUNK_OVERLAP: "500" })).toThrow(InvalidConfigurationError);
  });

  it("reads provider credentials, flags and host settings", () => {
    const config = getConfig({
      OPENAI_API_KEY: " test-secret ",
      OPENAI_EMBEDDING_MODEL: "text-embedding-3-large",
      VERBOSE: "yes",
      ALLOWED_HOSTS: "example.test, example.test:8080 ,",
      ENABLE_DNS_REBINDING_PROTECTION: "false",
      MCP_TRANSPORT: "HTTP",
      DOCUMENTS_DIR: "contracts",
    });
    expect(config).toMatchObject({
      OPENAI_API_KEY: "test-secret",
      OPENAI_EMBEDDING_MODEL: "text-embedding-3-large",
      VERBOSE: true,
      ALLOWED_HOSTS: ["example.test", "example.test:8080"],
      ENABLE_DNS_REBINDING_PROTECTION: false,
      MCP_TRANSPORT: "http",
      DOCUMENTS_DIR: path.resolve("contracts"),
    });
  });
});
