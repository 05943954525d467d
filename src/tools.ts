/**
 * MCP tool surface over the session registry.
 *
 * Tool contracts (every tool takes `ownerId`; results are JSON text content):
 *  load_document   { path, documentId? }  → LoadResult
 *  ask             { question }           → answer, citations, tokenUsage, insufficientContext, cached
 *  summarize       { kind? }              → kind, summary, tokenUsage, cached
 *  extract_fields  {}                     → fields, tokenUsage, cached
 *  clear_memory    {}                     → { memorySize }
 *  restore_memory  {}                     → { memorySize }
 *  unload          {}                     → session status
 *  session_status  {}                     → session status + server status
 *  clear_cache     {}                     → { cleared }
 *
 * Errors: argument problems → InvalidParams, calls the session cannot serve in
 * its current state → InvalidRequest, everything else → InternalError. The
 * error data carries the core error code.
 */
import path from "node:path";
import { z } from "zod";
import { APP_VERSION } from "./config";
import { readDocumentFile } from "./document-reader";
import { InvalidArgumentError, RagError, type RagErrorCode } from "./errors";
import { componentLogger } from "./logger";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  Server,
  type CallToolResult,
  type Tool,
} from "./mcp-sdk";
import type { SessionRegistry } from "./sessions";
import type { StatusManager } from "./status";
import { summaryKindSchema } from "./summarizer";

const log = componentLogger("tools");

export interface ToolDeps {
  registry: SessionRegistry;
  status: StatusManager;
  /** When set, `load_document` paths resolve against it and may not leave it. */
  documentsDir?: string;
}

interface ToolSpec {
  readonly descriptor: Tool;
  run(args: unknown, deps: ToolDeps): Promise<unknown>;
}

type JsonSchemaProperties = Record<string, Record<string, unknown>>;

const OWNER_PROPERTY: JsonSchemaProperties = {
  ownerId: { type: "string", description: "Stable identifier of the user whose session to use." },
};

const ownerOnly = z.object({ ownerId: z.string().trim().min(1) });

function defineTool<S extends z.ZodTypeAny>(
  name: string,
  description: string,
  schema: S,
  properties: JsonSchemaProperties,
  handler: (args: z.infer<S>, deps: ToolDeps) => Promise<unknown>,
  required: string[] = [],
): ToolSpec {
  return {
    descriptor: {
      name,
      description,
      inputSchema: {
        type: "object",
        properties: { ...OWNER_PROPERTY, ...properties },
        required: ["ownerId", ...required],
      },
    },
    run: (args, deps) => handler(schema.parse(args ?? {}), deps),
  };
}

function resolveDocumentPath(requested: string, documentsDir: string | undefined): string {
  if (!documentsDir) return path.resolve(requested);
  const abs = path.resolve(documentsDir, requested);
  const rel = path.relative(documentsDir, abs);
  if (rel.startsWith("..") || path.isAbsolute(rel)) {
    throw new InvalidArgumentError(`Path escapes the documents directory: ${requested}`);
  }
  return abs;
}

export const TOOLS: readonly ToolSpec[] = [
  defineTool(
    "load_document",
    "Read a contract (.pdf, .txt or .md) and make it the owner's active document. Indexing may take a while for long documents; re-loading an unchanged file is instant.",
    ownerOnly.extend({ path: z.string().trim().min(1), documentId: z.string().trim().min(1).optional() }),
    {
      path: { type: "string", description: "Path to the contract file." },
      documentId: {
        type: "string",
        description: "Identifier to store the document under. Defaults to a hash of the file content.",
      },
    },
    async ({ ownerId, path: requested, documentId }, { registry, documentsDir }) => {
      const document = await readDocumentFile(resolveDocumentPath(requested, documentsDir), ownerId, documentId);
      return registry.get(ownerId).load(document);
    },
    ["path"],
  ),
  defineTool(
    "ask",
    "Ask a question about the active contract. Answers cite the pages they are based on and take the recent conversation into account.",
    ownerOnly.extend({ question: z.string() }),
    { question: { type: "string", description: "Natural language question about the contract." } },
    async ({ ownerId, question }, { registry }) => registry.get(ownerId).ask(question),
    ["question"],
  ),
  defineTool(
    "summarize",
    "Summarize the active contract.",
    ownerOnly.extend({ kind: summaryKindSchema.default("brief") }),
    {
      kind: {
        type: "string",
        enum: summaryKindSchema.options,
        description: "brief (1-2 paragraphs, default), key_points (bullets) or comprehensive (sectioned).",
      },
    },
    async ({ ownerId, kind }, { registry }) => registry.get(ownerId).summarize(kind),
  ),
  defineTool(
    "extract_fields",
    "Extract the standard rental contract fields (parties, rent, deposit, dates, fees, policies) from the active contract.",
    ownerOnly,
    {},
    async ({ ownerId }, { registry }) => registry.get(ownerId).extract(),
  ),
  defineTool(
    "clear_memory",
    "Forget the conversation so far. Cached answers are kept.",
    ownerOnly,
    {},
    async ({ ownerId }, { registry }) => {
      const session = registry.get(ownerId);
      await session.clearMemory();
      return { memorySize: session.status().memorySize };
    },
  ),
  defineTool(
    "restore_memory",
    "Refill the conversation memory from previously answered questions about the active contract.",
    ownerOnly,
    {},
    async ({ ownerId }, { registry }) => ({ memorySize: await registry.get(ownerId).restoreMemory() }),
  ),
  defineTool(
    "unload",
    "Close the active contract and cancel any work in progress for it.",
    ownerOnly,
    {},
    async ({ ownerId }, { registry }) => registry.release(ownerId),
  ),
  defineTool(
    "session_status",
    "Report the state of the owner's session and of the server.",
    ownerOnly,
    {},
    async ({ ownerId }, { registry, status }) => ({ ...registry.get(ownerId).status(), server: status.getStatus() }),
  ),
  defineTool(
    "clear_cache",
    "Delete cached answers, summaries and extractions for the active contract (or for all of the owner's contracts when none is loaded).",
    ownerOnly,
    {},
    async ({ ownerId }, { registry }) => {
      await registry.get(ownerId).clearCache();
      return { cleared: true };
    },
  ),
];

const INVALID_PARAMS: ReadonlySet<RagErrorCode> = new Set(["INVALID_CONFIGURATION", "INVALID_ARGUMENT"]);
const INVALID_REQUEST: ReadonlySet<RagErrorCode> = new Set(["NOT_READY", "SUPERSEDED", "INDEX_NOT_FOUND"]);

export function toMcpError(err: unknown): McpError {
  if (err instanceof McpError) return err;
  if (err instanceof z.ZodError) {
    const detail = err.issues.map((i) => `${i.path.join(".") || "arguments"}: ${i.message}`).join("; ");
    return new McpError(ErrorCode.InvalidParams, `Invalid arguments: ${detail}`, { code: "INVALID_ARGUMENT" });
  }
  if (err instanceof RagError) {
    const code = INVALID_PARAMS.has(err.code)
      ? ErrorCode.InvalidParams
      : INVALID_REQUEST.has(err.code)
        ? ErrorCode.InvalidRequest
        : ErrorCode.InternalError;
    return new McpError(code, err.describe(), { code: err.code });
  }
  return new McpError(ErrorCode.InternalError, err instanceof Error ? err.message : String(err));
}

export async function callTool(name: string, args: unknown, deps: ToolDeps): Promise<CallToolResult> {
  const tool = TOOLS.find((t) => t.descriptor.name === name);
  if (!tool) throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
  try {
    const result = await tool.run(args, deps);
    return { content: [{ type: "text", text: JSON.stringify(result, null, 2) }] };
  } catch (err) {
    const mapped = toMcpError(err);
    if (mapped.code === ErrorCode.InternalError) log.error({ tool: name, err: String(err) }, "tool failed");
    else log.debug({ tool: name, err: mapped.message }, "tool rejected");
    throw mapped;
  }
}

/** Fresh MCP server bound to the shared registry; one per transport session. */
export function createToolServer(deps: ToolDeps): Server {
  const server = new Server(
    { name: "contract-rag-server", version: APP_VERSION },
    { capabilities: { tools: {} } },
  );
  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS.map((t) => t.descriptor) }));
  server.setRequestHandler(CallToolRequestSchema, async (req) =>
    callTool(req.params.name, req.params.arguments, deps),
  );
  return server;
}
