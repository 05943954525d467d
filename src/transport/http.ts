/**
 * Streamable HTTP transport.
 *
 * Session model: a client starts with a JSON-RPC `initialize` POST to /mcp
 * without an `mcp-session-id` header; that creates a transport + MCP server
 * pair whose generated session id the SDK returns in the response headers.
 * Every later request carries the header and is routed to the same pair.
 * Closing the transport evicts the session.
 *
 *  POST   /mcp     JSON-RPC requests
 *  GET    /mcp     server-to-client stream for an existing session
 *  DELETE /mcp     session teardown
 *  GET    /health  server status
 *
 * MCP sessions are transport sessions only; contract sessions are keyed by the
 * `ownerId` tool argument, so one owner may use several connections.
 */
import express from "express";
import { randomUUID } from "node:crypto";
import type { Server as HttpServer } from "node:http";
import { componentLogger } from "../logger";
import { StreamableHTTPServerTransport, isInitializeRequest, type Server } from "../mcp-sdk";
import type { StatusManager } from "../status";

const log = componentLogger("http");

export interface HttpTransportOptions {
  port: number;
  host: string;
  /** Explicit host[:port] allow-list; empty means the local-only defaults. */
  allowedHosts: string[];
  enableDnsRebindingProtection: boolean;
  status: StatusManager;
}

export function defaultAllowedHosts(host: string, port: number): string[] {
  return Array.from(
    new Set(["127.0.0.1", `127.0.0.1:${port}`, "localhost", `localhost:${port}`, host, `${host}:${port}`]),
  );
}

function rpcError(code: number, message: string) {
  return { jsonrpc: "2.0", error: { code, message }, id: null };
}

/** Express app routing MCP requests to per-session transports. */
export function createHttpApp(createServer: () => Server, opts: HttpTransportOptions): express.Express {
  const app = express();
  app.use(express.json({ limit: "2mb" }));

  const allowedHosts = opts.allowedHosts.length ? opts.allowedHosts : defaultAllowedHosts(opts.host, opts.port);
  const transports = new Map<string, StreamableHTTPServerTransport>();

  app.post("/mcp", async (req: express.Request, res: express.Response) => {
    try {
      const sessionId = req.header("mcp-session-id");
      let transport = sessionId ? transports.get(sessionId) : undefined;

      if (!transport && !sessionId && isInitializeRequest(req.body)) {
        const created = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (sid: string) => {
            transports.set(sid, created);
            log.debug({ sessionId: sid }, "mcp session opened");
          },
          enableDnsRebindingProtection: opts.enableDnsRebindingProtection,
          allowedHosts,
        });

        const server = createServer();
        let closing = false;
        created.onclose = () => {
          if (closing) return;
          closing = true;
          if (created.sessionId) transports.delete(created.sessionId);
          // server.close() closes the transport again, which would re-enter this handler.
          created.onclose = undefined;
          server.close().catch((e: unknown) => log.warn({ err: String(e) }, "error closing mcp server"));
          log.debug({ sessionId: created.sessionId }, "mcp session closed");
        };
        await server.connect(created);
        transport = created;
      }

      if (!transport) {
        res.status(400).json(rpcError(-32000, "Bad Request: No valid session ID provided"));
        return;
      }

      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      log.error({ err: String(err) }, "http POST failed");
      if (!res.headersSent) res.status(500).json(rpcError(-32603, "Internal server error"));
    }
  });

  const handleSessionRequest = async (req: express.Request, res: express.Response) => {
    const sessionId = req.header("mcp-session-id");
    const transport = sessionId ? transports.get(sessionId) : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (err) {
      log.error({ err: String(err), method: req.method }, "http session request failed");
      if (!res.headersSent) res.status(500).send("Internal server error");
    }
  };

  app.get("/mcp", handleSessionRequest);
  app.delete("/mcp", handleSessionRequest);

  app.get("/health", (_req, res) => {
    res.json(opts.status.getStatus());
  });

  return app;
}

/** @returns The listening server, once bound. */
export async function startHttpTransport(createServer: () => Server, opts: HttpTransportOptions): Promise<HttpServer> {
  const app = createHttpApp(createServer, opts);
  return new Promise<HttpServer>((resolve, reject) => {
    const server = app.listen(opts.port, opts.host, () => {
      log.info({ url: `http://${opts.host}:${opts.port}/mcp` }, "streamable HTTP listening");
      resolve(server);
    });
    server.once("error", reject);
  });
}
