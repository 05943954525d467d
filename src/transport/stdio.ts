import { StdioServerTransport, type Server } from "../mcp-sdk";
import { componentLogger } from "../logger";

const log = componentLogger("stdio");

/** Serve a single MCP session over stdin/stdout. */
export async function startStdioTransport(createServer: () => Server): Promise<Server> {
  const server = createServer();
  await server.connect(new StdioServerTransport());
  log.info("stdio transport connected");
  return server;
}
