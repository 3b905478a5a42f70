/**
 * Application entry point.
 *
 * High-level flow:
 * 1. Load environment configuration (supports running from src/ or a build dir).
 * 2. Load the novel library (records, reading positions, display preferences),
 *    dropping entries whose file has disappeared.
 * 3. Create the single reader session: a chunk store that decodes, normalizes
 *    and serves the open novel in 10,000-character chunks with a 5-entry cache.
 * 4. Start a Model Context Protocol (MCP) server over either:
 *      - STDIO (default): good for local editor / assistant integration.
 *      - Streamable HTTP (MCP_TRANSPORT=http|streamable-http): also exposes
 *        /health with library + reader status.
 *
 * Exposed tools: list_novels, import_novels, add_novel, remove_novel,
 * open_novel, read_chunk, next_chunk, previous_chunk, reading_progress,
 * set_scroll_position, close_novel, get_preferences, set_preferences.
 *
 * ENVIRONMENT VARIABLES (all optional):
 *  - LIBRARY_ROOT         Folder scanned by import_novels (default ./novels).
 *  - ALLOWED_EXT          Comma list of file extensions to import (default 'txt').
 *  - EXCLUDED_FOLDERS     Comma list of folder names skipped while scanning.
 *  - LIBRARY_STORE_PATH   JSON file persisting the library; in-memory if unset.
 *  - VERBOSE              If '1'/'true'/etc enables extra logging.
 *  - MCP_TRANSPORT        'stdio' (default) or 'http'/'streamable-http'.
 *
 * There is one reader session per process: every MCP client shares the open
 * novel, the same way a single device shows one book at a time.
 */
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { APP_VERSION, getConfig, type Config } from "./config";
import { LibraryStore } from "./library/library-store";
import { ChunkStore } from "./reader/chunk-store";
import { ReaderSession } from "./reader/session";
import { statusManager } from "./status";
import { callTool, TOOL_DEFINITIONS, type ToolContext } from "./tools";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";

const config: Config = getConfig();
const { LIBRARY_ROOT, LIBRARY_STORE_PATH, VERBOSE, MCP_TRANSPORT } = config;

statusManager.setLibraryRoot(LIBRARY_ROOT);

const library = new LibraryStore(LIBRARY_STORE_PATH, VERBOSE);
await library.load();
statusManager.setNovelCount(library.list().length);

const store = new ChunkStore({ verbose: VERBOSE });
const session = new ReaderSession(store, library);

// Mirror every reader state change into /health.
store.subscribe((snap) => {
  statusManager.setReader({
    novelId: session.openNovelId,
    state: snap.state,
    currentIndex: snap.currentIndex,
    totalChunks: snap.totalChunks,
    progress: store.progress(),
    error: snap.error,
  });
});

const ctx: ToolContext = { library, session, config };

/**
 * Factory for a fresh MCP Server wired to the shared library + session. A new
 * instance is created per transport session (HTTP mode may have several).
 */
function createServer(): Server {
  const server = new Server(
    { name: "novel-reader-mcp", version: APP_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOL_DEFINITIONS }));

  server.setRequestHandler(CallToolRequestSchema, async (req) => {
    const result = await callTool(ctx, req.params.name, req.params.arguments);
    return { content: [{ type: "text", text: JSON.stringify(result, null, 2) }] };
  });

  return server;
}

// Persist the open novel's position before exiting.
async function shutdown(): Promise<void> {
  try {
    await session.close();
  } catch (e) {
    console.error("[Reader] Failed to save position on shutdown:", e);
  }
  process.exit(0);
}
process.on("SIGINT", () => void shutdown());
process.on("SIGTERM", () => void shutdown());

const useHttp = MCP_TRANSPORT === "http" || MCP_TRANSPORT === "streamable-http";

if (useHttp) {
  statusManager.markTransport("http");
  await startHttpTransport(createServer);
} else {
  statusManager.markTransport("stdio");
  await startStdioTransport(createServer);
}
statusManager.markReady();
console.error(`[Reader] Ready: ${library.list().length} novels under ${LIBRARY_ROOT}`);
