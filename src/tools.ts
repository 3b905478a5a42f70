import fsSync from "node:fs";
import path from "node:path";
import { ErrorCode, McpError, type Tool } from "@modelcontextprotocol/sdk/types.js";
import type { Config } from "./config";
import { importNovels } from "./library/discovery";
import { type LibraryStore, NovelNotFoundError } from "./library/library-store";
import { InvalidPreferenceError, lineSpacingFor, THEMES } from "./library/preferences";
import type { ReaderSession, SessionSnapshot } from "./reader/session";
import { statusManager } from "./status";

/** Everything a tool call needs; one instance shared by all transport sessions. */
export interface ToolContext {
  library: LibraryStore;
  session: ReaderSession;
  config: Pick<Config, "LIBRARY_ROOT" | "ALLOWED_EXT" | "EXCLUDED_FOLDERS" | "VERBOSE">;
}

/** Static tool schemas advertised via tools/list. */
export const TOOL_DEFINITIONS: Tool[] = [
  {
    name: "list_novels",
    description: "List every novel in the library with its saved reading position.",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "import_novels",
    description:
      "Scan the library folder for plain-text novels and add the ones not yet in the library.",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "add_novel",
    description: "Add a single plain-text file from the library folder.",
    inputSchema: {
      type: "object",
      properties: {
        path: {
          type: "string",
          description: "Path relative to the library folder (use forward slashes).",
        },
        title: {
          type: "string",
          description: "Display title. Defaults to the file name without extension.",
        },
      },
      required: ["path"],
    },
  },
  {
    name: "remove_novel",
    description: "Remove a novel from the library (the file itself is left alone).",
    inputSchema: {
      type: "object",
      properties: { id: { type: "string", description: "Novel id from list_novels." } },
      required: ["id"],
    },
  },
  {
    name: "open_novel",
    description:
      "Open a novel and resume at its saved chunk. Returns the visible chunk text and progress.",
    inputSchema: {
      type: "object",
      properties: { id: { type: "string", description: "Novel id from list_novels." } },
      required: ["id"],
    },
  },
  {
    name: "read_chunk",
    description: "Jump to a chunk of the open novel. Out-of-range indices leave the reader unchanged.",
    inputSchema: {
      type: "object",
      properties: {
        index: { type: "number", description: "0-based chunk index.", minimum: 0 },
      },
      required: ["index"],
    },
  },
  {
    name: "next_chunk",
    description: "Advance to the next chunk of the open novel (no-op on the last chunk).",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "previous_chunk",
    description: "Go back to the previous chunk of the open novel (no-op on the first chunk).",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "reading_progress",
    description: "Current reader state and progress fraction, without the chunk text.",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "set_scroll_position",
    description: "Record the scroll offset inside the visible chunk so the novel resumes there.",
    inputSchema: {
      type: "object",
      properties: { offset: { type: "number", description: "Scroll offset.", minimum: 0 } },
      required: ["offset"],
    },
  },
  {
    name: "close_novel",
    description: "Save the reading position of the open novel and close it.",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "get_preferences",
    description: "Display preferences: theme, font size and derived line spacing.",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "set_preferences",
    description: "Update display preferences. Font size snaps to an even value in 12-32.",
    inputSchema: {
      type: "object",
      properties: {
        theme: { type: "string", enum: [...THEMES] },
        fontSize: { type: "number", minimum: 12, maximum: 32 },
      },
    },
  },
];

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function requireString(args: Record<string, unknown>, key: string): string {
  const v = args[key];
  if (typeof v !== "string" || !v.trim()) {
    throw new McpError(ErrorCode.InvalidParams, `Missing ${key}`);
  }
  return v;
}

function requireNumber(args: Record<string, unknown>, key: string, integer = false): number {
  const v = args[key];
  if (typeof v !== "number" || !Number.isFinite(v) || (integer && !Number.isInteger(v))) {
    throw new McpError(
      ErrorCode.InvalidParams,
      `${key} must be ${integer ? "an integer" : "a number"}`,
    );
  }
  return v;
}

/**
 * Resolve `relPath` under `root`. Throws an MCP InvalidRequest error if the
 * result would escape the root.
 */
export function ensureWithinRoot(root: string, relPath: string): string {
  const abs = path.resolve(root, relPath);
  const normRoot = path.resolve(root) + path.sep;
  if (!abs.startsWith(normRoot)) {
    throw new McpError(ErrorCode.InvalidRequest, "Path outside LIBRARY_ROOT");
  }
  return abs;
}

/** Snapshot without the (potentially 10k character) chunk text. */
function progressView(snap: SessionSnapshot) {
  const { content: _content, ...rest } = snap;
  return rest;
}

function requireOpen(ctx: ToolContext): void {
  if (ctx.session.openNovelId === null) {
    throw new McpError(ErrorCode.InvalidRequest, "No novel is open; call open_novel first");
  }
}

/**
 * Execute a tool by name. Domain errors surface as MCP InvalidRequest errors;
 * unknown tools as MethodNotFound.
 */
export async function callTool(ctx: ToolContext, name: string, rawArgs: unknown): Promise<unknown> {
  const args = isRecord(rawArgs) ? rawArgs : {};
  try {
    return await dispatch(ctx, name, args);
  } catch (e) {
    if (e instanceof NovelNotFoundError || e instanceof InvalidPreferenceError) {
      throw new McpError(ErrorCode.InvalidRequest, e.message);
    }
    throw e;
  }
}

async function dispatch(
  ctx: ToolContext,
  name: string,
  args: Record<string, unknown>,
): Promise<unknown> {
  const { library, session, config } = ctx;

  switch (name) {
    case "list_novels":
      return { novels: library.list(), openNovelId: session.openNovelId };

    case "import_novels": {
      const added = await importNovels(
        library,
        config.LIBRARY_ROOT,
        { allowedExt: config.ALLOWED_EXT, excludedFolders: config.EXCLUDED_FOLDERS },
        config.VERBOSE,
      );
      statusManager.setNovelCount(library.list().length);
      return { added, total: library.list().length };
    }

    case "add_novel": {
      const abs = ensureWithinRoot(config.LIBRARY_ROOT, requireString(args, "path"));
      if (!fsSync.existsSync(abs)) throw new McpError(ErrorCode.InvalidRequest, "File does not exist");
      const title = typeof args.title === "string" ? args.title : undefined;
      const novel = await library.add({ filePath: abs, title });
      statusManager.setNovelCount(library.list().length);
      return { novel };
    }

    case "remove_novel": {
      const id = requireString(args, "id");
      if (session.openNovelId === id) await session.close();
      const removed = await library.remove(id);
      if (!removed) throw new NovelNotFoundError(id);
      statusManager.setNovelCount(library.list().length);
      return { removed: id };
    }

    case "open_novel":
      return session.open(requireString(args, "id"));

    case "read_chunk":
      requireOpen(ctx);
      return session.goTo(requireNumber(args, "index", true));

    case "next_chunk":
      requireOpen(ctx);
      return session.next();

    case "previous_chunk":
      requireOpen(ctx);
      return session.previous();

    case "reading_progress":
      return progressView(session.snapshot());

    case "set_scroll_position": {
      requireOpen(ctx);
      const snap = await session.setScrollOffset(requireNumber(args, "offset"));
      return progressView(snap);
    }

    case "close_novel": {
      const closed = session.openNovelId;
      await session.close();
      return { closed };
    }

    case "get_preferences": {
      const prefs = library.getPreferences();
      return { ...prefs, lineSpacing: lineSpacingFor(prefs.fontSize) };
    }

    case "set_preferences": {
      const prefs = await library.setPreferences({ theme: args.theme, fontSize: args.fontSize });
      return { ...prefs, lineSpacing: lineSpacingFor(prefs.fontSize) };
    }

    default:
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
  }
}
