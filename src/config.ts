import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// Single dotenv.config() call for the whole process.
// Prefer the project-root .env (one level above src/); otherwise default lookup from cwd.
(() => {
  const rootEnv = path.resolve(__dirname, "../.env");
  if (fsSync.existsSync(rootEnv)) {
    dotenv.config({ path: rootEnv });
    return;
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = (() => {
  try {
    const raw: unknown = JSON.parse(
      fsSync.readFileSync(path.resolve(__dirname, "../package.json"), "utf8"),
    );
    if (raw && typeof raw === "object" && "version" in raw && typeof raw.version === "string") {
      return raw.version;
    }
  } catch (e) {
    console.error("[Reader] Could not read package.json version:", e);
  }
  return "0.0.0";
})();

export interface Config {
  LIBRARY_ROOT: string;
  ALLOWED_EXT: string[];
  EXCLUDED_FOLDERS: string[];
  LIBRARY_STORE_PATH: string | undefined;
  VERBOSE: boolean;
  MCP_TRANSPORT: string;
}

/** Split a comma list env var, or use `fallback` when unset. */
function listEnv(value: string | undefined, fallback: string[]): string[] {
  return (
    value
      ?.split(",")
      .map((s) => s.trim())
      .filter(Boolean) ?? fallback
  );
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): Config {
  // Folder import_novels scans; add_novel only accepts files beneath it.
  const LIBRARY_ROOT = path.resolve(env.LIBRARY_ROOT?.trim() || "novels");

  // Only plain text is supported; other extensions are accepted but decoded as text.
  const ALLOWED_EXT = listEnv(env.ALLOWED_EXT, ["txt"]).map((e) => e.replace(/^\./, ""));

  const EXCLUDED_FOLDERS = listEnv(env.EXCLUDED_FOLDERS, ["node_modules", ".git", ".cache"]);

  // Without a store path the library, positions and preferences are in-memory only.
  const LIBRARY_STORE_PATH = env.LIBRARY_STORE_PATH?.trim()
    ? path.resolve(env.LIBRARY_STORE_PATH.trim())
    : undefined;

  // Tolerant truthy parsing.
  const VERBOSE = (() => {
    const v = (env.VERBOSE ?? "").trim().toLowerCase();
    return v === "1" || v === "true" || v === "yes" || v === "on";
  })();

  // 'stdio' (default) or 'http'/'streamable-http'.
  const MCP_TRANSPORT = (env.MCP_TRANSPORT ?? "").trim().toLowerCase();

  return {
    LIBRARY_ROOT,
    ALLOWED_EXT,
    EXCLUDED_FOLDERS,
    LIBRARY_STORE_PATH,
    VERBOSE,
    MCP_TRANSPORT,
  };
}
