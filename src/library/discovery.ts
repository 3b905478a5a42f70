import fs from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import type { Novel } from "../types";
import { type LibraryStore, titleFromPath } from "./library-store";

/** A candidate novel file found under the library root. */
export interface DiscoveredNovel {
  title: string;
  /** Absolute path. */
  filePath: string;
  /** Size in bytes. */
  size: number;
}

export interface DiscoverOptions {
  /** Extensions WITHOUT leading dot. */
  allowedExt: string[];
  /** Folder names (not globs) skipped wherever they appear. */
  excludedFolders?: string[];
}

/**
 * Find plain-text novels under `root`, sorted by path. Dot files are skipped
 * and so are entries that vanish or turn out not to be files between the glob
 * and the stat.
 */
export async function discoverNovels(root: string, opts: DiscoverOptions): Promise<DiscoveredNovel[]> {
  if (!opts.allowedExt.length) return [];
  const patterns = opts.allowedExt.map((ext) => `**/*.${ext.replace(/^\./, "")}`);
  const ignore = (opts.excludedFolders ?? []).map((name) => `**/${name}/**`);
  const files = await fg(patterns, {
    cwd: root,
    dot: false,
    absolute: true,
    caseSensitiveMatch: false,
    ignore,
  });
  const out: DiscoveredNovel[] = [];
  for (const abs of files) {
    try {
      const st = await fs.stat(abs);
      if (!st.isFile()) continue;
      const filePath = path.resolve(abs);
      out.push({ title: titleFromPath(filePath), filePath, size: st.size });
    } catch {
      /* ignore files removed mid-scan */
    }
  }
  return out.sort((a, b) => a.filePath.localeCompare(b.filePath));
}

/**
 * Add every discovered file that is not yet in the library.
 * @returns The newly created records, in path order.
 */
export async function importNovels(
  library: LibraryStore,
  root: string,
  opts: DiscoverOptions,
  verbose = false,
): Promise<Novel[]> {
  const found = await discoverNovels(root, opts);
  const added: Novel[] = [];
  for (const f of found) {
    if (library.findByPath(f.filePath)) continue;
    added.push(await library.add({ filePath: f.filePath, title: f.title }));
  }
  console.error(`[Reader] Import from ${root}: ${found.length} files found, ${added.length} added.`);
  if (verbose && added.length) {
    console.error(`[Reader][verbose] Added: ${added.map((n) => n.title).join(", ")}`);
  }
  return added;
}
