/**
 * Source tree discovery.
 *
 * Splits every regular file under a root into files to transcode (by
 * extension, case-insensitive) and files to copy. Symlinks are not
 * followed and never returned.
 */

import { readdir, stat } from "fs/promises";
import { extname, join, relative, isAbsolute, sep } from "path";
import { ConfigError } from "./errors.ts";

export interface ClassifiedFiles {
  transcode: string[];
  copy: string[];
}

export interface ClassifyOptions {
  sourceExtension: string;
  /** Directories never descended into, e.g. a destination nested in the source */
  exclude?: string[];
}

function isInside(child: string, parent: string): boolean {
  const rel = relative(parent, child);
  return rel === "" || (rel !== ".." && !rel.startsWith(".." + sep) && !isAbsolute(rel));
}

export async function classifyTree(root: string, options: ClassifyOptions): Promise<ClassifiedFiles> {
  const rootStat = await stat(root).catch(() => null);
  if (!rootStat?.isDirectory()) {
    throw new ConfigError(`Source directory '${root}' does not exist or is not a directory`);
  }

  const wanted = options.sourceExtension.toLowerCase();
  const exclude = options.exclude ?? [];
  const result: ClassifiedFiles = { transcode: [], copy: [] };

  async function walk(dir: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!exclude.some((excluded) => isInside(fullPath, excluded))) {
          await walk(fullPath);
        }
      } else if (entry.isFile()) {
        if (extname(entry.name).toLowerCase() === wanted) {
          result.transcode.push(fullPath);
        } else {
          result.copy.push(fullPath);
        }
      }
    }
  }

  await walk(root);

  // Stable order for reproducible dry runs
  result.transcode.sort();
  result.copy.sort();
  return result;
}
