/**
 * Source → destination path mapping and job construction
 */

import { extname, isAbsolute, join, relative, sep } from "path";
import { PathError } from "./errors.ts";
import type { ClassifiedFiles } from "./classifier.ts";
import type { Job, JobKind } from "./types.ts";

export interface PathMapping {
  sourceRoot: string;
  destinationRoot: string;
  targetExtension: string;
}

/**
 * Mirror a source file into the destination tree.
 * Transcoded files get the target extension; copies keep their name.
 *
 * @throws PathError when sourcePath is not strictly inside sourceRoot
 */
export function mapDestination(sourcePath: string, kind: JobKind, mapping: PathMapping): string {
  const rel = relative(mapping.sourceRoot, sourcePath);
  if (rel === "" || rel === ".." || rel.startsWith(".." + sep) || isAbsolute(rel)) {
    throw new PathError(sourcePath, mapping.sourceRoot);
  }

  const mapped = join(mapping.destinationRoot, rel);
  if (kind === "copy") {
    return mapped;
  }
  const ext = extname(mapped);
  return mapped.slice(0, mapped.length - ext.length) + mapping.targetExtension;
}

export function createJob(sourcePath: string, kind: JobKind, mapping: PathMapping): Job {
  return Object.freeze({
    sourcePath,
    destinationPath: mapDestination(sourcePath, kind, mapping),
    kind,
  });
}

export interface BuiltJobs {
  jobs: Job[];
  /** Files that could not be mapped; each counts as a failed job */
  rejected: { sourcePath: string; kind: JobKind; error: PathError }[];
}

/**
 * Turn classified files into jobs, transcodes first
 */
export function buildJobs(files: ClassifiedFiles, mapping: PathMapping): BuiltJobs {
  const built: BuiltJobs = { jobs: [], rejected: [] };

  const add = (sourcePath: string, kind: JobKind) => {
    try {
      built.jobs.push(createJob(sourcePath, kind, mapping));
    } catch (error) {
      if (!(error instanceof PathError)) throw error;
      built.rejected.push({ sourcePath, kind, error });
    }
  };

  for (const file of files.transcode) add(file, "transcode");
  for (const file of files.copy) add(file, "copy");

  return built;
}
