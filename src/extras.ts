import type {Stats} from "node:fs";
import {copyFile, lstat, mkdir, readdir} from "node:fs/promises";
import {dirname, join, posix} from "node:path";
import {ExtrasError, errorMessage} from "./errors.js";
import type {GitClient} from "./git.js";
import {isInsideWorktreesDir} from "./worktree.js";

/**
 * Normalize a repository-relative path reported by git. Absolute paths and
 * paths escaping the repository are rejected.
 */
export function normalizeExtraPath(path: string): string {
  const forward = path.replace(/\\/g, "/");
  if (forward.startsWith("/")) {
    throw new ExtrasError("InvalidPath", `extra path must be relative: ${path}`);
  }
  const segments: string[] = [];
  for (const segment of forward.split("/")) {
    if (segment === "" || segment === ".") continue;
    if (segment === "..") {
      throw new ExtrasError("InvalidPath", `extra path must stay inside repository: ${path}`);
    }
    segments.push(segment);
  }
  if (segments.length === 0) {
    throw new ExtrasError("InvalidPath", `extra path is empty: ${path}`);
  }
  return segments.join("/");
}

async function isSymlinkOrMissing(path: string): Promise<boolean> {
  try {
    return (await lstat(path)).isSymbolicLink();
  } catch (error) {
    if (error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return true;
    }
    throw error;
  }
}

/**
 * Untracked and ignored paths that could be carried into a new worktree.
 * Directories git collapses (`--directory`) are reported as a single entry.
 * Listed with `-z` so names git would C-quote arrive as they are on disk.
 */
export async function listExtraCandidates(git: GitClient, repoRoot: string): Promise<string[]> {
  const untracked = await git.nulEntries(repoRoot, [
    "ls-files",
    "-z",
    "--others",
    "--exclude-standard",
    "--directory"
  ]);
  const ignored = await git.nulEntries(repoRoot, [
    "ls-files",
    "-z",
    "--others",
    "--ignored",
    "--exclude-standard",
    "--directory"
  ]);

  const candidates = new Set<string>();
  for (const entry of [...untracked, ...ignored]) {
    const normalized = normalizeExtraPath(entry);
    if (isInsideWorktreesDir(normalized)) continue;
    if (await isSymlinkOrMissing(join(repoRoot, normalized))) continue;
    candidates.add(normalized);
  }
  return [...candidates].sort();
}

function containsSegments(haystack: string[], needle: string[]): boolean {
  if (needle.length === 0 || needle.length > haystack.length) return false;
  for (let start = 0; start + needle.length <= haystack.length; start++) {
    if (needle.every((segment, offset) => haystack[start + offset] === segment)) {
      return true;
    }
  }
  return false;
}

/**
 * Drop candidates that live in (or are) a skip bucket. A bucket matches
 * anywhere in the path: `node_modules` also hides `web/node_modules`.
 */
export function filterSkipped(candidates: readonly string[], buckets: readonly string[]): string[] {
  const bucketSegments = buckets
    .map((bucket) => bucket.split("/").filter((segment) => segment.length > 0))
    .filter((segments) => segments.length > 0);
  return candidates.filter((candidate) => {
    const segments = candidate.split("/");
    return !bucketSegments.some((bucket) => containsSegments(segments, bucket));
  });
}

async function copyPath(repoRoot: string, relative: string, targetRoot: string): Promise<void> {
  if (isInsideWorktreesDir(relative)) return;

  const source = join(repoRoot, relative);
  const target = join(targetRoot, relative);

  let stats: Stats;
  try {
    stats = await lstat(source);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return;
    throw new ExtrasError("Copy", `failed to copy extra from ${source}: ${errorMessage(error)}`, error);
  }

  try {
    if (stats.isSymbolicLink()) return;
    if (stats.isDirectory()) {
      await mkdir(target, {recursive: true});
      for (const child of await readdir(source)) {
        await copyPath(repoRoot, posix.join(relative, child), targetRoot);
      }
      return;
    }
    if (stats.isFile()) {
      await mkdir(dirname(target), {recursive: true});
      await copyFile(source, target);
    }
  } catch (error) {
    if (error instanceof ExtrasError) throw error;
    throw new ExtrasError(
      "Copy",
      `failed to copy extra from ${source} to ${target}: ${errorMessage(error)}`,
      error
    );
  }
}

export async function copyExtras(
  repoRoot: string,
  targetRoot: string,
  selected: readonly string[]
): Promise<void> {
  for (const entry of selected) {
    await copyPath(repoRoot, normalizeExtraPath(entry), targetRoot);
  }
}
