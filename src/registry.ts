import * as fsp from "node:fs/promises";
import {dirname, join} from "node:path";
import {parse as parseToml, stringify as stringifyToml} from "smol-toml";
import {z} from "zod";
import {RegistryError, errorMessage} from "./errors.js";
import {worktreesDir, type RegistrySettings, type WorktreeRecord} from "./worktree.js";

export const REGISTRY_VERSION = 1;
export const REGISTRY_FILE = "worktree.toml";

export const DEFAULT_ALWAYS_SKIP_BUCKETS: readonly string[] = [
  "target",
  "node_modules",
  ".next",
  ".nuxt",
  ".svelte-kit",
  "dist",
  "build",
  "out",
  "coverage",
  ".cache",
  "__pycache__",
  ".pytest_cache",
  ".mypy_cache",
  ".ruff_cache",
  ".tox",
  ".nox",
  ".venv",
  "venv",
  "vendor",
  "vendor/bundle",
  ".gradle",
  "DerivedData",
  "Pods",
  "Carthage",
  ".terraform",
  ".serverless",
  "cdk.out",
  ".dart_tool"
];

/**
 * Filesystem operations the registry needs. Injectable so tests can fail a
 * write part-way through.
 */
export interface RegistryFs {
  readFile(path: string, encoding: "utf-8"): Promise<string>;
  writeFile(path: string, data: string, encoding: "utf-8"): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  mkdir(path: string, options: {recursive: true}): Promise<unknown>;
}

const nodeFs: RegistryFs = {
  readFile: (path, encoding) => fsp.readFile(path, encoding),
  writeFile: (path, data, encoding) => fsp.writeFile(path, data, encoding),
  rename: (from, to) => fsp.rename(from, to),
  mkdir: (path, options) => fsp.mkdir(path, options)
};

export interface Registry {
  version: typeof REGISTRY_VERSION;
  /** Undefined when the file never configured the list. */
  alwaysSkipBuckets?: string[];
  worktrees: WorktreeRecord[];
}

const integer = z.union([z.number().int(), z.bigint()]).transform(Number);

const registryFileSchema = z.object({
  version: integer,
  settings: z.object({
    extras: z.object({
      always_skip_buckets: z.array(z.string()).optional()
    })
  }),
  worktree: z.array(
    z.object({
      name: z.string().min(1),
      path: z.string().min(1),
      created_at: z.string()
    })
  )
});

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function schemaError(detail: string): RegistryError {
  return new RegistryError("InvalidSchema", `invalid worktree registry schema: ${detail}`);
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

export function normalizeBuckets(values: readonly string[]): string[] {
  const cleaned = values.map((value) => value.trim()).filter((value) => value.length > 0);
  return [...new Set(cleaned)].sort();
}

export function registryPath(repoRoot: string): string {
  return join(worktreesDir(repoRoot), REGISTRY_FILE);
}

/**
 * Persisted record of the worktrees seshmux created in one repository.
 *
 * Every call reads the file afresh, so a uniqueness check always sees what
 * another process wrote last. Mutations write a temp file and rename it over
 * the registry; a failure before the rename leaves the previous file intact.
 */
export class WorktreeRegistry {
  readonly path: string;

  constructor(
    readonly repoRoot: string,
    private readonly fs: RegistryFs = nodeFs
  ) {
    this.path = registryPath(repoRoot);
  }

  async load(): Promise<Registry> {
    let raw: string;
    try {
      raw = await this.fs.readFile(this.path, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return {version: REGISTRY_VERSION, worktrees: []};
      }
      throw new RegistryError(
        "Unreadable",
        `failed to read registry at ${this.path}: ${errorMessage(error)}`,
        error
      );
    }

    let document: Record<string, unknown>;
    try {
      document = parseToml(raw);
    } catch (error) {
      throw new RegistryError(
        "Parse",
        `failed to parse registry at ${this.path}: ${errorMessage(error)}`,
        error
      );
    }

    this.validateShape(document);

    const parsed = registryFileSchema.safeParse(document);
    if (!parsed.success) {
      const [issue] = parsed.error.issues;
      const where = issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid registry";
      throw new RegistryError("Parse", `failed to parse registry at ${this.path}: ${where}`);
    }

    const {settings, worktree} = parsed.data;
    return {
      version: REGISTRY_VERSION,
      alwaysSkipBuckets: settings.extras.always_skip_buckets,
      worktrees: worktree.map((entry) => ({
        name: entry.name,
        path: entry.path,
        createdAt: entry.created_at
      }))
    };
  }

  async list(): Promise<WorktreeRecord[]> {
    return (await this.load()).worktrees;
  }

  async find(name: string): Promise<WorktreeRecord | undefined> {
    return (await this.list()).find((record) => record.name === name);
  }

  async extras(): Promise<RegistrySettings> {
    const {alwaysSkipBuckets} = await this.load();
    return {
      alwaysSkipBuckets:
        alwaysSkipBuckets === undefined
          ? [...DEFAULT_ALWAYS_SKIP_BUCKETS]
          : normalizeBuckets(alwaysSkipBuckets)
    };
  }

  async ensureAvailable(name: string, path: string): Promise<void> {
    this.ensureUnique((await this.load()).worktrees, name, path);
  }

  async insert(record: WorktreeRecord): Promise<void> {
    const registry = await this.load();
    this.ensureUnique(registry.worktrees, record.name, record.path);
    await this.persist({...registry, worktrees: [...registry.worktrees, {...record}]});
  }

  async remove(name: string): Promise<WorktreeRecord> {
    const registry = await this.load();
    const removed = registry.worktrees.find((record) => record.name === name);
    if (!removed) {
      throw new RegistryError("NotFound", `worktree '${name}' was not found in ${REGISTRY_FILE}`);
    }
    await this.persist({
      ...registry,
      worktrees: registry.worktrees.filter((record) => record.name !== name)
    });
    return removed;
  }

  async saveAlwaysSkipBuckets(buckets: readonly string[]): Promise<void> {
    const registry = await this.load();
    await this.persist({...registry, alwaysSkipBuckets: normalizeBuckets(buckets)});
  }

  private ensureUnique(records: WorktreeRecord[], name: string, path: string): void {
    if (records.some((record) => record.name === name)) {
      throw new RegistryError(
        "DuplicateName",
        `worktree registry already contains name '${name}'`
      );
    }
    if (records.some((record) => record.path === path)) {
      throw new RegistryError(
        "DuplicatePath",
        `worktree registry already contains path '${path}'`
      );
    }
  }

  private validateShape(document: Record<string, unknown>): void {
    if (!("version" in document)) {
      throw schemaError("missing required top-level field 'version'");
    }
    const version = integer.safeParse(document.version);
    if (!version.success) {
      throw schemaError("unsupported version (expected integer)");
    }
    if (version.data !== REGISTRY_VERSION) {
      throw schemaError(
        `unsupported version (expected ${REGISTRY_VERSION}, found ${version.data})`
      );
    }
    const settings = document.settings;
    if (!isTable(settings) || !isTable(settings.extras)) {
      throw schemaError("missing required section [settings.extras]");
    }
    if (!Array.isArray(document.worktree)) {
      throw schemaError("missing required [[worktree]] entries section");
    }
  }

  private serialize(registry: Registry): string {
    const lines = [`version = ${REGISTRY_VERSION}`];
    // An empty array of tables would vanish from stringified output, and a
    // top-level key must precede the first table header.
    if (registry.worktrees.length === 0) {
      lines.push("worktree = []");
    }
    lines.push("", "[settings.extras]");
    if (registry.alwaysSkipBuckets !== undefined) {
      // JSON string arrays are valid TOML arrays.
      lines.push(`always_skip_buckets = ${JSON.stringify(registry.alwaysSkipBuckets)}`);
    }
    if (registry.worktrees.length > 0) {
      lines.push(
        "",
        stringifyToml({
          worktree: registry.worktrees.map((record) => ({
            name: record.name,
            path: record.path,
            created_at: record.createdAt
          }))
        })
      );
    }
    return `${lines.join("\n")}\n`;
  }

  private async persist(registry: Registry): Promise<void> {
    const serialized = this.serialize(registry);
    const tempPath = `${this.path}.tmp`;
    try {
      await this.fs.mkdir(dirname(this.path), {recursive: true});
      await this.fs.writeFile(tempPath, serialized, "utf-8");
      await this.fs.rename(tempPath, this.path);
    } catch (error) {
      throw new RegistryError(
        "Write",
        `failed to write registry at ${this.path}: ${errorMessage(error)}`,
        error
      );
    }
  }
}
