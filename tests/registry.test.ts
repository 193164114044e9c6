import * as fsp from "node:fs/promises";
import {existsSync, mkdirSync, readFileSync, writeFileSync} from "node:fs";
import {join} from "node:path";
import {afterEach, beforeEach, describe, expect, it} from "vitest";
import {RegistryError} from "../src/errors.js";
import {
  DEFAULT_ALWAYS_SKIP_BUCKETS,
  WorktreeRegistry,
  normalizeBuckets,
  type RegistryFs
} from "../src/registry.js";
import {createTempDir, type TempDir} from "./setup.js";

const record = (name: string, root: string) => ({
  name,
  path: join(root, "worktrees", name),
  createdAt: "2026-01-02T03:04:05.000Z"
});

async function rejection(promise: Promise<unknown>): Promise<RegistryError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof RegistryError) return error;
    throw error;
  }
  throw new Error("expected a RegistryError");
}

describe("WorktreeRegistry", () => {
  let dir: TempDir;
  let registry: WorktreeRegistry;

  beforeEach(() => {
    dir = createTempDir("registry");
    registry = new WorktreeRegistry(dir.path);
  });

  afterEach(() => {
    dir.cleanup();
  });

  it("treats a missing file as an empty registry without creating it", async () => {
    expect(await registry.list()).toEqual([]);
    expect((await registry.extras()).alwaysSkipBuckets).toEqual([...DEFAULT_ALWAYS_SKIP_BUCKETS]);
    expect(existsSync(registry.path)).toBe(false);
  });

  it("stores the file under worktrees/worktree.toml", () => {
    expect(registry.path).toBe(join(dir.path, "worktrees", "worktree.toml"));
  });

  it("inserts and lists records in insertion order", async () => {
    await registry.insert(record("beta", dir.path));
    await registry.insert(record("alpha", dir.path));

    expect(await registry.list()).toEqual([record("beta", dir.path), record("alpha", dir.path)]);
    expect(await registry.find("alpha")).toEqual(record("alpha", dir.path));
    expect(await registry.find("gamma")).toBeUndefined();
  });

  it("reads what another instance wrote", async () => {
    await registry.insert(record("shared", dir.path));
    expect(await new WorktreeRegistry(dir.path).list()).toEqual([record("shared", dir.path)]);
  });

  it("rejects duplicate names and paths without touching the file", async () => {
    await registry.insert(record("feature", dir.path));
    const before = readFileSync(registry.path, "utf-8");

    const byName = await rejection(
      registry.insert({...record("feature", dir.path), path: "/elsewhere"})
    );
    expect(byName.code).toBe("DuplicateName");
    expect(byName.message).toBe("worktree registry already contains name 'feature'");

    const byPath = await rejection(
      registry.insert({...record("other", dir.path), path: record("feature", dir.path).path})
    );
    expect(byPath.code).toBe("DuplicatePath");

    expect(readFileSync(registry.path, "utf-8")).toBe(before);
  });

  it("checks availability without writing", async () => {
    await registry.ensureAvailable("fresh", join(dir.path, "worktrees", "fresh"));
    expect(existsSync(registry.path)).toBe(false);

    await registry.insert(record("taken", dir.path));
    expect((await rejection(registry.ensureAvailable("taken", "/x"))).code).toBe("DuplicateName");
  });

  it("removes a record and reports unknown names", async () => {
    await registry.insert(record("one", dir.path));
    await registry.insert(record("two", dir.path));

    expect(await registry.remove("one")).toEqual(record("one", dir.path));
    expect(await registry.list()).toEqual([record("two", dir.path)]);

    const missing = await rejection(registry.remove("one"));
    expect(missing.code).toBe("NotFound");
    expect(missing.message).toBe("worktree 'one' was not found in worktree.toml");
  });

  it("reloads an emptied registry", async () => {
    await registry.insert(record("only", dir.path));
    await registry.remove("only");

    expect(await registry.list()).toEqual([]);
  });

  it("persists normalized skip buckets, keeping an explicit empty list", async () => {
    await registry.saveAlwaysSkipBuckets([" node_modules ", "dist", "node_modules", ""]);
    expect((await registry.extras()).alwaysSkipBuckets).toEqual(["dist", "node_modules"]);

    await registry.saveAlwaysSkipBuckets([]);
    expect((await registry.extras()).alwaysSkipBuckets).toEqual([]);
  });

  it("keeps records when saving skip buckets", async () => {
    await registry.insert(record("kept", dir.path));
    await registry.saveAlwaysSkipBuckets(["target"]);

    expect(await registry.list()).toEqual([record("kept", dir.path)]);
  });

  it("leaves the previous file intact when the process dies before the rename", async () => {
    await registry.insert(record("stable", dir.path));
    const before = readFileSync(registry.path, "utf-8");

    const crashing: RegistryFs = {
      readFile: (path, encoding) => fsp.readFile(path, encoding),
      writeFile: (path, data, encoding) => fsp.writeFile(path, data, encoding),
      rename: async () => {
        throw new Error("simulated crash");
      },
      mkdir: (path, options) => fsp.mkdir(path, options)
    };
    const broken = new WorktreeRegistry(dir.path, crashing);

    const error = await rejection(broken.insert(record("lost", dir.path)));
    expect(error.code).toBe("Write");
    expect(readFileSync(registry.path, "utf-8")).toBe(before);
    expect(await registry.list()).toEqual([record("stable", dir.path)]);
  });

  describe("schema validation", () => {
    function writeRegistry(content: string): void {
      mkdirSync(join(dir.path, "worktrees"), {recursive: true});
      writeFileSync(registry.path, content);
    }

    it("reports a missing version", async () => {
      writeRegistry("worktree = []\n[settings.extras]\n");
      const error = await rejection(registry.list());
      expect(error.code).toBe("InvalidSchema");
      expect(error.message).toBe(
        "invalid worktree registry schema: missing required top-level field 'version'"
      );
    });

    it("reports an unsupported version", async () => {
      writeRegistry("version = 2\nworktree = []\n[settings.extras]\n");
      expect((await rejection(registry.list())).message).toBe(
        "invalid worktree registry schema: unsupported version (expected 1, found 2)"
      );
    });

    it("reports a missing extras section", async () => {
      writeRegistry("version = 1\nworktree = []\n");
      expect((await rejection(registry.list())).message).toBe(
        "invalid worktree registry schema: missing required section [settings.extras]"
      );
    });

    it("reports a missing entries section", async () => {
      writeRegistry("version = 1\n[settings.extras]\n");
      expect((await rejection(registry.list())).message).toBe(
        "invalid worktree registry schema: missing required [[worktree]] entries section"
      );
    });

    it("reports invalid TOML and wrong field types as parse errors", async () => {
      writeRegistry("version = [\n");
      expect((await rejection(registry.list())).code).toBe("Parse");

      writeRegistry(
        'version = 1\n[settings.extras]\n[[worktree]]\nname = "a"\npath = 5\ncreated_at = "x"\n'
      );
      expect((await rejection(registry.list())).code).toBe("Parse");
    });
  });
});

describe("normalizeBuckets", () => {
  it("trims, de-duplicates and sorts", () => {
    expect(normalizeBuckets(["b", " a", "b ", "  "])).toEqual(["a", "b"]);
  });
});
