import {writeFileSync} from "node:fs";
import {join} from "node:path";
import {afterEach, beforeEach, describe, expect, it} from "vitest";
import {
  launchCommandParts,
  launchExecutable,
  loadConfig,
  parseConfig,
  resolveConfigPath
} from "../src/config.js";
import {ConfigError} from "../src/errors.js";
import {createTempDir, type TempDir} from "./setup.js";

function configError(raw: string): ConfigError {
  try {
    parseConfig(raw);
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error("expected parseConfig to fail");
}

const TWO_WINDOWS = `
version = 1

[[tmux.windows]]
name = "editor"
program = "nvim"
args = ["."]

[[tmux.windows]]
name = "dev"
shell = ["/bin/zsh", "-lc"]
command = "pnpm dev"
`;

describe("parseConfig", () => {
  it("parses direct and shell windows in file order", () => {
    const config = parseConfig(TWO_WINDOWS);

    expect(config.version).toBe(1);
    expect(config.windows).toEqual([
      {name: "editor", launch: {mode: "direct", program: "nvim", args: ["."]}},
      {name: "dev", launch: {mode: "shell", shell: ["/bin/zsh", "-lc"], command: "pnpm dev"}}
    ]);
    expect(Object.isFrozen(config.windows)).toBe(true);
  });

  it("defaults direct args to an empty list", () => {
    const config = parseConfig(`version = 1\n[[tmux.windows]]\nname = "logs"\nprogram = "htop"\n`);
    expect(config.windows[0]?.launch).toEqual({mode: "direct", program: "htop", args: []});
  });

  it("rejects invalid TOML", () => {
    const error = configError("version = \n");
    expect(error.code).toBe("Parse");
  });

  it("rejects a missing or unsupported version", () => {
    expect(configError(`[[tmux.windows]]\nname = "a"\nprogram = "x"\n`).message).toBe(
      "invalid config: version must be 1 (found none)"
    );
    const error = configError(`version = 2\n`);
    expect(error.code).toBe("UnsupportedVersion");
    expect(error.message).toBe("invalid config: version must be 1 (found 2)");
  });

  it("rejects a config without windows", () => {
    const error = configError("version = 1\n");
    expect(error.code).toBe("EmptyWindowList");
    expect(error.message).toBe("invalid config: at least one tmux window must be configured");
  });

  it("rejects wrongly typed fields", () => {
    expect(configError(`version = 1\n[[tmux.windows]]\nname = "a"\nprogram = 3\n`).code).toBe("Parse");
  });

  it.each([
    [`name = "  "\nprogram = "x"`, "empty_name", "name must be non-empty"],
    [
      `name = "a"\nprogram = "x"\ncommand = "y"`,
      "mixed_modes",
      "must use exactly one launch mode (direct or shell), not both"
    ],
    [
      `name = "a"`,
      "missing_mode",
      "must define either direct mode (program/args) or shell mode (shell/command)"
    ],
    [`name = "a"\nargs = ["x"]`, "missing_program", "direct mode requires non-empty program"],
    [`name = "a"\ncommand = "y"`, "missing_shell", "shell mode requires shell field"],
    [`name = "a"\nshell = []\ncommand = "y"`, "missing_shell_executable", "shell mode requires shell[0] executable"],
    [`name = "a"\nshell = ["/bin/sh", "-c"]\ncommand = " "`, "missing_command", "shell mode requires non-empty command"]
  ])("reports %s as %s", (windowBody, reason, text) => {
    const raw = `version = 1\n[[tmux.windows]]\nname = "ok"\nprogram = "x"\n[[tmux.windows]]\n${windowBody}\n`;
    const error = configError(raw);

    expect(error.code).toBe("InvalidWindow");
    expect(error.index).toBe(1);
    expect(error.reason).toBe(reason);
    expect(error.message).toBe(`invalid config: window[1] ${text}`);
  });
});

describe("launch helpers", () => {
  it("builds argv for both modes", () => {
    expect(launchCommandParts({mode: "direct", program: "nvim", args: ["."]})).toEqual(["nvim", "."]);
    expect(
      launchCommandParts({mode: "shell", shell: ["/bin/zsh", "-lc"], command: "pnpm dev"})
    ).toEqual(["/bin/zsh", "-lc", "pnpm dev"]);
  });

  it("names the executable to look up", () => {
    expect(launchExecutable({mode: "direct", program: "nvim", args: []})).toBe("nvim");
    expect(launchExecutable({mode: "shell", shell: ["/bin/zsh"], command: "x"})).toBe("/bin/zsh");
  });
});

describe("resolveConfigPath", () => {
  it("prefers SESHMUX_CONFIG", () => {
    expect(resolveConfigPath({SESHMUX_CONFIG: "/tmp/custom.toml", HOME: "/home/dev"})).toBe(
      "/tmp/custom.toml"
    );
  });

  it("falls back to the home config directory", () => {
    expect(resolveConfigPath({HOME: "/home/dev"})).toBe("/home/dev/.config/seshmux/config.toml");
  });
});

describe("loadConfig", () => {
  let dir: TempDir;

  beforeEach(() => {
    dir = createTempDir("config");
  });

  afterEach(() => {
    dir.cleanup();
  });

  it("reads a config file", async () => {
    const path = join(dir.path, "config.toml");
    writeFileSync(path, TWO_WINDOWS);

    const config = await loadConfig(path);
    expect(config.windows.map((window) => window.name)).toEqual(["editor", "dev"]);
  });

  it("reports a missing file as unreadable", async () => {
    await expect(loadConfig(join(dir.path, "missing.toml"))).rejects.toMatchObject({
      code: "Unreadable"
    });
  });
});
