import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { main, parseArgs, VERSION } from "../../src/cli/index.js";
import { nestedOutput } from "../../src/cli/commands/build.js";

describe("CLI argument parsing", () => {
  test("no args means no command", () => {
    const result = parseArgs([]);
    expect(result.command).toBeNull();
    expect(result.source).toBeNull();
    expect(result.dest).toBe("public");
    expect(result.errors).toEqual([]);
  });

  test("parses build with a source", () => {
    const result = parseArgs(["build", "site"]);
    expect(result.command).toBe("build");
    expect(result.source).toBe("site");
  });

  test("parses --dest with a separate value", () => {
    expect(parseArgs(["build", "site", "--dest", "out"]).dest).toBe("out");
    expect(parseArgs(["build", "site", "-d", "out"]).dest).toBe("out");
  });

  test("parses --key=value style args", () => {
    const result = parseArgs(["build", "site", "--dest=out", "--metadata=meta.json"]);
    expect(result.dest).toBe("out");
    expect(result.metadataFile).toBe("meta.json");
  });

  test("parses flags", () => {
    const result = parseArgs(["build", "site", "--force", "-v"]);
    expect(result.force).toBe(true);
    expect(result.verbose).toBe(true);
  });

  test("parses --help and --version", () => {
    expect(parseArgs(["-h"]).help).toBe(true);
    expect(parseArgs(["--version"]).version).toBe(true);
  });

  test("reports a missing option value", () => {
    expect(parseArgs(["build", "site", "--dest"]).errors).toEqual(["Missing value for --dest"]);
    expect(parseArgs(["build", "site", "-d", "--force"]).errors).toEqual(["Missing value for -d"]);
  });

  test("reports unknown options and commands", () => {
    expect(parseArgs(["--watch"]).errors).toEqual(["Unknown option: --watch"]);
    expect(parseArgs(["serve"]).errors).toEqual(["Unknown command: serve"]);
  });

  test("reports extra arguments", () => {
    expect(parseArgs(["build", "a", "b"]).errors).toEqual(["Unexpected argument: b"]);
  });
});

describe("nestedOutput", () => {
  const site = join(tmpdir(), "site");

  test("an output directory inside the source is excluded", () => {
    expect(nestedOutput(site, join(site, "public"))).toEqual(["public"]);
    expect(nestedOutput(site, join(site, "out", "www"))).toEqual(["out/www"]);
  });

  test("an output directory elsewhere is not", () => {
    expect(nestedOutput(site, join(tmpdir(), "public"))).toEqual([]);
    expect(nestedOutput(site, join(tmpdir(), "site-public"))).toEqual([]);
  });

  test("the source directory itself is not", () => {
    expect(nestedOutput(site, site)).toEqual([]);
  });
});

describe("main", () => {
  let dir: string;
  let stdout: string[];
  let stderr: string[];

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "orgsite-cli-"));
    stdout = [];
    stderr = [];
    vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
      stdout.push(args.join(" "));
    });
    vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
      stderr.push(args.join(" "));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  test("--version prints the version", async () => {
    expect(await main(["--version"], dir)).toBe(0);
    expect(stdout).toEqual([`orgsite ${VERSION}`]);
  });

  test("--help exits successfully", async () => {
    expect(await main(["--help"], dir)).toBe(0);
    expect(stdout[0]).toContain("Usage: orgsite build <source> [options]");
  });

  test("no command prints help and fails", async () => {
    expect(await main([], dir)).toBe(1);
    expect(stdout[0]).toContain("Usage: orgsite build <source> [options]");
  });

  test("argument errors fail", async () => {
    expect(await main(["build", "site", "--bogus"], dir)).toBe(1);
    expect(stderr).toEqual([
      "Error: Unknown option: --bogus",
      "Run 'orgsite --help' for usage information",
    ]);
  });

  test("a missing source directory fails", async () => {
    expect(await main(["build", "missing"], dir)).toBe(1);
    expect(stderr).toEqual([`Error: source directory ${join(dir, "missing")} not found`]);
  });

  test("a source directory without configuration fails", async () => {
    expect(await main(["build", "."], dir)).toBe(1);
    expect(stderr).toHaveLength(1);
    expect(stderr[0]).toContain("orgsite.yaml");
  });
});
