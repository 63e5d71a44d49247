import { describe, it, expect } from "vitest";
import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import { spawnSync } from "node:child_process";
import { fileURLToPath } from "node:url";

const repoRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..", "..");
const tsxBin = path.join(repoRoot, "node_modules", ".bin", "tsx");
const hookCli = path.join(repoRoot, "packages", "workgate-hook", "src", "cli.ts");
const adminCli = path.join(repoRoot, "packages", "workgate-hook", "src", "admin.ts");

async function makeTempProject(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "workgate-cli-"));
}

function run(script: string, projectRoot: string, input: string, args: string[] = []) {
  const res = spawnSync(tsxBin, [script, ...args], {
    input,
    encoding: "utf8",
    env: { ...process.env, WORKGATE_PROJECT_ROOT: projectRoot, WORKGATE_BYPASS: "" },
  });
  if (res.error) throw res.error;
  return res;
}

describe("workgate-hook CLI", () => {
  it("exits 0 for a read-only command", async () => {
    const root = await makeTempProject();
    const res = run(hookCli, root, JSON.stringify({ tool_name: "Bash", tool_input: { command: "git status" } }));
    expect(res.status).toBe(0);
    expect(res.stdout).toBe("");
  });

  it("exits 2 and prints the block on stdout", async () => {
    const root = await makeTempProject();
    const res = run(hookCli, root, JSON.stringify({ tool_name: "Bash", tool_input: { command: "rm -rf build" } }));
    expect(res.status).toBe(2);
    const out = JSON.parse(res.stdout);
    expect(out.decision).toBe("block");
    expect(out.category).toBe("write-in-discussion");
    expect(res.stderr).toContain("[workgate: blocked]");
  });

  it("exits 1 on malformed input", async () => {
    const root = await makeTempProject();
    const res = run(hookCli, root, "{");
    expect(res.status).toBe(1);
    expect(res.stdout).toBe("");
    expect(res.stderr).toContain("[workgate: fatal] Hook input is not valid JSON");
  });
});

describe("workgate operator CLI", () => {
  it("approves implementation so the hook allows edits", async () => {
    const root = await makeTempProject();
    const mode = run(adminCli, root, "", ["mode", "implementation"]);
    expect(mode.status).toBe(0);
    expect(mode.stdout.trim()).toBe("Mode: Implementation");

    const res = run(hookCli, root, JSON.stringify({ tool_name: "Bash", tool_input: { command: "rm -rf build" } }));
    expect(res.status).toBe(0);
  });
});
