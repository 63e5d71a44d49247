import { describe, it, expect } from "vitest";
import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import { CorruptedDocumentError } from "../src/errors.js";
import { getPaths, relativeInside, resolveProjectRoot } from "../src/paths.js";
import { defaultPolicy, isWorkArtifactPath, loadPolicy, parsePolicy } from "../src/policy.js";

async function tempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

describe("loadPolicy", () => {
  it("falls back to defaults without a config file", async () => {
    const root = await tempDir("workgate-policy-");
    expect(await loadPolicy(root, {})).toEqual(defaultPolicy());
  });

  it("merges a partial config over the defaults", async () => {
    const root = await tempDir("workgate-policy-");
    const { configPath } = getPaths(root, {});
    await fs.mkdir(path.dirname(configPath), { recursive: true });
    await fs.writeFile(
      configPath,
      JSON.stringify({ extrasafe: false, triggerPhrases: { implementation: ["ship it"] }, toolNames: { shell: "Shell" } }),
      "utf8",
    );
    const policy = await loadPolicy(root, {});
    expect(policy.extrasafe).toBe(false);
    expect(policy.triggerPhrases.implementation).toEqual(["ship it"]);
    expect(policy.triggerPhrases.discussion).toEqual(["STOP", "SILENCE"]);
    expect(policy.toolNames).toEqual({ shell: "Shell", workItems: "TodoWrite", enterPlan: "EnterPlanMode", exitPlan: "ExitPlanMode" });
  });

  it("reads the config path from WORKGATE_CONFIG_PATH", async () => {
    const root = await tempDir("workgate-policy-");
    await fs.writeFile(path.join(root, "gate.json"), JSON.stringify({ branchEnforcement: false }), "utf8");
    const policy = await loadPolicy(root, { WORKGATE_CONFIG_PATH: "gate.json" });
    expect(policy.branchEnforcement).toBe(false);
  });
});

describe("parsePolicy", () => {
  it("ignores unknown keys", () => {
    expect(parsePolicy(JSON.stringify({ colour: "blue" }), "config.json")).toEqual(defaultPolicy());
  });

  it("rejects invalid JSON and wrong types", () => {
    expect(() => parsePolicy("{", "config.json")).toThrow(CorruptedDocumentError);
    expect(() => parsePolicy(JSON.stringify({ extrasafe: "yes" }), "config.json")).toThrow(
      "Policy file config.json is corrupted: extrasafe: Expected boolean, received string",
    );
  });
});

describe("isWorkArtifactPath", () => {
  const policy = defaultPolicy();

  it("matches the artifact globs relative to the project root", () => {
    expect(isWorkArtifactPath(policy, "/work/app", "/work/app/docs/design.md")).toBe(true);
    expect(isWorkArtifactPath(policy, "/work/app", "plans/q3/roadmap.md")).toBe(true);
    expect(isWorkArtifactPath(policy, "/work/app", ".claude/settings.json")).toBe(true);
    expect(isWorkArtifactPath(policy, "/work/app", "src/docs/readme.md")).toBe(false);
    expect(isWorkArtifactPath(policy, "/work/app", "/elsewhere/docs/x.md")).toBe(false);
  });
});

describe("paths", () => {
  it("computes paths relative to the project", () => {
    expect(relativeInside("/work/app", "/work/app/.workgate/state.json")).toBe(".workgate/state.json");
    expect(relativeInside("/work/app", "/work/app")).toBe("");
    expect(relativeInside("/work/app", "/work/other")).toBeNull();
  });

  it("prefers the nearest ancestor holding a .workgate directory", async () => {
    const root = await tempDir("workgate-root-");
    const nested = path.join(root, "packages", "core");
    await fs.mkdir(path.join(root, ".workgate"), { recursive: true });
    await fs.mkdir(nested, { recursive: true });
    expect(await resolveProjectRoot(nested, {})).toBe(root);
  });

  it("uses WORKGATE_PROJECT_ROOT before anything else", async () => {
    const root = await tempDir("workgate-root-");
    const other = await tempDir("workgate-other-");
    expect(await resolveProjectRoot(other, { WORKGATE_PROJECT_ROOT: root })).toBe(root);
  });

  it("skips a WORKGATE_PROJECT_ROOT that is not a directory", async () => {
    const dir = await tempDir("workgate-cwd-");
    expect(await resolveProjectRoot(dir, { WORKGATE_PROJECT_ROOT: path.join(dir, "missing") })).toBe(dir);
    expect(await resolveProjectRoot(dir, { WORKGATE_PROJECT_ROOT: "  " })).toBe(dir);
  });

  it("falls back to the request cwd", async () => {
    const dir = await tempDir("workgate-cwd-");
    expect(await resolveProjectRoot(dir, {})).toBe(dir);
  });
});
