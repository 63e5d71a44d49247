import { describe, it, expect } from "vitest";
import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import { MalformedInputError } from "../src/errors.js";
import type { GitCapability } from "../src/git.js";
import { afterToolUse, mediate, targetPath, type MediatorContext } from "../src/mediator.js";
import { defaultPolicy } from "../src/policy.js";
import { defaultState, MemoryStateHandle, type SessionState, type WorkItem } from "../src/stateStore.js";

const noGit: GitCapability = {
  async currentBranch() {
    throw new Error("git should not be consulted");
  },
};

async function context(state: SessionState, git: GitCapability = noGit): Promise<MediatorContext> {
  const projectRoot = await fs.mkdtemp(path.join(os.tmpdir(), "workgate-mediate-"));
  return { projectRoot, policy: defaultPolicy(), state: new MemoryStateHandle(state), git, env: {} };
}

const item: WorkItem = { content: "Add login form", status: "in_progress" };

function implementing(active: WorkItem[] = [item]): SessionState {
  return { ...defaultState(), mode: "implementation", workItems: { active, stashed: [] } };
}

describe("mediate in Discussion mode", () => {
  it("allows read-only shell commands", async () => {
    const ctx = await context(defaultState());
    expect(await mediate({ tool: "Bash", input: { command: "git status" } }, ctx)).toEqual({ outcome: "allow", notes: [] });
  });

  it("blocks write-like shell commands with approval guidance", async () => {
    const ctx = await context(defaultState());
    const decision = await mediate({ tool: "Bash", input: { command: "rm -rf dist" } }, ctx);
    expect(decision).toEqual({
      outcome: "block",
      category: "write-in-discussion",
      reason: "[Discussion Mode] Shell command blocked: rm is a write-like command.",
      remediation:
        'Propose the change and wait for approval. To start implementing, the user should say one of: "make it so", "run that", "go ahead".',
      mode: "discussion",
      blockedTool: "Bash",
      notes: [],
    });
  });

  it("blocks editor tools", async () => {
    const ctx = await context(defaultState());
    const decision = await mediate({ tool: "Edit", input: { file_path: "src/app.ts" } }, ctx);
    expect(decision.outcome).toBe("block");
    if (decision.outcome !== "block") return;
    expect(decision.category).toBe("tool-blocked");
    expect(decision.reason).toBe("[Discussion Mode] Edit is blocked outside Implementation mode.");
  });

  it("lets editor tools touch work artifacts", async () => {
    const ctx = await context(defaultState());
    const decision = await mediate({ tool: "Write", input: { file_path: "docs/plan.md" } }, ctx);
    expect(decision).toEqual({ outcome: "allow", notes: ["[workgate] Write allowed on work artifact docs/plan.md."] });
  });

  it("allows tools the policy does not gate", async () => {
    const ctx = await context(defaultState());
    expect((await mediate({ tool: "Read", input: { file_path: "src/app.ts" } }, ctx)).outcome).toBe("allow");
  });

  it("rejects a shell call without a command", async () => {
    const ctx = await context(defaultState());
    await expect(mediate({ tool: "Bash", input: {} }, ctx)).rejects.toBeInstanceOf(MalformedInputError);
  });
});

describe("mediate in Plan mode", () => {
  it("names plan mode in the block", async () => {
    const ctx = await context({ ...defaultState(), mode: "plan", plan: { previousMode: "discussion", stashedCount: 0 } });
    const decision = await mediate({ tool: "Bash", input: { command: "touch x" } }, ctx);
    expect(decision.outcome).toBe("block");
    if (decision.outcome !== "block") return;
    expect(decision.reason).toBe("[Plan Mode] Shell command blocked: touch is a write-like command.");
    expect(decision.remediation).toMatch(/^Finish the plan and exit plan mode first\./);
  });

  it("moves in and out of plan mode and keeps the work items", async () => {
    const ctx = await context(implementing());
    const entered = await mediate({ tool: "EnterPlanMode", input: {} }, ctx);
    expect(entered).toEqual({
      outcome: "allow",
      notes: ["[Plan Mode] Entered from Implementation mode."],
      transition: { event: "enterPlan", from: "implementation", to: "plan" },
    });
    expect((await ctx.state.load()).workItems).toEqual({ active: [], stashed: [item] });

    const exited = await mediate({ tool: "ExitPlanMode", input: {} }, ctx);
    expect(exited.notes).toEqual(["[Plan Mode] Exited; now in Implementation mode."]);
    const state = await ctx.state.load();
    expect(state.mode).toBe("implementation");
    expect(state.workItems.active).toEqual([item]);
  });
});

describe("mediate in Implementation mode", () => {
  it("allows writes when no task is recorded", async () => {
    const ctx = await context(implementing());
    expect(await mediate({ tool: "Bash", input: { command: "rm -rf dist" } }, ctx)).toEqual({ outcome: "allow", notes: [] });
    expect(await mediate({ tool: "Edit", input: { file_path: "src/app.ts" } }, ctx)).toEqual({ outcome: "allow", notes: [] });
  });

  it("blocks a changed work-item list and resets to discussion", async () => {
    const ctx = await context(implementing());
    const decision = await mediate(
      { tool: "TodoWrite", input: { todos: [{ content: "Something else", status: "pending" }] } },
      ctx,
    );
    expect(decision.outcome).toBe("block");
    if (decision.outcome !== "block") return;
    expect(decision.category).toBe("scope-violation");
    expect(decision.mode).toBe("discussion");
    expect(decision.transition).toEqual({ event: "scopeViolation", from: "implementation", to: "discussion" });
    expect((await ctx.state.load()).mode).toBe("discussion");
  });

  it("stores an unchanged work-item list", async () => {
    const ctx = await context(implementing());
    const decision = await mediate({ tool: "TodoWrite", input: { todos: [item] } }, ctx);
    expect(decision).toEqual({ outcome: "allow", notes: ["[workgate] stored 1 work item(s)."] });
  });

  it("enforces the task branch for file edits", async () => {
    const git: GitCapability = { currentBranch: async () => "main" };
    const ctx = await context(
      { ...implementing(), currentTask: { branch: "feature/login", repositories: [] } },
      git,
    );
    await fs.mkdir(path.join(ctx.projectRoot, ".git"));
    const decision = await mediate({ tool: "Edit", input: { file_path: "src/app.ts" } }, ctx);
    expect(decision.outcome).toBe("block");
    if (decision.outcome !== "block") return;
    expect(decision.category).toBe("branch-mismatch");
    expect(decision.reason).toBe("[Branch Mismatch] Repository is on branch 'main' but the task expects 'feature/login'.");
    expect(decision.remediation).toBe("Run: cd . && git checkout feature/login");
  });

  it("warns and allows when the branch cannot be read", async () => {
    const git: GitCapability = {
      async currentBranch() {
        throw new Error("git timed out");
      },
    };
    const ctx = await context({ ...implementing(), currentTask: { branch: "feature/login", repositories: [] } }, git);
    await fs.mkdir(path.join(ctx.projectRoot, ".git"));
    const decision = await mediate({ tool: "Edit", input: { file_path: "src/app.ts" } }, ctx);
    const repo = path.basename(ctx.projectRoot);
    expect(decision).toEqual({
      outcome: "allow",
      notes: [`[workgate] warning: Could not verify branch for ${repo}: git timed out`],
    });
  });

  it("skips the branch check when enforcement is off", async () => {
    const git: GitCapability = { currentBranch: async () => "main" };
    const ctx = await context({ ...implementing(), currentTask: { branch: "feature/login", repositories: [] } }, git);
    ctx.policy = { ...ctx.policy, branchEnforcement: false };
    await fs.mkdir(path.join(ctx.projectRoot, ".git"));
    expect((await mediate({ tool: "Edit", input: { file_path: "src/app.ts" } }, ctx)).outcome).toBe("allow");
  });
});

describe("protected resources", () => {
  it("blocks editing the state file in every mode, even under bypass", async () => {
    const ctx = await context({ ...implementing(), flags: { bypass: true } });
    const decision = await mediate({ tool: "Write", input: { file_path: ".workgate/state.json" } }, ctx);
    expect(decision.outcome).toBe("block");
    if (decision.outcome !== "block") return;
    expect(decision.category).toBe("protected-resource");
    expect(decision.reason).toBe(".workgate/state.json is managed by workgate and cannot be modified by Write.");
  });

  it("blocks shell commands that overwrite the config file", async () => {
    const ctx = await context(implementing());
    const decision = await mediate({ tool: "Bash", input: { command: "echo '{}' > .workgate/config.json" } }, ctx);
    expect(decision.outcome).toBe("block");
    if (decision.outcome !== "block") return;
    expect(decision.reason).toBe("Shell command would modify .workgate/config.json, which is managed by workgate.");
  });

  it("blocks shell commands that remove the whole gate directory", async () => {
    const ctx = await context(implementing());
    expect(await mediate({ tool: "Bash", input: { command: "rm -rf .workgate" } }, ctx)).toMatchObject({
      outcome: "block",
      category: "protected-resource",
      reason: "Shell command would modify .workgate, which is managed by workgate.",
    });
    const moved = await mediate({ tool: "Bash", input: { command: `mv ${path.join(ctx.projectRoot, ".workgate")} /tmp/old` } }, ctx);
    expect(moved).toMatchObject({ outcome: "block", category: "protected-resource" });
  });

  it("lets shell commands read protected files", async () => {
    const ctx = await context(defaultState());
    expect((await mediate({ tool: "Bash", input: { command: "cat .workgate/state.json" } }, ctx)).outcome).toBe("allow");
  });
});

describe("bypass", () => {
  it("skips enforcement when the state flag is set", async () => {
    const ctx = await context({ ...defaultState(), flags: { bypass: true } });
    expect(await mediate({ tool: "Bash", input: { command: "rm -rf dist" } }, ctx)).toEqual({
      outcome: "allow",
      notes: ["[workgate] bypass is active; enforcement skipped."],
    });
  });

  it("skips enforcement when WORKGATE_BYPASS is 1", async () => {
    const ctx = await context(defaultState());
    ctx.env = { WORKGATE_BYPASS: "1" };
    expect((await mediate({ tool: "Edit", input: { file_path: "src/app.ts" } }, ctx)).outcome).toBe("allow");
  });
});

describe("afterToolUse", () => {
  it("returns to discussion once every item is completed", async () => {
    const ctx = await context(implementing([{ ...item, status: "completed" }]));
    const decision = await afterToolUse({ tool: "TodoWrite", input: {} }, ctx);
    expect(decision).toEqual({
      outcome: "allow",
      notes: ["[workgate] All work items completed; returning to Discussion mode."],
      transition: { event: "itemsCompleted", from: "implementation", to: "discussion" },
    });
    expect((await ctx.state.load()).mode).toBe("discussion");
  });

  it("does nothing while items remain", async () => {
    const ctx = await context(implementing());
    expect(await afterToolUse({ tool: "TodoWrite", input: {} }, ctx)).toEqual({ outcome: "allow", notes: [] });
    expect((await ctx.state.load()).mode).toBe("implementation");
  });
});

describe("targetPath", () => {
  it("reads the first non-empty path field", () => {
    expect(targetPath({ file_path: "a.ts" })).toBe("a.ts");
    expect(targetPath({ path: " ", notebook_path: "n.ipynb" })).toBe("n.ipynb");
    expect(targetPath({})).toBeNull();
  });
});
