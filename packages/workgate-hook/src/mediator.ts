import path from "node:path";
import { checkBranch, type BranchIssue } from "./branchCheck.js";
import { classifyDetailed } from "./classifier.js";
import { MalformedInputError } from "./errors.js";
import type { GitCapability } from "./git.js";
import { getPaths, relativeInside, type GatePaths, GATE_DIR } from "./paths.js";
import { isWorkArtifactPath, type PolicyConfig } from "./policy.js";
import { parseWorkItems, submitWorkItems } from "./scopeGuard.js";
import type { Mode, SessionState, StateHandle } from "./stateStore.js";
import { allCompleted, enterPlan, exitPlan, itemsCompleted, modeLabel, type WorkflowEvent } from "./workflow.js";

export type ToolRequest = {
  tool: string;
  input: Record<string, unknown>;
};

export type MediatorContext = {
  projectRoot: string;
  policy: PolicyConfig;
  state: StateHandle;
  git: GitCapability;
  env: NodeJS.ProcessEnv;
};

export type BlockCategory = "protected-resource" | "write-in-discussion" | "tool-blocked" | "scope-violation" | BranchIssue;

export type ModeTransition = {
  event: WorkflowEvent;
  from: Mode;
  to: Mode;
};

export type AllowDecision = {
  outcome: "allow";
  notes: string[];
  transition?: ModeTransition;
};

export type BlockDecision = {
  outcome: "block";
  category: BlockCategory;
  reason: string;
  remediation: string;
  mode: Mode;
  blockedTool: string;
  notes: string[];
  transition?: ModeTransition;
};

export type Decision = AllowDecision | BlockDecision;

// Editor tools that write a file, whatever the operator lists in blockedTools.
export const FILE_MUTATING_TOOLS = ["Edit", "Write", "MultiEdit", "NotebookEdit"] as const;

export const BYPASS_FLAG = "bypass";

function allow(notes: string[] = [], transition?: ModeTransition): AllowDecision {
  return transition ? { outcome: "allow", notes, transition } : { outcome: "allow", notes };
}

export function targetPath(input: Record<string, unknown>): string | null {
  for (const key of ["path", "file_path", "notebook_path"]) {
    const v = input[key];
    if (typeof v === "string" && v.trim().length > 0) return v;
  }
  return null;
}

function shellCommand(input: Record<string, unknown>): string {
  const command = input.command;
  if (typeof command !== "string") throw new MalformedInputError("Shell tool input has no `command` string.");
  return command;
}

function protectedFiles(paths: GatePaths): string[] {
  return [paths.statePath, paths.configPath];
}

function mentionsProtectedFile(command: string, paths: GatePaths): string | null {
  for (const file of protectedFiles(paths)) {
    const rel = relativeInside(paths.projectRoot, file);
    if (command.includes(file) || (rel !== null && command.includes(rel))) return file;
    if (command.includes(GATE_DIR) && command.includes(path.basename(file))) return file;
  }
  // The directory as a whole, e.g. `rm -rf .workgate`.
  if (command.includes(paths.gateDir) || command.includes(GATE_DIR)) return paths.gateDir;
  return null;
}

function describePhrases(policy: PolicyConfig): string {
  return policy.triggerPhrases.implementation
    .slice(0, 3)
    .map((p) => `"${p}"`)
    .join(", ");
}

function approvalRemediation(policy: PolicyConfig, mode: Mode): string {
  const phrases = describePhrases(policy);
  const ask = phrases ? `the user should say one of: ${phrases}` : "the user must approve implementation";
  if (mode === "plan") {
    return `Finish the plan and exit plan mode first. To start implementing, ${ask}.`;
  }
  return `Propose the change and wait for approval. To start implementing, ${ask}.`;
}

type TransitionFn = (state: SessionState) => SessionState;

async function applyTransition(ctx: MediatorContext, event: WorkflowEvent, fn: TransitionFn): Promise<ModeTransition> {
  return ctx.state.transact((current) => {
    const next = fn(current);
    return { state: next, result: { event, from: current.mode, to: next.mode } };
  });
}

/**
 * Decides whether one tool call may proceed. State is loaded fresh for each
 * call; the only writes are plan transitions and work-item submissions, each
 * a single atomic edit.
 */
export async function mediate(request: ToolRequest, ctx: MediatorContext): Promise<Decision> {
  const { policy, projectRoot } = ctx;
  const { tool, input } = request;
  const paths = getPaths(projectRoot, ctx.env);
  const state = await ctx.state.load();
  const notes: string[] = [];

  const fileTools = new Set<string>([...FILE_MUTATING_TOOLS, ...policy.blockedTools]);
  const target = targetPath(input);
  const absTarget = target ? path.resolve(projectRoot, target) : null;
  const isShell = tool === policy.toolNames.shell;

  const blockDecision = (
    category: BlockCategory,
    reason: string,
    remediation: string,
    mode: Mode = state.mode,
  ): BlockDecision => ({ outcome: "block", category, reason, remediation, mode, blockedTool: tool, notes });

  // Protected files win over every mode and over bypass.
  if (fileTools.has(tool) && absTarget && protectedFiles(paths).includes(absTarget)) {
    const rel = relativeInside(projectRoot, absTarget) ?? absTarget;
    return blockDecision(
      "protected-resource",
      `${rel} is managed by workgate and cannot be modified by ${tool}.`,
      "Change modes through the approval workflow, or ask the operator to run the `workgate` CLI.",
    );
  }
  if (isShell) {
    const command = shellCommand(input);
    const mentioned = mentionsProtectedFile(command, paths);
    if (mentioned && classifyDetailed(command, policy).risk === "write-like") {
      const rel = relativeInside(projectRoot, mentioned) ?? mentioned;
      return blockDecision(
        "protected-resource",
        `Shell command would modify ${rel}, which is managed by workgate.`,
        "Change modes through the approval workflow, or ask the operator to run the `workgate` CLI.",
      );
    }
  }

  if (state.flags[BYPASS_FLAG] === true || ctx.env.WORKGATE_BYPASS === "1") {
    return allow(["[workgate] bypass is active; enforcement skipped."]);
  }

  if (tool === policy.toolNames.enterPlan) {
    const transition = await applyTransition(ctx, "enterPlan", enterPlan);
    return allow([`[Plan Mode] Entered from ${modeLabel(transition.from)} mode.`], transition);
  }

  if (tool === policy.toolNames.exitPlan) {
    const transition = await applyTransition(ctx, "exitPlan", exitPlan);
    return allow([`[Plan Mode] Exited; now in ${modeLabel(transition.to)} mode.`], transition);
  }

  if (tool === policy.toolNames.workItems) {
    const items = parseWorkItems(input);
    const outcome = await submitWorkItems(ctx.state, items);
    if (!outcome.accepted) {
      return {
        ...blockDecision("scope-violation", outcome.reason, outcome.remediation, "discussion"),
        transition: { event: "scopeViolation", from: state.mode, to: "discussion" },
      };
    }
    return allow([`[workgate] stored ${items.length} work item(s).`]);
  }

  if (state.mode !== "implementation") {
    const label = modeLabel(state.mode);

    if (isShell) {
      const verdict = classifyDetailed(shellCommand(input), policy);
      if (verdict.risk === "write-like") {
        return blockDecision(
          "write-in-discussion",
          `[${label} Mode] Shell command blocked: ${verdict.reason}.`,
          approvalRemediation(policy, state.mode),
        );
      }
      return allow();
    }

    if (policy.blockedTools.includes(tool)) {
      if (absTarget && isWorkArtifactPath(policy, projectRoot, absTarget)) {
        return allow([`[workgate] ${tool} allowed on work artifact ${relativeInside(projectRoot, absTarget) ?? absTarget}.`]);
      }
      return blockDecision(
        "tool-blocked",
        `[${label} Mode] ${tool} is blocked outside Implementation mode.`,
        approvalRemediation(policy, state.mode),
      );
    }
  }

  if (fileTools.has(tool) && absTarget && policy.branchEnforcement && state.currentTask) {
    const result = await checkBranch({
      projectRoot,
      filePath: absTarget,
      task: state.currentTask,
      git: ctx.git,
      timeoutMs: policy.gitTimeoutMs,
    });
    if (!result.ok) return blockDecision(result.issue, result.reason, result.remediation);
    if (result.note) notes.push(`[workgate] warning: ${result.note}`);
  }

  return allow(notes);
}

/**
 * Post-use bookkeeping: once every approved item is completed the episode
 * ends and the session returns to Discussion mode.
 */
export async function afterToolUse(request: ToolRequest, ctx: MediatorContext): Promise<AllowDecision> {
  if (request.tool !== ctx.policy.toolNames.workItems) return allow();
  const state = await ctx.state.load();
  if (state.mode !== "implementation" || !allCompleted(state.workItems.active)) return allow();

  const transition = await applyTransition(ctx, "itemsCompleted", itemsCompleted);
  if (transition.from === transition.to) return allow();
  return allow(["[workgate] All work items completed; returning to Discussion mode."], transition);
}
