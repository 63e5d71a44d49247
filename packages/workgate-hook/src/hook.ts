import { fallback } from "fallback-chain-js";
import { z } from "zod";
import { recordEvent } from "./audit.js";
import { MalformedInputError, errorMessage, remediationFor } from "./errors.js";
import { spawnGit, type GitCapability } from "./git.js";
import { afterToolUse, mediate, type Decision, type MediatorContext, type ModeTransition } from "./mediator.js";
import { resolveProjectRoot } from "./paths.js";
import { loadPolicy } from "./policy.js";
import { ensureState, FileStateHandle } from "./stateStore.js";
import { handlePrompt } from "./triggers.js";

/**
 * One hook invocation: payload in, exit code plus stdout/stderr out.
 *
 * stdout carries only the JSON the host reads; everything meant for humans
 * goes to stderr.
 */

export const EXIT = {
  allow: 0,
  fatal: 1,
  block: 2,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export type HookPayload = {
  eventName: string;
  tool: string | null;
  input: Record<string, unknown>;
  cwd?: string;
  prompt?: string;
};

export type HookResult = {
  exitCode: ExitCode;
  stdout: string;
  stderr: string[];
};

export type HookDeps = {
  env: NodeJS.ProcessEnv;
  git: GitCapability;
};

const toolInputSchema = z.record(z.unknown());

const rawPayloadSchema = z
  .object({
    hook_event_name: z.string().optional(),
    hookEventName: z.string().optional(),
    event: z.string().optional(),
    tool_name: z.string().optional(),
    toolIdentity: z.string().optional(),
    tool_input: toolInputSchema.optional(),
    toolInput: toolInputSchema.optional(),
    cwd: z.string().optional(),
    prompt: z.string().optional(),
  })
  .passthrough();

/** First non-blank value among the alternative spellings of a field. */
async function firstNonEmpty(...values: Array<string | undefined>): Promise<string | null> {
  try {
    return await fallback(
      values.map((v) => () => {
        if (typeof v !== "string" || v.trim().length === 0) throw new Error("missing");
        return v;
      }),
    );
  } catch {
    return null;
  }
}

export async function normalizePayload(raw: unknown): Promise<HookPayload> {
  const parsed = rawPayloadSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "(payload)"}: ${i.message}`).join("; ");
    throw new MalformedInputError(`Hook payload is malformed: ${detail}`);
  }
  const p = parsed.data;
  const tool = await firstNonEmpty(p.tool_name, p.toolIdentity);
  const eventName =
    (await firstNonEmpty(p.hook_event_name, p.hookEventName, p.event)) ??
    (tool ? "PreToolUse" : p.prompt !== undefined ? "UserPromptSubmit" : undefined);
  if (!eventName) throw new MalformedInputError("Hook payload names neither an event, a tool nor a prompt.");

  return {
    eventName,
    tool,
    input: p.tool_input ?? p.toolInput ?? {},
    ...(p.cwd ? { cwd: p.cwd } : {}),
    ...(p.prompt !== undefined ? { prompt: p.prompt } : {}),
  };
}

export async function parsePayload(stdin: string): Promise<HookPayload> {
  if (stdin.trim().length === 0) throw new MalformedInputError("Hook received no input on stdin.");
  let raw: unknown;
  try {
    raw = JSON.parse(stdin);
  } catch (err) {
    throw new MalformedInputError(`Hook input is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }
  return normalizePayload(raw);
}

function blockOutput(decision: Extract<Decision, { outcome: "block" }>): string {
  return JSON.stringify({
    hookEventName: "PreToolUse",
    decision: "block",
    category: decision.category,
    reason: decision.reason,
    remediation: decision.remediation,
    mode: decision.mode,
    blockedTool: decision.blockedTool,
  });
}

async function recordTransition(projectRoot: string, transition: ModeTransition | undefined): Promise<void> {
  if (!transition || transition.from === transition.to) return;
  await recordEvent(projectRoot, { type: "mode-transition", ...transition });
}

function requireTool(payload: HookPayload): string {
  if (!payload.tool) throw new MalformedInputError(`${payload.eventName} payload does not name a tool.`);
  return payload.tool;
}

async function dispatch(payload: HookPayload, ctx: MediatorContext): Promise<HookResult> {
  const { projectRoot } = ctx;

  if (payload.eventName === "UserPromptSubmit") {
    const outcome = await handlePrompt(ctx.state, payload.prompt ?? "", ctx.policy);
    await recordTransition(projectRoot, outcome.transition);
    const stdout =
      outcome.context.length > 0
        ? JSON.stringify({
            hookSpecificOutput: { hookEventName: "UserPromptSubmit", additionalContext: outcome.context.join("\n") },
          })
        : "";
    return { exitCode: EXIT.allow, stdout, stderr: [] };
  }

  if (payload.eventName === "PostToolUse") {
    const tool = requireTool(payload);
    const decision = await afterToolUse({ tool, input: payload.input }, ctx);
    await recordTransition(projectRoot, decision.transition);
    return { exitCode: EXIT.allow, stdout: "", stderr: decision.notes };
  }

  if (payload.eventName !== "PreToolUse") {
    return { exitCode: EXIT.allow, stdout: "", stderr: [`[workgate] ignoring unhandled hook event ${payload.eventName}.`] };
  }

  const tool = requireTool(payload);
  const decision = await mediate({ tool, input: payload.input }, ctx);
  await recordTransition(projectRoot, decision.transition);

  if (decision.outcome === "allow") {
    await recordEvent(projectRoot, { type: "tool-allowed", tool, notes: decision.notes });
    return { exitCode: EXIT.allow, stdout: "", stderr: decision.notes };
  }

  await recordEvent(projectRoot, {
    type: "tool-blocked",
    tool,
    category: decision.category,
    reason: decision.reason,
    mode: decision.mode,
  });
  return {
    exitCode: EXIT.block,
    stdout: blockOutput(decision),
    stderr: [...decision.notes, `[workgate: blocked] ${decision.reason}`, decision.remediation],
  };
}

function fatalResult(err: unknown): HookResult {
  const stderr = [`[workgate: fatal] ${errorMessage(err)}`];
  const remediation = remediationFor(err);
  if (remediation) stderr.push(remediation);
  return { exitCode: EXIT.fatal, stdout: "", stderr };
}

/** Runs one invocation from raw stdin text. Never throws. */
export async function runHook(stdin: string, deps: HookDeps = { env: process.env, git: spawnGit }): Promise<HookResult> {
  let projectRoot: string | null = null;
  try {
    const payload = await parsePayload(stdin);
    projectRoot = await resolveProjectRoot(payload.cwd, deps.env);
    const policy = await loadPolicy(projectRoot, deps.env);
    const state = new FileStateHandle(projectRoot, deps.env);
    await ensureState(state);
    return await dispatch(payload, { projectRoot, policy, state, git: deps.git, env: deps.env });
  } catch (err) {
    const result = fatalResult(err);
    if (projectRoot) await recordEvent(projectRoot, { type: "fatal", message: errorMessage(err) });
    return result;
  }
}
