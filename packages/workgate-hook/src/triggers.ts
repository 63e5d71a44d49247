import type { ModeTransition } from "./mediator.js";
import type { PolicyConfig } from "./policy.js";
import { takeFlag, type SessionState, type StateHandle, type Transition } from "./stateStore.js";
import { approve, discuss, SCOPE_RESET_FLAG } from "./workflow.js";

export type PromptOutcome = {
  // Lines handed back to the agent as additional context.
  context: string[];
  transition?: ModeTransition;
};

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * First phrase found in `prompt` as whole words. Discussion (stop) phrases
 * are matched with their exact case so that "STOP" halts work but "stop"
 * in ordinary prose does not.
 */
export function matchPhrase(prompt: string, phrases: string[], caseSensitive = false): string | null {
  for (const phrase of phrases) {
    const trimmed = phrase.trim();
    if (!trimmed) continue;
    const re = new RegExp(`(^|[^\\w])${escapeRegExp(trimmed)}(?=$|[^\\w])`, caseSensitive ? "" : "i");
    if (re.test(prompt)) return trimmed;
  }
  return null;
}

export function decidePrompt(state: SessionState, prompt: string, policy: PolicyConfig): Transition<PromptOutcome> {
  const context: string[] = [];
  const { state: afterFlag, result: scopeWasReset } = takeFlag(state, SCOPE_RESET_FLAG);
  let next = afterFlag;
  let transition: ModeTransition | undefined;

  if (scopeWasReset) {
    context.push(
      "[Scope Reset] The previous work item list was cleared after it changed mid-implementation. " +
        "Re-propose the full list and wait for approval.",
    );
  }

  const stop = matchPhrase(prompt, policy.triggerPhrases.discussion, true);
  const go = stop ? null : matchPhrase(prompt, policy.triggerPhrases.implementation);

  if (stop) {
    next = discuss(next);
    transition = { event: "discuss", from: state.mode, to: next.mode };
    context.push("[EMERGENCY STOP] All implementation halted. Now in Discussion mode; only read-only tools are allowed.");
  } else if (go && state.mode === "discussion") {
    next = approve(next);
    transition = { event: "approve", from: state.mode, to: next.mode };
    context.push(
      `[Implementation Mode Activated] "${go}" approved implementation. ` +
        "Record the agreed work items first, then carry out only those items.",
    );
  } else if (go && state.mode === "plan") {
    context.push("[Plan Mode] Implementation approval noted; exit plan mode before editing files.");
  }

  if (matchPhrase(prompt, policy.triggerPhrases.compaction)) {
    context.push("[Compaction] Wrap up the current step and write a summary of progress and open items before context is compacted.");
  }

  return { state: next, result: transition ? { context, transition } : { context } };
}

export async function handlePrompt(handle: StateHandle, prompt: string, policy: PolicyConfig): Promise<PromptOutcome> {
  return handle.transact((current) => decidePrompt(current, prompt, policy));
}
