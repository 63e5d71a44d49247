import type { CurrentTask, Mode, SessionState, WorkItem } from "./stateStore.js";
import { setFlag } from "./stateStore.js";

/**
 * Discussion / Plan / Implementation workflow.
 *
 * Every transition is a pure function from state to state; callers persist
 * the result through a StateHandle so the change lands in one atomic write.
 */

export type WorkflowEvent = "approve" | "enterPlan" | "exitPlan" | "scopeViolation" | "discuss" | "itemsCompleted";

/** Set when the scope guard resets the work items; reported once on the next prompt. */
export const SCOPE_RESET_FLAG = "scopeReset";

export const MODE_LABELS: Record<Mode, string> = {
  discussion: "Discussion",
  plan: "Plan",
  implementation: "Implementation",
};

export function modeLabel(mode: Mode): string {
  return MODE_LABELS[mode];
}

/** Discussion -> Implementation. A no-op from any other mode. */
export function approve(state: SessionState): SessionState {
  if (state.mode !== "discussion") return state;
  return { ...state, mode: "implementation" };
}

export function enterPlan(state: SessionState): SessionState {
  if (state.mode === "plan") return state;
  // Bookkeeping left over from an interrupted plan still names the right mode.
  if (state.plan) return { ...state, mode: "plan" };

  const { active, stashed } = state.workItems;
  const shouldStash = active.length > 0 && stashed.length === 0;
  return {
    ...state,
    mode: "plan",
    plan: {
      previousMode: state.mode,
      stashedCount: shouldStash ? active.length : 0,
    },
    workItems: shouldStash ? { active: [], stashed: active } : state.workItems,
  };
}

export function exitPlan(state: SessionState): SessionState {
  if (state.mode !== "plan" && !state.plan) return state;

  const previousMode: Mode = state.plan?.previousMode ?? "discussion";
  const stashedCount = state.plan?.stashedCount ?? 0;

  let workItems = state.workItems;
  if (stashedCount > 0 && state.workItems.stashed.length > 0) {
    workItems = { active: state.workItems.stashed, stashed: [] };
  }

  // Implementation without an approved list to work through is not a real
  // implementation episode.
  let mode: Mode = previousMode === "plan" ? "discussion" : previousMode;
  if (mode === "implementation" && workItems.active.length === 0) mode = "discussion";

  return { ...state, mode, plan: null, workItems };
}

export function scopeViolation(state: SessionState): SessionState {
  return setFlag(
    {
      ...state,
      mode: "discussion",
      plan: null,
      workItems: { ...state.workItems, active: [] },
    },
    SCOPE_RESET_FLAG,
    true,
  );
}

/** Emergency stop or operator reset: any mode -> Discussion. */
export function discuss(state: SessionState): SessionState {
  return { ...state, mode: "discussion", plan: null };
}

export function allCompleted(items: WorkItem[]): boolean {
  return items.length > 0 && items.every((item) => item.status === "completed");
}

export function itemsCompleted(state: SessionState): SessionState {
  if (state.mode !== "implementation" || !allCompleted(state.workItems.active)) return state;
  return { ...state, mode: "discussion", workItems: { ...state.workItems, active: [] } };
}

export const TRANSITIONS: Record<WorkflowEvent, (state: SessionState) => SessionState> = {
  approve,
  enterPlan,
  exitPlan,
  scopeViolation,
  discuss,
  itemsCompleted,
};

export function startTask(state: SessionState, task: CurrentTask): SessionState {
  return {
    ...state,
    currentTask: {
      ...(task.name ? { name: task.name } : {}),
      branch: task.branch,
      repositories: [...new Set(task.repositories)],
    },
  };
}

export function clearTask(state: SessionState): SessionState {
  return { ...state, currentTask: null };
}
