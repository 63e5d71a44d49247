import { z } from "zod";
import { MalformedInputError } from "./errors.js";
import type { SessionState, StateHandle, Transition, WorkItem } from "./stateStore.js";
import { WORK_ITEM_STATUSES } from "./stateStore.js";
import { scopeViolation } from "./workflow.js";

export type SubmitOutcome =
  | { accepted: true; items: WorkItem[] }
  | { accepted: false; reason: string; remediation: string };

const submittedItemSchema = z.object({
  content: z.string(),
  status: z.enum(WORK_ITEM_STATUSES).default("pending"),
});

const submittedListSchema = z.array(submittedItemSchema);

/** Work items from a submission tool's input (`todos` or `items`). */
export function parseWorkItems(toolInput: Record<string, unknown>): WorkItem[] {
  const raw = toolInput.todos ?? toolInput.items;
  const parsed = submittedListSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "(list)"}: ${i.message}`).join("; ");
    throw new MalformedInputError(`Work-item submission is malformed: ${detail}`);
  }
  return parsed.data;
}

function sameContents(a: WorkItem[], b: WorkItem[]): boolean {
  return a.length === b.length && a.every((item, i) => item.content === b[i].content);
}

/**
 * Pure decision for a submission. Inside an implementation episode the
 * approved contents are frozen; statuses may change.
 */
export function decideSubmission(state: SessionState, items: WorkItem[]): Transition<SubmitOutcome> {
  const active = state.workItems.active;
  if (state.mode === "implementation" && active.length > 0 && !sameContents(active, items)) {
    return {
      state: scopeViolation(state),
      result: {
        accepted: false,
        reason:
          "Work item list changed during implementation. This violates the agreed execution boundaries; " +
          "the active items were cleared and the session returned to Discussion mode.",
        remediation:
          "Explain the proposed change to the user, re-propose the complete work item list, " +
          "and wait for approval before implementing.",
      },
    };
  }

  return {
    state: { ...state, workItems: { ...state.workItems, active: items } },
    result: { accepted: true, items },
  };
}

export async function submitWorkItems(handle: StateHandle, items: WorkItem[]): Promise<SubmitOutcome> {
  return handle.transact((current) => decideSubmission(current, items));
}
