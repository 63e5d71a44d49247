import { describe, it, expect } from "vitest";
import { MalformedInputError } from "../src/errors.js";
import { parseWorkItems, submitWorkItems } from "../src/scopeGuard.js";
import { defaultState, MemoryStateHandle, type WorkItem } from "../src/stateStore.js";
import { SCOPE_RESET_FLAG } from "../src/workflow.js";

const login: WorkItem = { content: "Add login form", status: "pending" };
const cookie: WorkItem = { content: "Wire session cookie", status: "pending" };

function implementingWith(active: WorkItem[]): MemoryStateHandle {
  return new MemoryStateHandle({ ...defaultState(), mode: "implementation", workItems: { active, stashed: [] } });
}

describe("submitWorkItems", () => {
  it("stores proposals freely before implementation starts", async () => {
    const handle = new MemoryStateHandle();
    expect(await submitWorkItems(handle, [login])).toEqual({ accepted: true, items: [login] });
    expect(await submitWorkItems(handle, [login, cookie])).toEqual({ accepted: true, items: [login, cookie] });
    const state = await handle.load();
    expect(state.mode).toBe("discussion");
    expect(state.workItems.active).toEqual([login, cookie]);
  });

  it("accepts status updates to the approved list", async () => {
    const handle = implementingWith([login, cookie]);
    const update = [{ ...login, status: "completed" as const }, cookie];
    const outcome = await submitWorkItems(handle, update);
    expect(outcome.accepted).toBe(true);
    const state = await handle.load();
    expect(state.mode).toBe("implementation");
    expect(state.workItems.active).toEqual(update);
  });

  it("is idempotent for an identical resubmission", async () => {
    const handle = implementingWith([login, cookie]);
    await submitWorkItems(handle, [login, cookie]);
    await submitWorkItems(handle, [login, cookie]);
    const state = await handle.load();
    expect(state.mode).toBe("implementation");
    expect(state.workItems.active).toEqual([login, cookie]);
  });

  it("rejects a changed list and returns to discussion", async () => {
    const handle = implementingWith([login, cookie]);
    const outcome = await submitWorkItems(handle, [login, { content: "Refactor the router", status: "pending" }]);
    expect(outcome.accepted).toBe(false);
    if (outcome.accepted) return;
    expect(outcome.reason).toMatch(/^Work item list changed during implementation/);

    const state = await handle.load();
    expect(state.mode).toBe("discussion");
    expect(state.workItems.active).toEqual([]);
    expect(state.flags[SCOPE_RESET_FLAG]).toBe(true);
  });

  it("treats reordering as a change", async () => {
    const handle = implementingWith([login, cookie]);
    const outcome = await submitWorkItems(handle, [cookie, login]);
    expect(outcome.accepted).toBe(false);
  });

  it("accepts a new list when implementation has no approved items", async () => {
    const handle = implementingWith([]);
    const outcome = await submitWorkItems(handle, [cookie]);
    expect(outcome).toEqual({ accepted: true, items: [cookie] });
  });
});

describe("parseWorkItems", () => {
  it("defaults missing statuses to pending", () => {
    expect(parseWorkItems({ todos: [{ content: "Write tests" }] })).toEqual([{ content: "Write tests", status: "pending" }]);
  });

  it("reads the items key as well", () => {
    expect(parseWorkItems({ items: [{ content: "Ship", status: "in_progress" }] })).toEqual([
      { content: "Ship", status: "in_progress" },
    ]);
  });

  it("rejects malformed submissions", () => {
    expect(() => parseWorkItems({ todos: "nope" })).toThrow(MalformedInputError);
    expect(() => parseWorkItems({ todos: [{ content: "x", status: "done" }] })).toThrow(MalformedInputError);
  });
});
