export { classify, classifyDetailed, scanCommand, splitWords, parseCommand } from "./classifier.js";
export type { CommandPolicy, CommandRisk, ParsedCommand, Verdict } from "./classifier.js";
export { checkBranch } from "./branchCheck.js";
export type { BranchCheckInput, BranchCheckResult, BranchIssue } from "./branchCheck.js";
export {
  CorruptedDocumentError,
  GitUnavailableError,
  MalformedInputError,
  StateLockError,
  WorkgateError,
  errorMessage,
} from "./errors.js";
export { findRepoRoot, spawnGit } from "./git.js";
export type { GitCapability } from "./git.js";
export { EXIT, runHook } from "./hook.js";
export type { HookResult } from "./hook.js";
export { afterToolUse, mediate, targetPath } from "./mediator.js";
export type { BlockCategory, Decision, MediatorContext, ModeTransition, ToolRequest } from "./mediator.js";
export { getPaths, resolveProjectRoot } from "./paths.js";
export type { GatePaths } from "./paths.js";
export { defaultPolicy, isWorkArtifactPath, loadPolicy } from "./policy.js";
export type { PolicyConfig } from "./policy.js";
export { submitWorkItems } from "./scopeGuard.js";
export type { SubmitOutcome } from "./scopeGuard.js";
export { FileStateHandle, MemoryStateHandle, defaultState } from "./stateStore.js";
export type { CurrentTask, Mode, SessionState, StateHandle, WorkItem } from "./stateStore.js";
export { handlePrompt } from "./triggers.js";
export { modeLabel } from "./workflow.js";
