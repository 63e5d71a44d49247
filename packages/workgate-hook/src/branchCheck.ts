import path from "node:path";
import { errorMessage } from "./errors.js";
import { findRepoRoot, type GitCapability } from "./git.js";
import { toPosixRel } from "./paths.js";
import type { CurrentTask } from "./stateStore.js";

export type BranchIssue = "branch-mismatch" | "repo-not-in-task" | "repo-not-in-task-and-branch-mismatch";

export type BranchCheckResult =
  | { ok: true; note?: string }
  | { ok: false; issue: BranchIssue; repo: string; currentBranch: string; reason: string; remediation: string };

export type BranchCheckInput = {
  projectRoot: string;
  // Absolute path of the file about to be written.
  filePath: string;
  task: CurrentTask | null;
  git: GitCapability;
  timeoutMs: number;
};

export async function checkBranch(input: BranchCheckInput): Promise<BranchCheckResult> {
  const { projectRoot, filePath, task, git, timeoutMs } = input;
  if (!task || task.branch.trim().length === 0) return { ok: true };

  const repoRoot = await findRepoRoot(path.dirname(filePath));
  if (!repoRoot) return { ok: true };

  const repo = path.basename(repoRoot);
  let currentBranch: string;
  try {
    currentBranch = await git.currentBranch(repoRoot, timeoutMs);
  } catch (err) {
    return { ok: true, note: `Could not verify branch for ${repo}: ${errorMessage(err)}` };
  }

  const isProjectRoot = path.resolve(repoRoot) === path.resolve(projectRoot);
  const inTask = isProjectRoot || task.repositories.includes(repo);
  const branchCorrect = currentBranch === task.branch;
  if (inTask && branchCorrect) return { ok: true };

  const rel = toPosixRel(path.relative(projectRoot, repoRoot)) || ".";
  const shown = currentBranch || "(detached HEAD)";
  const addRepo = `Update the task to include '${repo}' in its repositories list.`;

  if (inTask) {
    return {
      ok: false,
      issue: "branch-mismatch",
      repo,
      currentBranch,
      reason: isProjectRoot
        ? `[Branch Mismatch] Repository is on branch '${shown}' but the task expects '${task.branch}'.`
        : `[Branch Mismatch] Repository '${repo}' is part of this task but is on branch '${shown}' instead of '${task.branch}'.`,
      remediation: `Run: cd ${rel} && git checkout ${task.branch}`,
    };
  }

  if (branchCorrect) {
    return {
      ok: false,
      issue: "repo-not-in-task",
      repo,
      currentBranch,
      reason: `[Repository Not in Task] '${repo}' is on the task branch '${task.branch}' but is not listed in the task's repositories.`,
      remediation: addRepo,
    };
  }

  return {
    ok: false,
    issue: "repo-not-in-task-and-branch-mismatch",
    repo,
    currentBranch,
    reason:
      `[Repository Not in Task] '${repo}' is not listed in the task's repositories and is on branch ` +
      `'${shown}' instead of '${task.branch}'.`,
    remediation: `Run: cd ${rel} && git checkout -b ${task.branch}\n${addRepo}`,
  };
}
