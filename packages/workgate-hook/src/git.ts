import fs from "node:fs/promises";
import path from "node:path";
import { spawn } from "node:child_process";
import { GitUnavailableError } from "./errors.js";

export interface GitCapability {
  /** Branch checked out in `repoRoot`; "" for a detached HEAD. */
  currentBranch(repoRoot: string, timeoutMs: number): Promise<string>;
}

export const spawnGit: GitCapability = {
  currentBranch(repoRoot, timeoutMs) {
    return new Promise((resolve, reject) => {
      const child = spawn("git", ["branch", "--show-current"], {
        cwd: repoRoot,
        stdio: ["ignore", "pipe", "pipe"],
      });
      let stdout = "";
      let stderr = "";
      child.stdout.setEncoding("utf8");
      child.stderr.setEncoding("utf8");
      child.stdout.on("data", (chunk: string) => (stdout += chunk));
      child.stderr.on("data", (chunk: string) => (stderr += chunk));

      const timer = setTimeout(() => {
        child.kill("SIGKILL");
        reject(new GitUnavailableError(`git branch timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      child.on("error", (err) => {
        clearTimeout(timer);
        reject(new GitUnavailableError(`git could not be started: ${err.message}`, { cause: err }));
      });
      child.on("close", (code) => {
        clearTimeout(timer);
        if (code === 0) resolve(stdout.trim());
        else reject(new GitUnavailableError(stderr.trim() || `git exited with code ${code ?? "null"}`));
      });
    });
  },
};

async function exists(p: string): Promise<boolean> {
  try {
    await fs.lstat(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * Nearest directory at or above `start` holding a `.git` entry. Submodules
 * and worktrees carry a `.git` file rather than a directory; both count.
 */
export async function findRepoRoot(start: string): Promise<string | null> {
  let dir = path.resolve(start);
  for (;;) {
    if (await exists(path.join(dir, ".git"))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}
