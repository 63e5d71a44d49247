import { recordEvent } from "./audit.js";
import { errorMessage, remediationFor } from "./errors.js";
import { BYPASS_FLAG } from "./mediator.js";
import { resolveProjectRoot } from "./paths.js";
import { FileStateHandle, setFlag, updateState, type SessionState } from "./stateStore.js";
import { approve, clearTask, discuss, modeLabel, startTask } from "./workflow.js";

export type OperatorResult = {
  exitCode: 0 | 1;
  stdout: string[];
  stderr: string[];
};

export const USAGE = [
  "Usage: workgate <command>",
  "",
  "  status                                  show mode, task and work items",
  "  mode discussion|implementation          switch workflow mode",
  "  task start <branch> [--name N] [--repo R ...]",
  "  task clear",
  "  bypass on|off",
];

function getArgValues(argv: string[], flag: string): string[] {
  const values: string[] = [];
  argv.forEach((arg, i) => {
    const next = argv[i + 1];
    if (arg === flag && next && !next.startsWith("--")) values.push(next);
  });
  return values;
}

function positionals(argv: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    if (argv[i].startsWith("--")) {
      i++;
      continue;
    }
    out.push(argv[i]);
  }
  return out;
}

export function describeState(state: SessionState): string[] {
  const lines = [`Mode: ${modeLabel(state.mode)}`];
  const task = state.currentTask;
  lines.push(
    task
      ? `Task: ${task.name ?? "(unnamed)"} on branch ${task.branch}` +
          (task.repositories.length > 0 ? ` [${task.repositories.join(", ")}]` : "")
      : "Task: none",
  );
  lines.push(`Work items: ${state.workItems.active.length} active, ${state.workItems.stashed.length} stashed`);
  for (const item of state.workItems.active) lines.push(`  - [${item.status}] ${item.content}`);
  if (state.flags[BYPASS_FLAG]) lines.push("Bypass: on");
  return lines;
}

const ok = (stdout: string[]): OperatorResult => ({ exitCode: 0, stdout, stderr: [] });
const usageError = (message: string): OperatorResult => ({ exitCode: 1, stdout: [], stderr: [message, ...USAGE] });

async function run(argv: string[], handle: FileStateHandle, projectRoot: string): Promise<OperatorResult> {
  const [command, sub, arg] = positionals(argv);

  switch (command) {
    case "status":
      return ok([...describeState(await handle.load()), `State file: ${handle.paths.statePath}`]);

    case "mode": {
      if (sub !== "discussion" && sub !== "implementation") return usageError(`Unknown mode: ${sub ?? "(none)"}`);
      const before = await handle.load();
      const next = await updateState(handle, sub === "discussion" ? discuss : approve);
      if (before.mode !== next.mode) {
        await recordEvent(projectRoot, { type: "mode-transition", event: "operator", from: before.mode, to: next.mode });
      }
      if (sub === "implementation" && next.mode !== "implementation") {
        return { exitCode: 1, stdout: [], stderr: [`Cannot approve implementation from ${modeLabel(next.mode)} mode.`] };
      }
      return ok([`Mode: ${modeLabel(next.mode)}`]);
    }

    case "task": {
      if (sub === "clear") {
        await updateState(handle, clearTask);
        return ok(["Task cleared."]);
      }
      if (sub === "start") {
        if (!arg) return usageError("task start needs a branch name.");
        const name = getArgValues(argv, "--name")[0];
        const task = { ...(name ? { name } : {}), branch: arg, repositories: getArgValues(argv, "--repo") };
        const next = await updateState(handle, (s) => startTask(s, task));
        return ok(describeState(next));
      }
      return usageError(`Unknown task command: ${sub ?? "(none)"}`);
    }

    case "bypass": {
      if (sub !== "on" && sub !== "off") return usageError("bypass takes on or off.");
      await updateState(handle, (s) => setFlag(s, BYPASS_FLAG, sub === "on"));
      return ok([`Bypass: ${sub}`]);
    }

    default:
      return command ? usageError(`Unknown command: ${command}`) : ok(USAGE);
  }
}

export async function runOperator(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<OperatorResult> {
  try {
    const projectRoot = await resolveProjectRoot(undefined, env);
    return await run(argv, new FileStateHandle(projectRoot, env), projectRoot);
  } catch (err) {
    const remediation = remediationFor(err);
    return { exitCode: 1, stdout: [], stderr: [`[workgate: fatal] ${errorMessage(err)}`, ...(remediation ? [remediation] : [])] };
  }
}
