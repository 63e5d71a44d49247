import path from "node:path";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import {
  classifyDetailed,
  errorMessage,
  FileStateHandle,
  getPaths,
  loadPolicy,
  mediate,
  MemoryStateHandle,
  modeLabel,
  resolveProjectRoot,
  spawnGit,
  type GitCapability,
} from "workgate-hook";

/**
 * workgate MCP server
 *
 * Read-only window onto the gate for the agent:
 *  - gate_status            current mode, task and work items
 *  - gate_classify_command  how a shell command would be classified
 *  - gate_preview_action    the decision a tool call would get, without
 *                           persisting any state change
 *
 * Storage layout (relative to project root):
 *  - .workgate/state.json    session state (written only by the hook)
 *  - .workgate/config.json   policy (written by the operator)
 *  - .workgate/events.jsonl  decision log
 *
 * IMPORTANT: This is an STDIO MCP server.
 * Never write to stdout except MCP JSON-RPC. Use console.error for logs.
 */

export const SERVER_NAME = "workgate";
export const SERVER_VERSION = "0.1.0";

export type GateServerOptions = {
  env?: NodeJS.ProcessEnv;
  git?: GitCapability;
};

function textResult(payload: unknown) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(payload, null, 2) }],
  };
}

function errorResult(err: unknown) {
  return {
    isError: true,
    content: [{ type: "text" as const, text: errorMessage(err) }],
  };
}

export function createGateServer(options: GateServerOptions = {}): McpServer {
  const env = options.env ?? process.env;
  const git = options.git ?? spawnGit;

  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.registerTool(
    "gate_status",
    {
      description: "Show the workflow mode, the active task and the approved work items.",
      inputSchema: {},
    },
    async () => {
      try {
        const root = await resolveProjectRoot(undefined, env);
        const p = getPaths(root, env);
        const state = await new FileStateHandle(root, env).load();
        return textResult({
          mode: state.mode,
          mode_label: modeLabel(state.mode),
          current_task: state.currentTask,
          work_items: state.workItems,
          flags: state.flags,
          files: {
            state: path.relative(root, p.statePath),
            config: path.relative(root, p.configPath),
            events: path.relative(root, p.eventsPath),
          },
        });
      } catch (err) {
        return errorResult(err);
      }
    },
  );

  server.registerTool(
    "gate_classify_command",
    {
      description: "Classify a shell command as read-only or write-like under the current policy.",
      inputSchema: {
        command: z.string().describe("The full shell command line"),
      },
    },
    async ({ command }) => {
      try {
        const root = await resolveProjectRoot(undefined, env);
        const policy = await loadPolicy(root, env);
        const verdict = classifyDetailed(command, policy);
        return textResult({ command, risk: verdict.risk, reason: verdict.reason });
      } catch (err) {
        return errorResult(err);
      }
    },
  );

  server.registerTool(
    "gate_preview_action",
    {
      description:
        "Preview whether a tool call would be allowed or blocked, and why. " +
        "Nothing is persisted: plan transitions and work-item submissions are simulated.",
      inputSchema: {
        tool_name: z.string().min(1).describe("Tool identity, e.g. Bash, Edit, TodoWrite"),
        tool_input: z.record(z.unknown()).optional().describe("The tool's input object"),
      },
    },
    async ({ tool_name, tool_input }) => {
      try {
        const root = await resolveProjectRoot(undefined, env);
        const policy = await loadPolicy(root, env);
        const snapshot = await new FileStateHandle(root, env).load();
        const decision = await mediate(
          { tool: tool_name, input: tool_input ?? {} },
          { projectRoot: root, policy, state: new MemoryStateHandle(snapshot), git, env },
        );
        if (decision.outcome === "allow") {
          return textResult({ would_succeed: true, mode: snapshot.mode, notes: decision.notes });
        }
        return textResult({
          would_succeed: false,
          category: decision.category,
          reason: decision.reason,
          remediation: decision.remediation,
          mode: decision.mode,
        });
      } catch (err) {
        return errorResult(err);
      }
    },
  );

  return server;
}
