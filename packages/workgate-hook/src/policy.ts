import fs from "node:fs/promises";
import path from "node:path";
import { minimatch } from "minimatch";
import { z } from "zod";
import { CorruptedDocumentError, isErrnoException } from "./errors.js";
import { getPaths, relativeInside } from "./paths.js";

export type TriggerPhrases = {
  // Move Discussion -> Implementation.
  implementation: string[];
  // Emergency stop: any mode -> Discussion.
  discussion: string[];
  // Ask the agent to wrap up and summarize.
  compaction: string[];
};

export type ToolNames = {
  shell: string;
  workItems: string;
  enterPlan: string;
  exitPlan: string;
};

export type PolicyConfig = {
  // Command names the operator declares read-only / write-like.
  readPatterns: string[];
  writePatterns: string[];
  // Unknown commands are write-like when true.
  extrasafe: boolean;

  triggerPhrases: TriggerPhrases;

  // Tools blocked outside Implementation mode.
  blockedTools: string[];

  // Globs (relative to the project root) that may be edited in any mode.
  workArtifactPaths: string[];

  branchEnforcement: boolean;
  gitTimeoutMs: number;

  toolNames: ToolNames;
};

export function defaultToolNames(): ToolNames {
  return {
    shell: "Bash",
    workItems: "TodoWrite",
    enterPlan: "EnterPlanMode",
    exitPlan: "ExitPlanMode",
  };
}

export function defaultPolicy(): PolicyConfig {
  return {
    readPatterns: [],
    writePatterns: [],
    extrasafe: true,
    triggerPhrases: {
      implementation: ["make it so", "run that", "go ahead", "yert"],
      discussion: ["STOP", "SILENCE"],
      compaction: ["squish", "lets compact"],
    },
    blockedTools: ["Edit", "Write", "MultiEdit", "NotebookEdit"],
    workArtifactPaths: ["sessions/**", ".claude/**", "docs/**", "plans/**", "notes/**", "logs/**"],
    branchEnforcement: true,
    gitTimeoutMs: 2000,
    toolNames: defaultToolNames(),
  };
}

const stringList = z.array(z.string());

const policyFileSchema = z
  .object({
    readPatterns: stringList,
    writePatterns: stringList,
    extrasafe: z.boolean(),
    triggerPhrases: z
      .object({
        implementation: stringList,
        discussion: stringList,
        compaction: stringList,
      })
      .partial(),
    blockedTools: stringList,
    workArtifactPaths: stringList,
    branchEnforcement: z.boolean(),
    gitTimeoutMs: z.number().int().positive(),
    toolNames: z
      .object({
        shell: z.string().min(1),
        workItems: z.string().min(1),
        enterPlan: z.string().min(1),
        exitPlan: z.string().min(1),
      })
      .partial(),
  })
  .partial();

export type PolicyFile = z.infer<typeof policyFileSchema>;

export function mergePolicy(base: PolicyConfig, fromFile: PolicyFile): PolicyConfig {
  return {
    ...base,
    readPatterns: fromFile.readPatterns ?? base.readPatterns,
    writePatterns: fromFile.writePatterns ?? base.writePatterns,
    extrasafe: fromFile.extrasafe ?? base.extrasafe,
    triggerPhrases: {
      implementation: fromFile.triggerPhrases?.implementation ?? base.triggerPhrases.implementation,
      discussion: fromFile.triggerPhrases?.discussion ?? base.triggerPhrases.discussion,
      compaction: fromFile.triggerPhrases?.compaction ?? base.triggerPhrases.compaction,
    },
    blockedTools: fromFile.blockedTools ?? base.blockedTools,
    workArtifactPaths: fromFile.workArtifactPaths ?? base.workArtifactPaths,
    branchEnforcement: fromFile.branchEnforcement ?? base.branchEnforcement,
    gitTimeoutMs: fromFile.gitTimeoutMs ?? base.gitTimeoutMs,
    toolNames: { ...base.toolNames, ...fromFile.toolNames },
  };
}

export function parsePolicy(raw: string, filePath: string): PolicyConfig {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new CorruptedDocumentError("config", filePath, "not valid JSON", { cause: err });
  }
  const parsed = policyFileSchema.safeParse(json);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new CorruptedDocumentError("config", filePath, detail);
  }
  return mergePolicy(defaultPolicy(), parsed.data);
}

/** Policy from the config file, or the defaults when there is none. */
export async function loadPolicy(projectRoot: string, env: NodeJS.ProcessEnv = process.env): Promise<PolicyConfig> {
  const { configPath } = getPaths(projectRoot, env);
  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return defaultPolicy();
    throw err;
  }
  return parsePolicy(raw, configPath);
}

export function globAny(patterns: string[], value: string): boolean {
  return patterns.some((pat) => minimatch(value, pat, { dot: true, nocase: true }));
}

export function isWorkArtifactPath(policy: PolicyConfig, projectRoot: string, filePath: string): boolean {
  const rel = relativeInside(projectRoot, path.resolve(projectRoot, filePath));
  if (rel === null || rel === "") return false;
  return globAny(policy.workArtifactPaths, rel);
}
