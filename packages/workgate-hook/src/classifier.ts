import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { PolicyConfig } from "./policy.js";

/**
 * Shell command risk classifier.
 *
 * Decides whether a command line could mutate the filesystem or system
 * state. It does not parse shell grammar: it scans quotes well enough to
 * find redirections, command separators and command substitutions, then
 * judges each simple command by its leading word and a few argument rules.
 * Anything it does not recognize is write-like unless `extrasafe` is off.
 */

export type CommandRisk = "read-only" | "write-like";

export type Verdict = {
  risk: CommandRisk;
  reason: string;
};

export type CommandPolicy = Pick<PolicyConfig, "readPatterns" | "writePatterns" | "extrasafe">;

export type ParsedCommand = {
  base: string;
  args: string[];
};

const commandListsSchema = z.object({
  readOnly: z.array(z.string()),
  writeLike: z.array(z.string()),
});

function loadCommandLists(): z.infer<typeof commandListsSchema> {
  const here = path.dirname(fileURLToPath(import.meta.url));
  const raw = fs.readFileSync(path.join(here, "..", "data", "commands.json"), "utf8");
  return commandListsSchema.parse(JSON.parse(raw));
}

const commandLists = loadCommandLists();
export const READ_ONLY_COMMANDS: ReadonlySet<string> = new Set(commandLists.readOnly);
export const WRITE_LIKE_COMMANDS: ReadonlySet<string> = new Set(commandLists.writeLike);

export class TokenizeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TokenizeError";
  }
}

export type CommandScan = {
  // First unquoted output redirection, if any.
  redirection: string | null;
  segments: string[];
  substitutions: string[];
};

/** Index of the `)` closing the `(` at `open`, skipping quoted text. */
function findClosingParen(command: string, open: number): number {
  let depth = 0;
  let quote: "'" | '"' | null = null;
  for (let i = open; i < command.length; i++) {
    const ch = command[i];
    if (quote === "'") {
      if (ch === "'") quote = null;
      continue;
    }
    if (ch === "\\") {
      i++;
      continue;
    }
    if (quote === '"') {
      if (ch === '"') quote = null;
      continue;
    }
    if (ch === "'" || ch === '"') quote = ch;
    else if (ch === "(") depth++;
    else if (ch === ")") {
      depth--;
      if (depth === 0) return i;
    }
  }
  throw new TokenizeError("unterminated command substitution");
}

function findClosingBacktick(command: string, open: number): number {
  for (let i = open + 1; i < command.length; i++) {
    if (command[i] === "\\") {
      i++;
      continue;
    }
    if (command[i] === "`") return i;
  }
  throw new TokenizeError("unterminated backtick substitution");
}

/**
 * Single pass over a command line. Splits on unquoted `|`, `||`, `&&`, `;`,
 * `&` and newlines, records `$(...)`, `<(...)` and backtick bodies, and stops
 * at the first unquoted `>`.
 */
export function scanCommand(command: string): CommandScan {
  const segments: string[] = [];
  const substitutions: string[] = [];
  let buf = "";
  let quote: "'" | '"' | null = null;

  const cut = () => {
    segments.push(buf);
    buf = "";
  };

  for (let i = 0; i < command.length; i++) {
    const ch = command[i];
    const next = command[i + 1];

    if (quote === "'") {
      if (ch === "'") quote = null;
      buf += ch;
      continue;
    }

    if (ch === "\\") {
      buf += ch + (next ?? "");
      i++;
      continue;
    }

    if (ch === "`") {
      const end = findClosingBacktick(command, i);
      substitutions.push(command.slice(i + 1, end));
      buf += command.slice(i, end + 1);
      i = end;
      continue;
    }

    if (ch === "$" && next === "(") {
      const end = findClosingParen(command, i + 1);
      // $(( ... )) is arithmetic, not a command.
      if (command[i + 2] !== "(") substitutions.push(command.slice(i + 2, end));
      buf += command.slice(i, end + 1);
      i = end;
      continue;
    }

    if (quote === '"') {
      if (ch === '"') quote = null;
      buf += ch;
      continue;
    }

    if (ch === "'" || ch === '"') {
      quote = ch;
      buf += ch;
      continue;
    }

    if (ch === "<" && next === "(") {
      const end = findClosingParen(command, i + 1);
      substitutions.push(command.slice(i + 2, end));
      buf += command.slice(i, end + 1);
      i = end;
      continue;
    }

    if (ch === ">") {
      return { redirection: command.slice(Math.max(0, i - 2), i + 2).trim(), segments, substitutions };
    }

    if (ch === "&" && next === ">") {
      return { redirection: "&>", segments, substitutions };
    }

    if (ch === "|") {
      cut();
      if (next === "|" || next === "&") i++;
      continue;
    }

    if (ch === "&") {
      cut();
      if (next === "&") i++;
      continue;
    }

    if (ch === ";" || ch === "\n") {
      cut();
      continue;
    }

    buf += ch;
  }

  if (quote) throw new TokenizeError(`unbalanced ${quote} quote`);
  cut();
  return { redirection: null, segments: segments.filter((s) => s.trim().length > 0), substitutions };
}

/** Whitespace-separated words with quotes and backslash escapes removed. */
export function splitWords(segment: string): string[] {
  const words: string[] = [];
  let word = "";
  let inWord = false;
  let quote: "'" | '"' | null = null;

  for (let i = 0; i < segment.length; i++) {
    const ch = segment[i];
    if (quote === "'") {
      if (ch === "'") quote = null;
      else word += ch;
      continue;
    }
    if (ch === "\\") {
      word += segment[i + 1] ?? "";
      inWord = true;
      i++;
      continue;
    }
    if (quote === '"') {
      if (ch === '"') quote = null;
      else word += ch;
      continue;
    }
    if (ch === "'" || ch === '"') {
      quote = ch;
      inWord = true;
      continue;
    }
    if (/\s/.test(ch)) {
      if (inWord) words.push(word);
      word = "";
      inWord = false;
      continue;
    }
    word += ch;
    inWord = true;
  }
  if (quote) throw new TokenizeError(`unbalanced ${quote} quote`);
  if (inWord) words.push(word);
  return words;
}

const ASSIGNMENT = /^[A-Za-z_][A-Za-z0-9_]*=/;

const GROUP_CLOSE = /^[)}]+$/;

/**
 * Leading command name (lower-cased basename) and its arguments. Grouping
 * punctuation is not part of the command: opening `(`, `{` and `!` before
 * the name, a `)` closing the last word, and a lone `)` or `}`.
 */
export function parseCommand(words: string[]): ParsedCommand | null {
  const last = words.length - 1;
  const cleaned = words.map((w, i) => (i === last && !GROUP_CLOSE.test(w) ? w.replace(/\)+$/, "") : w));
  let i = 0;
  while (i < cleaned.length) {
    const word = cleaned[i].replace(/^[({!]+/, "");
    if (word.length === 0 || GROUP_CLOSE.test(word) || ASSIGNMENT.test(word)) {
      i++;
      continue;
    }
    const args = cleaned.slice(i + 1).filter((a, j, all) => !(j === all.length - 1 && GROUP_CLOSE.test(a)));
    return { base: path.posix.basename(word).toLowerCase(), args };
  }
  return null;
}

type ClassifyWords = (words: string[]) => Verdict;

type RuleContext = {
  classifyWords: ClassifyWords;
  // Built-in or operator-declared write-like command name.
  isWriteLikeName: (name: string) => boolean;
};

type CommandRule = (args: string[], ctx: RuleContext) => Verdict | null;

const readOnly = (reason: string): Verdict => ({ risk: "read-only", reason });
const writeLike = (reason: string): Verdict => ({ risk: "write-like", reason });

function subcommandRule(name: string, readOnlySubcommands: string[]): CommandRule {
  const allowed = new Set(readOnlySubcommands);
  return (args) => {
    const sub = args[0] ?? "";
    return allowed.has(sub)
      ? readOnly(`${name} ${sub} only reads`)
      : writeLike(sub ? `${name} ${sub} may install or modify files` : `${name} without a read-only subcommand`);
  };
}

const pipRule = subcommandRule("pip", ["show", "list", "search", "check", "freeze", "help", "-V", "--version"]);
const npmRule = subcommandRule("npm", ["list", "ls", "view", "show", "search", "help", "-v", "--version"]);
const yarnRule = subcommandRule("yarn", ["list", "ls", "view", "show", "search", "help", "-v", "--version"]);
const pnpmRule = subcommandRule("pnpm", ["list", "ls", "view", "show", "search", "help", "-v", "--version"]);

const pythonRule: CommandRule = (args) => {
  const first = args[0];
  if (first === "-c" || first === "-m" || first === "--version" || first === "-V") {
    return readOnly(`python ${first} is treated as read-only`);
  }
  return writeLike("python scripts may write files");
};

const sedRule: CommandRule = (args) => {
  const inPlace = args.find((a) => a === "--in-place" || a.startsWith("--in-place=") || /^-[A-Za-z]*i/.test(a));
  return inPlace ? writeLike(`sed ${inPlace} edits files in place`) : null;
};

const AWK_WRITES = [/>>?\s*["']/, /\bprintf?\s*>/, /\bsystem\s*\(/, /\|\s*["']/];

const awkRule: CommandRule = (args) => {
  const script = args.join(" ");
  return AWK_WRITES.some((re) => re.test(script)) ? writeLike("awk script writes output to a file or command") : null;
};

const FIND_WRITE_ACTIONS = new Set(["-delete", "-fprint", "-fprint0", "-fprintf", "-fls"]);
const FIND_EXEC_ACTIONS = new Set(["-exec", "-execdir", "-ok", "-okdir"]);

const findRule: CommandRule = (args, { classifyWords }) => {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (FIND_WRITE_ACTIONS.has(arg)) return writeLike(`find ${arg} modifies files`);
    if (!FIND_EXEC_ACTIONS.has(arg)) continue;
    const end = args.findIndex((a, j) => j > i && (a === ";" || a === "+"));
    const execWords = args.slice(i + 1, end === -1 ? args.length : end);
    const verdict = classifyWords(execWords);
    if (verdict.risk === "write-like") return writeLike(`find ${arg} runs a write-like command (${verdict.reason})`);
    i = end === -1 ? args.length : end;
  }
  return null;
};

/**
 * Rule for commands that run another command: skips the wrapper's own
 * options and positional operands, then classifies what is left. Any
 * argument naming a write-like command also makes the whole call
 * write-like, whatever option parsing made of it.
 */
function wrapperRule(name: string, optionsWithValue: string[], positionals = 0): CommandRule {
  const takesValue = new Set(optionsWithValue);
  return (args, { classifyWords, isWriteLikeName }) => {
    let i = 0;
    while (i < args.length) {
      const arg = args[i];
      if (arg === "--") {
        i++;
        break;
      }
      if (ASSIGNMENT.test(arg)) {
        i++;
        continue;
      }
      if (!arg.startsWith("-") || arg === "-") break;
      i += takesValue.has(arg) ? 2 : 1;
    }
    i += positionals;
    const wrapped = args.slice(i);
    const verdict = wrapped.length > 0 ? classifyWords(wrapped) : readOnly(`${name} runs no command`);
    if (verdict.risk === "write-like") return writeLike(`${name} runs a write-like command (${verdict.reason})`);

    const named = args.map((a) => path.posix.basename(a).toLowerCase()).find(isWriteLikeName);
    return named ? writeLike(`${name} runs a write-like command (${named} is a write-like command)`) : verdict;
  };
}

const commandRule: CommandRule = (args, ctx) => {
  const firstOperand = args.findIndex((a) => !a.startsWith("-"));
  const options = firstOperand === -1 ? args : args.slice(0, firstOperand);
  if (options.includes("-v") || options.includes("-V")) return readOnly("command -v only looks up a name");
  return wrapperRule("command", [])(args, ctx);
};

const GIT_READ_ONLY = new Set([
  "status", "log", "diff", "show", "blame", "rev-parse", "ls-files", "ls-tree",
  "grep", "describe", "shortlog", "cat-file", "help", "--version",
]);
const GIT_GLOBAL_OPTIONS_WITH_VALUE = new Set(["-C", "-c", "--git-dir", "--work-tree"]);
const GIT_LISTING_FLAGS = new Set(["-a", "-r", "-v", "-vv", "--list", "--show-current", "--all", "--remotes"]);

const gitRule: CommandRule = (args) => {
  let i = 0;
  while (i < args.length && args[i].startsWith("-") && args[i] !== "--version") {
    i += GIT_GLOBAL_OPTIONS_WITH_VALUE.has(args[i]) ? 2 : 1;
  }
  const sub = args[i] ?? "";
  const rest = args.slice(i + 1);
  if (rest.some((a) => a === "--output" || a.startsWith("--output="))) return writeLike(`git ${sub} --output writes a file`);
  if (GIT_READ_ONLY.has(sub)) return readOnly(`git ${sub} only reads`);
  if ((sub === "branch" || sub === "remote" || sub === "tag") && rest.every((a) => GIT_LISTING_FLAGS.has(a))) {
    return readOnly(`git ${sub} only lists`);
  }
  if (sub === "stash" && rest[0] === "list") return readOnly("git stash list only reads");
  if (sub === "config" && (rest[0] === "--get" || rest[0] === "--list" || rest[0] === "-l")) {
    return readOnly("git config lookup only reads");
  }
  return writeLike(sub ? `git ${sub} may change the repository` : "git without a read-only subcommand");
};

export const COMMAND_RULES: ReadonlyMap<string, CommandRule> = new Map<string, CommandRule>([
  ["git", gitRule],
  ["pip", pipRule],
  ["pip3", pipRule],
  ["npm", npmRule],
  ["yarn", yarnRule],
  ["pnpm", pnpmRule],
  ["python", pythonRule],
  ["python3", pythonRule],
  ["sed", sedRule],
  ["gsed", sedRule],
  ["awk", awkRule],
  ["gawk", awkRule],
  ["mawk", awkRule],
  ["find", findRule],
  [
    "xargs",
    wrapperRule("xargs", [
      "-a", "-d", "-E", "-I", "-L", "-n", "-P", "-s",
      "--arg-file", "--delimiter", "--eof", "--max-lines", "--max-args", "--max-procs", "--max-chars",
    ]),
  ],
  ["env", wrapperRule("env", ["-u", "-C", "-S", "--unset", "--chdir", "--split-string"])],
  ["command", commandRule],
  ["builtin", wrapperRule("builtin", [])],
  ["nohup", wrapperRule("nohup", [])],
  ["time", wrapperRule("time", [])],
  ["nice", wrapperRule("nice", ["-n", "--adjustment"])],
  ["timeout", wrapperRule("timeout", ["-s", "-k", "--signal", "--kill-after"], 1)],
]);

function lowerSet(names: string[]): Set<string> {
  return new Set(names.map((n) => n.trim().toLowerCase()).filter((n) => n.length > 0));
}

function makeWordClassifier(policy: CommandPolicy): ClassifyWords {
  const operatorReads = lowerSet(policy.readPatterns);
  const operatorWrites = lowerSet(policy.writePatterns);

  const isWriteLikeName = (name: string) => WRITE_LIKE_COMMANDS.has(name) || operatorWrites.has(name);

  const classifyWords: ClassifyWords = (words) => {
    const cmd = parseCommand(words);
    if (!cmd) return readOnly("no command");
    const { base, args } = cmd;

    if (base === "cd") return readOnly("cd only changes directory");
    if (WRITE_LIKE_COMMANDS.has(base)) return writeLike(`${base} is a write-like command`);
    if (operatorWrites.has(base)) return writeLike(`${base} is declared write-like by policy`);

    const rule = COMMAND_RULES.get(base);
    if (rule) {
      const verdict = rule(args, { classifyWords, isWriteLikeName });
      if (verdict) return verdict;
    }

    if (READ_ONLY_COMMANDS.has(base)) return readOnly(`${base} is a read-only command`);
    if (operatorReads.has(base)) return readOnly(`${base} is declared read-only by policy`);

    return policy.extrasafe
      ? writeLike(`${base} is not a known read-only command`)
      : readOnly(`${base} is unknown and extrasafe is off`);
  };
  return classifyWords;
}

function classifyScanned(command: string, policy: CommandPolicy): Verdict {
  const scan = scanCommand(command);
  if (scan.redirection !== null) return writeLike(`output redirection (${scan.redirection})`);

  const classifyWords = makeWordClassifier(policy);
  for (const segment of scan.segments) {
    const verdict = classifyWords(splitWords(segment));
    if (verdict.risk === "write-like") return verdict;
  }

  for (const inner of scan.substitutions) {
    const verdict = classifyScanned(inner, policy);
    if (verdict.risk === "write-like") return writeLike(`command substitution: ${verdict.reason}`);
  }

  return readOnly("every command only reads");
}

export function classifyDetailed(command: string, policy: CommandPolicy): Verdict {
  if (command.trim().length === 0) return readOnly("empty command");
  try {
    return classifyScanned(command, policy);
  } catch (err) {
    if (!(err instanceof TokenizeError)) throw err;
    return policy.extrasafe
      ? writeLike(`could not tokenize command (${err.message})`)
      : readOnly(`could not tokenize command (${err.message}) and extrasafe is off`);
  }
}

export function classify(command: string, policy: CommandPolicy): CommandRisk {
  return classifyDetailed(command, policy).risk;
}
