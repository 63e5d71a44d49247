#!/usr/bin/env tsx
import { runHook } from "./hook.js";

/**
 * workgate hook gatekeeper.
 *
 * The agent host sends one JSON payload via stdin per hook event and reads
 * the exit code: 0 allow, 1 fatal, 2 blocked by policy. A block also prints
 * a JSON object on stdout describing the reason and the remediation.
 *
 * IMPORTANT:
 *  - Do NOT write anything to stdout except that JSON object.
 *  - Use stderr for logs.
 */

async function readAllStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  return Buffer.concat(chunks).toString("utf8").trim();
}

async function main(): Promise<void> {
  const stdin = await readAllStdin();
  const result = await runHook(stdin);
  for (const line of result.stderr) console.error(line);
  if (result.stdout) process.stdout.write(result.stdout);
  process.exitCode = result.exitCode;
}

main().catch((err) => {
  console.error("[workgate: fatal] hook crashed:", err);
  process.exitCode = 1;
});
