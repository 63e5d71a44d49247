#!/usr/bin/env tsx
import { runOperator } from "./operator.js";

async function main(): Promise<void> {
  const result = await runOperator(process.argv.slice(2));
  for (const line of result.stdout) console.log(line);
  for (const line of result.stderr) console.error(line);
  process.exitCode = result.exitCode;
}

main().catch((err) => {
  console.error("[workgate: fatal]", err);
  process.exitCode = 1;
});
