#!/usr/bin/env node
/**
 * Field CLI - evaluates field operators on JSON-tagged values, one NDJSON
 * result line per command.
 *
 * Usage:
 *   tsx cli.ts '{"op":"less","args":[{"UInt64":"1"},{"Float64":1.5}]}'   # one-shot
 *   tsx cli.ts                                                           # one command per input line
 *
 * Environment:
 *   FIELD_HASH_ALGORITHM - digest used by "hash" (default: sha256)
 *   FIELD_OUTPUT         - "json" (default) or "text" for bare results
 */

import * as readline from "node:readline";
import { evaluateCommand, parseCommand, type CommandOptions } from "./field/command.ts";
import { FieldError } from "./field/errors.ts";

const output = process.env.FIELD_OUTPUT === "text" ? "text" : "json";

const options: CommandOptions = {
  hash: { algorithm: process.env.FIELD_HASH_ALGORITHM ?? "sha256" },
};

function run(line: string): void {
  const cmd = parseCommand(JSON.parse(line));
  const result = evaluateCommand(cmd, options);
  if (output === "text") {
    console.log(typeof result === "object" ? JSON.stringify(result) : String(result));
  } else {
    console.log(JSON.stringify({ op: cmd.op, result }));
  }
}

function describeError(err: unknown): string {
  if (err instanceof FieldError) {
    return JSON.stringify({ error: { code: err.code, name: err.codeName, message: err.message } });
  }
  return JSON.stringify({ error: { message: err instanceof Error ? err.message : String(err) } });
}

async function runInteractive(): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin });

  for await (const raw of rl) {
    const line = raw.trim();
    if (!line) continue;
    if (line === "exit" || line === "quit") break;

    try {
      run(line);
    } catch (err) {
      console.error(describeError(err));
    }
  }

  rl.close();
}

async function main() {
  const command = process.argv[2];
  if (command) {
    run(command);
  } else {
    await runInteractive();
  }
}

main().catch((err) => {
  console.error(describeError(err));
  process.exit(1);
});
