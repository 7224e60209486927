#!/usr/bin/env node
import { readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { QuestionsCommands } from "../commands/questions/QuestionsCommands.js";
import { RunCommands } from "../commands/run/RunCommands.js";
import { ValidateCommands } from "../commands/validate/ValidateCommands.js";

const USAGE =
  "Usage: reqforge <run|validate|questions> [...args]\n" +
  "  run        advance the document workflow (reqforge run --help)\n" +
  "  validate   check document structure and completion\n" +
  "  questions  list or answer open questions";

const readVersion = (): string => {
  const packagePath = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../package.json");
  try {
    const parsed: unknown = JSON.parse(readFileSync(packagePath, "utf8"));
    if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
      return parsed.version;
    }
    return "dev";
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return "dev";
    throw error;
  }
};

export interface EntrypointOutcome {
  /** True when the command finished but could not make progress. */
  blocked: boolean;
}

export class ReqforgeEntrypoint {
  static async run(argv: string[] = process.argv.slice(2)): Promise<EntrypointOutcome> {
    const [command, ...rest] = argv;
    if (command === "--version" || command === "-v" || command === "version") {
      // eslint-disable-next-line no-console
      console.log(readVersion());
      return { blocked: false };
    }
    if (!command) throw new Error(USAGE);
    if (command === "--help" || command === "-h" || command === "help") {
      // eslint-disable-next-line no-console
      console.log(USAGE);
      return { blocked: false };
    }
    if (command === "run") {
      const summary = await RunCommands.run(rest);
      return { blocked: summary?.blocked ?? false };
    }
    if (command === "validate") {
      const summary = await ValidateCommands.run(rest);
      const incomplete = summary?.completion !== undefined && !summary.completion.complete;
      return { blocked: summary !== undefined && (!summary.valid || incomplete) };
    }
    if (command === "questions") {
      await QuestionsCommands.run(rest);
      return { blocked: false };
    }
    throw new Error(`Unknown command: ${command}`);
  }
}

const invokedPath = process.argv[1] ? path.resolve(process.argv[1]) : undefined;
if (invokedPath && (invokedPath === fileURLToPath(import.meta.url) || invokedPath.endsWith(`${path.sep}reqforge`))) {
  ReqforgeEntrypoint.run()
    .then((outcome) => {
      if (outcome.blocked) process.exitCode = 1;
    })
    .catch((error: unknown) => {
      // eslint-disable-next-line no-console
      console.error(error instanceof Error ? error.message : error);
      process.exitCode = 1;
    });
}
