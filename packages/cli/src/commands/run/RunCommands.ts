import { LlmCompletionService, OpenAiAdapter, ProfileLoader } from "@reqforge/agents";
import {
  PolicyRegistry,
  RunLogger,
  StructuralValidator,
  WorkflowRunner,
  renderReviewGateOutput,
  renderStructuralReport,
  type WorkflowResult,
} from "@reqforge/core";
import { Logger, parseLogLevel, type CompletionService, type LogLevel } from "@reqforge/shared";
import { loadConfig, type ReqforgeConfig } from "../../config/ConfigLoader.js";
import { DocumentStore } from "../../documents/DocumentStore.js";

const USAGE =
  "Usage: reqforge run --doc <file> [--template <file>] [--config <yaml>] [--profiles <dir>] [--policies <yaml>] [--doc-type <type>] [--until-blocked] [--max-steps <n>] [--dry-run] [--json] [--log-level <lvl>]";

export interface ParsedRunArgs {
  docPath?: string;
  templatePath?: string;
  configPath?: string;
  profilesDir?: string;
  policyPath?: string;
  docType?: string;
  untilBlocked: boolean;
  maxSteps: number;
  dryRun: boolean;
  json: boolean;
  logLevel?: LogLevel;
  help: boolean;
}

const parsePositiveInt = (value: string | undefined, flag: string): number => {
  const parsed = Number(value);
  if (!value || !Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid ${flag}: expected a positive integer.`);
  }
  return parsed;
};

export const parseRunArgs = (argv: string[]): ParsedRunArgs => {
  const parsed: ParsedRunArgs = {
    untilBlocked: false,
    maxSteps: 10,
    dryRun: false,
    json: false,
    help: false,
  };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const next = argv[i + 1];
    switch (arg) {
      case "--doc":
        parsed.docPath = next;
        i += 1;
        break;
      case "--template":
        parsed.templatePath = next;
        i += 1;
        break;
      case "--config":
        parsed.configPath = next;
        i += 1;
        break;
      case "--profiles":
        parsed.profilesDir = next;
        i += 1;
        break;
      case "--policies":
        parsed.policyPath = next;
        i += 1;
        break;
      case "--doc-type":
        parsed.docType = next;
        i += 1;
        break;
      case "--until-blocked":
        parsed.untilBlocked = true;
        break;
      case "--max-steps":
        parsed.maxSteps = parsePositiveInt(next, "--max-steps");
        i += 1;
        break;
      case "--dry-run":
        parsed.dryRun = true;
        break;
      case "--json":
        parsed.json = true;
        break;
      case "--log-level":
        parsed.logLevel = parseLogLevel(next, "--log-level");
        i += 1;
        break;
      case "--help":
      case "-h":
        parsed.help = true;
        break;
      default:
        throw new Error(`Unknown option for run: ${arg}\n${USAGE}`);
    }
  }
  return parsed;
};

export interface RunStepSummary {
  targetId?: string;
  action: WorkflowResult["action"];
  changed: boolean;
  blocked: boolean;
  blockedReasons: string[];
  summaries: string[];
  questionsGenerated: number;
  questionsResolved: number;
  version?: string;
}

export interface RunSummary {
  doc: string;
  docType: string;
  created: boolean;
  repairs: string[];
  steps: RunStepSummary[];
  changed: boolean;
  blocked: boolean;
  written: boolean;
  backupPath?: string;
  runLog: string;
}

export interface RunCommandDeps {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Replaces the chat-backed completion service. */
  completion?: CompletionService;
  now?: () => Date;
}

const toStepSummary = (result: WorkflowResult): RunStepSummary => ({
  targetId: result.targetId,
  action: result.action,
  changed: result.changed,
  blocked: result.blocked,
  blockedReasons: result.blockedReasons,
  summaries: result.summaries,
  questionsGenerated: result.questionsGenerated,
  questionsResolved: result.questionsResolved,
  version: result.version,
});

const buildCompletionService = (config: ReqforgeConfig, logger: Logger): CompletionService =>
  new LlmCompletionService({
    adapter: new OpenAiAdapter({
      model: config.model,
      apiKey: config.apiKey,
      baseUrl: config.baseUrl,
      maxTokens: config.maxTokens,
      timeoutMs: config.timeoutMs,
    }),
    profiles: config.profilesDir ? new ProfileLoader(config.profilesDir) : undefined,
    logger,
    maxTokens: config.maxTokens,
  });

const renderSummary = (summary: RunSummary): string[] => {
  const lines = [`Document: ${summary.doc} (${summary.docType})`];
  if (summary.created) lines.push("Created from template");
  for (const repair of summary.repairs) lines.push(`Repaired: ${repair}`);
  for (const step of summary.steps) {
    const state = step.blocked ? "blocked" : step.changed ? "changed" : "unchanged";
    lines.push(`- ${step.targetId ?? "(workflow)"}: ${step.action} [${state}]`);
    for (const text of step.summaries) lines.push(`    ${text}`);
    for (const reason of step.blockedReasons) lines.push(`    blocked: ${reason}`);
  }
  lines.push(summary.written ? `Wrote ${summary.doc}` : summary.changed ? "Dry run: document not written" : "No changes");
  if (summary.backupPath) lines.push(`Backup: ${summary.backupPath}`);
  lines.push(`Run log: ${summary.runLog}`);
  return lines;
};

export class RunCommands {
  static async run(argv: string[], deps: RunCommandDeps = {}): Promise<RunSummary | undefined> {
    const args = parseRunArgs(argv);
    if (args.help) {
      // eslint-disable-next-line no-console
      console.log(USAGE);
      return undefined;
    }
    if (!args.docPath) throw new Error(`Missing --doc\n${USAGE}`);
    const cwd = deps.cwd ?? process.cwd();
    const config = await loadConfig({
      cwd,
      env: deps.env,
      configPath: args.configPath,
      cli: { logLevel: args.logLevel, profilesDir: args.profilesDir, policyPath: args.policyPath },
    });
    const logger = new Logger({ level: config.logLevel, tag: "run" });
    const store = new DocumentStore(cwd, deps.now);
    const now = deps.now ?? (() => new Date());

    const template = args.templatePath ? await store.read(args.templatePath) : undefined;
    const created = !(await store.exists(args.docPath));
    if (created && !template) {
      throw new Error(`Document not found: ${store.resolve(args.docPath)} (pass --template to create it)`);
    }
    const source = created && template ? template : await store.read(args.docPath);

    const validator = new StructuralValidator(source, { templateLines: template, autoRepair: true });
    const errors = validator.validateAll();
    if (errors.length > 0) {
      throw new Error(renderStructuralReport(errors, validator.repairsMade).join("\n"));
    }
    const runLogger = new RunLogger(cwd, RunLogger.createRunId(now()));
    await runLogger.log("run_started", { doc: args.docPath, created });
    for (const repair of validator.repairsMade) {
      logger.info(`Repaired: ${repair}`);
      await runLogger.log("repair", { repair });
    }

    const policies = await PolicyRegistry.load(config.policyPath);
    const runner = new WorkflowRunner(validator.lines, {
      policies,
      completion: deps.completion ?? buildCompletionService(config, logger),
      docType: args.docType,
      logger,
      runLogger,
      now,
    });
    const results = args.untilBlocked ? await runner.runUntilBlocked(args.maxSteps) : [await runner.runOnce()];

    for (const result of results) {
      if (result.reviewGate) {
        await runLogger.writeArtifact(result.reviewGate.gateId, "review", renderReviewGateOutput(result.reviewGate));
      }
    }

    const changed = created || validator.repairsMade.length > 0 || results.some((result) => result.changed);
    const written = changed && !args.dryRun ? await store.write(args.docPath, runner.lines) : undefined;
    const summary: RunSummary = {
      doc: args.docPath,
      docType: runner.docType,
      created,
      repairs: validator.repairsMade,
      steps: results.map(toStepSummary),
      changed,
      blocked: results[results.length - 1]?.blocked ?? false,
      written: written !== undefined,
      backupPath: written?.backupPath,
      runLog: runLogger.logPath,
    };
    await runLogger.log("run_finished", { changed, blocked: summary.blocked, written: summary.written });

    // eslint-disable-next-line no-console
    console.log(args.json ? JSON.stringify(summary, null, 2) : renderSummary(summary).join("\n"));
    return summary;
  }
}
