import {
  StructuralValidator,
  checkDocumentCompletion,
  extractWorkflowOrder,
  renderStructuralReport,
  type CompletionStatus,
} from "@reqforge/core";
import { DocumentStore } from "../../documents/DocumentStore.js";

const USAGE =
  "Usage: reqforge validate --doc <file> [--template <file>] [--write-repairs] [--completion] [--strict] [--json]";

export interface ParsedValidateArgs {
  docPath?: string;
  templatePath?: string;
  writeRepairs: boolean;
  completion: boolean;
  strict: boolean;
  json: boolean;
  help: boolean;
}

export const parseValidateArgs = (argv: string[]): ParsedValidateArgs => {
  const parsed: ParsedValidateArgs = {
    writeRepairs: false,
    completion: false,
    strict: false,
    json: false,
    help: false,
  };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg?.startsWith("--doc=")) {
      parsed.docPath = arg.split("=")[1];
      continue;
    }
    switch (arg) {
      case "--doc":
        parsed.docPath = argv[i + 1];
        i += 1;
        break;
      case "--template":
        parsed.templatePath = argv[i + 1];
        i += 1;
        break;
      case "--write-repairs":
        parsed.writeRepairs = true;
        break;
      case "--completion":
        parsed.completion = true;
        break;
      case "--strict":
        parsed.strict = true;
        parsed.completion = true;
        break;
      case "--json":
        parsed.json = true;
        break;
      case "--help":
      case "-h":
        parsed.help = true;
        break;
      default:
        throw new Error(`Unknown option for validate: ${arg}\n${USAGE}`);
    }
  }
  return parsed;
};

export interface ValidateSummary {
  doc: string;
  valid: boolean;
  errors: string[];
  repairs: string[];
  repairsWritten: boolean;
  completion?: CompletionStatus;
}

/** Structural validation, optionally followed by the completion check. */
export class ValidateCommands {
  static async run(argv: string[], deps: { cwd?: string } = {}): Promise<ValidateSummary | undefined> {
    const args = parseValidateArgs(argv);
    if (args.help) {
      // eslint-disable-next-line no-console
      console.log(USAGE);
      return undefined;
    }
    if (!args.docPath) throw new Error(`Missing --doc\n${USAGE}`);
    const store = new DocumentStore(deps.cwd ?? process.cwd());
    const lines = await store.read(args.docPath);
    const template = args.templatePath ? await store.read(args.templatePath) : undefined;

    const validator = new StructuralValidator(lines, { templateLines: template, autoRepair: true });
    const errors = validator.validateAll();
    const repairsWritten = args.writeRepairs && errors.length === 0 && validator.repairsMade.length > 0;
    if (repairsWritten) await store.write(args.docPath, validator.lines);

    const summary: ValidateSummary = {
      doc: args.docPath,
      valid: errors.length === 0,
      errors: errors.map((error) => error.message),
      repairs: validator.repairsMade,
      repairsWritten,
    };
    if (args.completion && summary.valid) {
      summary.completion = checkDocumentCompletion(validator.lines, extractWorkflowOrder(validator.lines), {
        strict: args.strict,
      });
    }

    if (args.json) {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify(summary, null, 2));
      return summary;
    }
    const output = renderStructuralReport(errors, validator.repairsMade);
    if (repairsWritten) output.push(`Repairs written to ${args.docPath}`);
    if (summary.completion) output.push("", summary.completion.summary);
    // eslint-disable-next-line no-console
    console.log(output.join("\n"));
    return summary;
  }
}
