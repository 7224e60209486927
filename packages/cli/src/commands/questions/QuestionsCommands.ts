import { QuestionLedger, extractAllSectionIds, resolveSectionLedger } from "@reqforge/core";
import type { OpenQuestion } from "@reqforge/shared";
import { DocumentStore } from "../../documents/DocumentStore.js";

const USAGE = [
  "Usage:",
  "  reqforge questions list --doc <file> [--section <id>] [--all] [--json]",
  "  reqforge questions answer --doc <file> --section <id> --id <question id> --answer <text>",
].join("\n");

export interface ParsedQuestionsArgs {
  subcommand?: string;
  docPath?: string;
  sectionId?: string;
  questionId?: string;
  answer?: string;
  all: boolean;
  json: boolean;
}

export const parseQuestionsArgs = (argv: string[]): ParsedQuestionsArgs => {
  const [subcommand, ...rest] = argv;
  const parsed: ParsedQuestionsArgs = { subcommand, all: false, json: false };
  for (let i = 0; i < rest.length; i += 1) {
    const arg = rest[i];
    const next = rest[i + 1];
    switch (arg) {
      case "--doc":
        parsed.docPath = next;
        i += 1;
        break;
      case "--section":
        parsed.sectionId = next;
        i += 1;
        break;
      case "--id":
        parsed.questionId = next;
        i += 1;
        break;
      case "--answer":
        parsed.answer = next;
        i += 1;
        break;
      case "--all":
        parsed.all = true;
        break;
      case "--json":
        parsed.json = true;
        break;
      default:
        throw new Error(`Unknown option for questions: ${arg}\n${USAGE}`);
    }
  }
  return parsed;
};

export interface ListedQuestion extends OpenQuestion {
  ledger: string;
}

const collectQuestions = (lines: string[], sectionId: string | undefined): ListedQuestion[] => {
  const ledgers = sectionId
    ? [resolveSectionLedger(lines, sectionId)].filter((ledger): ledger is QuestionLedger => ledger !== undefined)
    : [QuestionLedger.forDocument(), ...extractAllSectionIds(lines).map((id) => QuestionLedger.forSection(id))];
  return ledgers.flatMap((ledger) =>
    ledger.questionsOrEmpty(lines).map((question) => ({ ...question, ledger: ledger.tableId })),
  );
};

export class QuestionsCommands {
  static async run(argv: string[], deps: { cwd?: string } = {}): Promise<ListedQuestion[] | OpenQuestion | undefined> {
    const args = parseQuestionsArgs(argv);
    if (!args.subcommand || args.subcommand === "--help") {
      // eslint-disable-next-line no-console
      console.log(USAGE);
      return undefined;
    }
    if (!args.docPath) throw new Error(`Missing --doc\n${USAGE}`);
    const store = new DocumentStore(deps.cwd ?? process.cwd());
    const lines = await store.read(args.docPath);

    switch (args.subcommand) {
      case "list": {
        const questions = collectQuestions(lines, args.sectionId).filter(
          (question) => args.all || question.status !== "Resolved",
        );
        if (args.json) {
          // eslint-disable-next-line no-console
          console.log(JSON.stringify(questions, null, 2));
        } else if (questions.length === 0) {
          // eslint-disable-next-line no-console
          console.log("No questions found.");
        } else {
          for (const question of questions) {
            const answer = question.answer ? ` -> ${question.answer}` : "";
            // eslint-disable-next-line no-console
            console.log(`${question.questionId} [${question.status}] (${question.ledger}) ${question.question}${answer}`);
          }
        }
        return questions;
      }
      case "answer": {
        if (!args.sectionId || !args.questionId || args.answer === undefined) {
          throw new Error(`questions answer requires --section, --id and --answer\n${USAGE}`);
        }
        if (!args.answer.trim()) throw new Error("Answer must not be empty");
        const ledger = resolveSectionLedger(lines, args.sectionId);
        if (!ledger) throw new Error(`No question table found for section '${args.sectionId}'`);
        const result = ledger.answer(lines, args.questionId, args.answer);
        if (result.resolved === 0) {
          throw new Error(`Question '${args.questionId}' not found or already resolved`);
        }
        const written = await store.write(args.docPath, result.lines);
        const updated = ledger
          .questionsOrEmpty(result.lines)
          .find((question) => question.questionId === args.questionId?.trim());
        // eslint-disable-next-line no-console
        console.log(`Answered ${args.questionId} in ${ledger.tableId}${written.backupPath ? ` (backup: ${written.backupPath})` : ""}`);
        return updated;
      }
      default:
        throw new Error(`Unknown questions subcommand: ${args.subcommand}\n${USAGE}`);
    }
  }
}
