import { promises as fs } from "node:fs";
import path from "node:path";
import { PathHelper } from "@reqforge/shared";

export interface RunLogEvent {
  type: string;
  timestamp: string;
  data: Record<string, unknown>;
}

export type RunLogEventType = "run_started" | "repair" | "workflow_step" | "review_gate" | "run_finished";

const isRunLogEvent = (value: unknown): value is RunLogEvent =>
  typeof value === "object" &&
  value !== null &&
  "type" in value &&
  typeof value.type === "string" &&
  "timestamp" in value &&
  typeof value.timestamp === "string" &&
  "data" in value &&
  typeof value.data === "object" &&
  value.data !== null &&
  !Array.isArray(value.data);

const parseEventLine = (line: string): RunLogEvent | undefined => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (error) {
    if (error instanceof SyntaxError) return undefined;
    throw error;
  }
  return isRunLogEvent(parsed) ? parsed : undefined;
};

export class RunLogger {
  readonly logPath: string;
  readonly logDir: string;
  readonly runId: string;

  constructor(workspaceRoot: string, runId: string, logDir: string = PathHelper.getLogsDir(workspaceRoot)) {
    this.logDir = path.resolve(workspaceRoot, logDir);
    this.runId = runId;
    this.logPath = path.join(this.logDir, `${runId}.jsonl`);
  }

  static createRunId(now: Date = new Date()): string {
    return `run-${now.toISOString().replace(/[:.]/g, "-")}`;
  }

  async log(type: RunLogEventType, data: Record<string, unknown>): Promise<void> {
    await fs.mkdir(path.dirname(this.logPath), { recursive: true });
    const event: RunLogEvent = {
      type,
      timestamp: new Date().toISOString(),
      data,
    };
    await fs.appendFile(this.logPath, `${JSON.stringify(event)}\n`, "utf8");
  }

  /** Stores a step's rendered output beside the log, e.g. a review gate report. */
  async writeArtifact(step: string, kind: string, payload: unknown): Promise<string> {
    const artifactDir = path.join(this.logDir, "artifacts");
    await fs.mkdir(artifactDir, { recursive: true });
    const safeStep = step.replace(/[^a-z0-9_-]/gi, "_");
    const safeKind = kind.replace(/[^a-z0-9_-]/gi, "_");
    const ext = typeof payload === "string" ? "md" : "json";
    const filePath = path.join(artifactDir, `${this.runId}-${safeStep}-${safeKind}.${ext}`);
    const content = typeof payload === "string" ? payload : JSON.stringify(payload, null, 2);
    await fs.writeFile(filePath, content, "utf8");
    return filePath;
  }

  /** Events of this run in append order; lines that are not well-formed events are skipped. */
  async readEvents(): Promise<RunLogEvent[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.logPath, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") return [];
      throw error;
    }
    // a run killed mid-append can leave a partial last line
    return raw
      .split("\n")
      .filter((line) => line.trim())
      .map(parseEventLine)
      .filter((event): event is RunLogEvent => event !== undefined);
  }
}
