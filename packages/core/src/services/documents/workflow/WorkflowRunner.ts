import {
  DEFAULT_DOC_TYPE,
  Logger,
  isReviewGateTarget,
  type CompletionService,
  type DocumentLines,
} from "@reqforge/shared";
import type { PolicyRegistry } from "../../config/PolicyRegistry.js";
import type { RunLogger } from "../../runtime/RunLogger.js";
import { extractMetadata, extractReviewGateResults, extractWorkflowOrder } from "../markers/SpanParser.js";
import { executeReviewGate } from "../review/ReviewGateRunner.js";
import { applyVersionMilestone } from "../versioning/DocumentVersioning.js";
import { handleSection } from "./SectionHandlers.js";
import { classifySectionState, getSectionState, isSectionComplete } from "./SectionState.js";
import { emptyResult, toIsoDate, type StepContext, type WorkflowResult } from "./WorkflowTypes.js";

export const DEFAULT_MAX_STEPS = 10;

export interface WorkflowRunnerOptions {
  policies: PolicyRegistry;
  completion: CompletionService;
  /** Overrides the document's `meta:doc_type`. */
  docType?: string;
  logger?: Logger;
  runLogger?: RunLogger;
  now?: () => Date;
}

/**
 * Walks the workflow order and advances exactly one target per step. The runner owns
 * its copy of the document; read the result through `lines`.
 */
export class WorkflowRunner {
  readonly docType: string;
  readonly workflowOrder: readonly string[];
  private current: string[];
  private readonly logger: Logger;

  constructor(
    lines: DocumentLines,
    private readonly options: WorkflowRunnerOptions,
  ) {
    this.current = [...lines];
    this.workflowOrder = extractWorkflowOrder(lines);
    this.docType = options.docType ?? extractMetadata(lines).doc_type ?? DEFAULT_DOC_TYPE;
    this.logger = (options.logger ?? new Logger()).child("workflow");
    // resolve every target up front so a missing gate policy fails before any work
    for (const target of this.workflowOrder) options.policies.resolve(this.docType, target);
  }

  get lines(): string[] {
    return [...this.current];
  }

  async runOnce(): Promise<WorkflowResult> {
    const context: StepContext = {
      docType: this.docType,
      workflowOrder: this.workflowOrder,
      completion: this.options.completion,
      logger: this.logger,
      today: toIsoDate(this.options.now?.() ?? new Date()),
    };
    const gateResults = extractReviewGateResults(this.current);

    for (const targetId of this.workflowOrder) {
      const policy = this.options.policies.resolve(this.docType, targetId);
      if (isReviewGateTarget(targetId)) {
        if (gateResults.get(targetId)?.status === "passed") continue;
        this.logger.info(`Running ${targetId}`);
        const result = await executeReviewGate(this.current, targetId, policy, context);
        await this.options.runLogger?.log("review_gate", {
          gateId: targetId,
          passed: result.reviewGate?.passed ?? false,
          issues: result.reviewGate?.issues.length ?? 0,
          scope: result.reviewGate?.scopeSections ?? [],
        });
        return this.commit(result, context.today, result.reviewGate?.passed ?? false);
      }

      const classification = classifySectionState(getSectionState(this.current, targetId));
      if (classification === "missing" || classification === "locked" || classification === "complete") continue;
      this.logger.info(`Processing ${targetId} (${classification}, ${policy.mode})`);
      const result = await handleSection(this.current, targetId, policy, context);
      return this.commit(result, context.today, isSectionComplete(getSectionState(result.lines, targetId)));
    }

    this.logger.info("All workflow targets complete");
    return { ...emptyResult(this.current, "complete"), summaries: ["All workflow targets complete"] };
  }

  async runUntilBlocked(maxSteps: number = DEFAULT_MAX_STEPS): Promise<WorkflowResult[]> {
    const results: WorkflowResult[] = [];
    for (let step = 0; step < maxSteps; step += 1) {
      const result = await this.runOnce();
      results.push(result);
      if (result.blocked || !result.changed || result.action === "complete") break;
    }
    return results;
  }

  private async commit(result: WorkflowResult, today: string, targetComplete: boolean): Promise<WorkflowResult> {
    let final = result;
    if (result.changed && targetComplete && result.targetId) {
      const milestone = applyVersionMilestone(
        result.lines,
        result.targetId,
        this.options.policies.milestoneFor(this.docType, result.targetId),
        today,
      );
      if (milestone.version) {
        this.logger.info(`Version ${milestone.previousVersion} -> ${milestone.version}`);
        final = {
          ...result,
          lines: milestone.lines,
          version: milestone.version,
          summaries: [...result.summaries, `Version bumped to ${milestone.version}`],
        };
      }
    }
    this.current = [...final.lines];
    for (const reason of final.blockedReasons) this.logger.warn(`${final.targetId ?? "workflow"} blocked: ${reason}`);
    await this.options.runLogger?.log("workflow_step", {
      targetId: final.targetId,
      action: final.action,
      changed: final.changed,
      blocked: final.blocked,
      blockedReasons: final.blockedReasons,
      summaries: final.summaries,
      version: final.version,
    });
    return final;
  }
}
