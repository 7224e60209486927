import {
  Logger,
  type CompletionService,
  type DraftRequest,
  type IntegrateRequest,
  type ProposedQuestion,
  type QuestionRequest,
  type ReviewRequest,
  type ReviewResponse,
} from "@reqforge/shared";
import type { ChatAdapter, ChatMessage } from "../adapters/AdapterTypes.js";
import { parseQuestionList, parseReviewResponse } from "../parsing/JsonExtraction.js";
import { ProfileLoader } from "../profiles/ProfileLoader.js";
import { buildDraftPrompt, buildIntegratePrompt, buildQuestionsPrompt, buildReviewPrompt } from "../prompts/PromptBuilder.js";

export interface LlmCompletionServiceOptions {
  adapter: ChatAdapter;
  profiles?: ProfileLoader;
  logger?: Logger;
  maxTokens?: number;
}

/** CompletionService backed by a chat adapter and markdown profiles. */
export class LlmCompletionService implements CompletionService {
  private readonly adapter: ChatAdapter;
  private readonly profiles: ProfileLoader;
  private readonly logger: Logger;
  private readonly maxTokens?: number;

  constructor(options: LlmCompletionServiceOptions) {
    this.adapter = options.adapter;
    this.profiles = options.profiles ?? new ProfileLoader();
    this.logger = (options.logger ?? new Logger()).child("llm");
    this.maxTokens = options.maxTokens;
  }

  async draft(request: DraftRequest): Promise<string> {
    const profile = await this.profiles.buildFullProfile(request.profile);
    return this.call("draft", buildDraftPrompt(request, profile));
  }

  async generateQuestions(request: QuestionRequest): Promise<ProposedQuestion[]> {
    const profile = await this.profiles.buildFullProfile(request.profile);
    const output = await this.call("questions", buildQuestionsPrompt(request, profile));
    return parseQuestionList(output, request.sectionId);
  }

  async integrate(request: IntegrateRequest): Promise<string> {
    const profile = await this.profiles.buildFullProfile(request.profile);
    return this.call("integrate", buildIntegratePrompt(request, profile));
  }

  async review(request: ReviewRequest): Promise<ReviewResponse> {
    const profile = await this.profiles.buildFullProfile(request.profile);
    const output = await this.call("review", buildReviewPrompt(request, profile));
    return parseReviewResponse(output);
  }

  private async call(task: string, messages: ChatMessage[]): Promise<string> {
    const started = Date.now();
    const result = await this.adapter.complete({ messages, maxTokens: this.maxTokens });
    const usage = result.usage
      ? ` tokens=${result.usage.promptTokens ?? "?"}/${result.usage.completionTokens ?? "?"}`
      : "";
    this.logger.debug(`${task} via ${result.adapter}:${result.model} in ${Date.now() - started}ms${usage}`);
    return result.output;
  }
}
