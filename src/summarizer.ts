import { ModelServiceError, errorMessage } from "./errors";
import {
  createChatCompletionsModel,
  type LanguageModel,
  type LanguageModelFactory,
} from "./llm";
import { MalformedPayloadError, meetingNotesSchema, parseNotesPayload } from "./notes";
import { buildPrompt } from "./prompt";
import type { Log, SummaryFailure, SummaryResult } from "./types";

export interface SummaryGeneratorOptions {
  modelId: string;
  /** API key for the model backend. Without one the generator is unavailable. */
  credential?: string;
  baseURL?: string;
  log?: Log;
}

function failure(kind: SummaryFailure["kind"], detail: string): SummaryFailure {
  return { status: "failure", kind, detail };
}

/**
 * Turns a transcript into summary, decisions and action items with one
 * structured-output request. Every outcome is returned as a
 * {@link SummaryResult}; nothing is thrown.
 */
export class SummaryGenerator {
  private constructor(
    private readonly model: LanguageModel | null,
    readonly modelId: string,
    readonly initError: string | undefined,
    private readonly log: Log,
  ) {}

  static initialize(
    options: SummaryGeneratorOptions,
    factory: LanguageModelFactory = createChatCompletionsModel,
  ): SummaryGenerator {
    const log = options.log ?? console.log;
    const apiKey = options.credential?.trim();
    if (!apiKey) {
      log("No API key for the summary model. Summarization is unavailable.");
      return new SummaryGenerator(null, options.modelId, "Missing API key.", log);
    }
    try {
      const model = factory({ apiKey, baseURL: options.baseURL });
      return new SummaryGenerator(model, options.modelId, undefined, log);
    } catch (error) {
      const detail = errorMessage(error);
      log(`Error creating the summary model client: ${detail}`);
      return new SummaryGenerator(null, options.modelId, detail, log);
    }
  }

  get available(): boolean {
    return this.model !== null;
  }

  async summarize(transcript: string): Promise<SummaryResult> {
    if (!this.model) {
      return failure("Unavailable", "Summary model not initialized. Check the API key.");
    }

    this.log(`Summarizing transcript (${transcript.length} chars) with ${this.modelId}...`);
    try {
      const body = await this.model.generate({
        model: this.modelId,
        prompt: buildPrompt(transcript),
        schemaName: "meeting_notes",
        schema: meetingNotesSchema,
      });
      if (body === null || body.trim() === "") {
        return failure("MalformedResponse", "Model returned an empty response.");
      }

      const notes = parseNotesPayload(body);
      this.log("Summarization complete.");
      return {
        status: "success",
        summary: notes.summary,
        decisions: notes.decisions,
        actionItems: notes.actionItems,
      };
    } catch (err: unknown) {
      if (err instanceof MalformedPayloadError) {
        return failure("MalformedResponse", err.message);
      }
      if (err instanceof ModelServiceError) {
        return failure("ServiceError", err.message);
      }
      return failure("Unexpected", errorMessage(err));
    }
  }
}
