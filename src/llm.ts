import OpenAI from "openai";
import { zodResponseFormat } from "openai/helpers/zod";
import type { ZodTypeAny } from "zod";
import { ModelServiceError } from "./errors";

export interface StructuredRequest {
  model: string;
  prompt: string;
  /** Name the schema is registered under in the response-format directive. */
  schemaName: string;
  schema: ZodTypeAny;
}

/**
 * A language model able to answer with schema-constrained output.
 * Implementations throw {@link ModelServiceError} for remote-service failures.
 */
export interface LanguageModel {
  generate(request: StructuredRequest): Promise<string | null>;
}

export interface ModelCredentials {
  apiKey: string;
  baseURL?: string;
}

export type LanguageModelFactory = (credentials: ModelCredentials) => LanguageModel;

/**
 * Chat-completions backed model. Works against OpenAI and any endpoint that
 * speaks the same API (Gemini's OpenAI-compatible endpoint included).
 */
export class ChatCompletionsModel implements LanguageModel {
  constructor(private readonly client: OpenAI) {}

  async generate(request: StructuredRequest): Promise<string | null> {
    try {
      const response = await this.client.chat.completions.create({
        model: request.model,
        messages: [{ role: "user", content: request.prompt }],
        temperature: 0.2,
        response_format: zodResponseFormat(request.schema, request.schemaName),
      });
      return response.choices[0]?.message?.content ?? null;
    } catch (err: unknown) {
      if (err instanceof OpenAI.APIError) {
        throw new ModelServiceError(err.message, err.status, { cause: err });
      }
      throw err;
    }
  }
}

export const createChatCompletionsModel: LanguageModelFactory = ({ apiKey, baseURL }) =>
  new ChatCompletionsModel(new OpenAI({ apiKey, baseURL, maxRetries: 0 }));
