import { vi } from "vitest";
import type { MeetingSummarizerConfig } from "../src/config";
import type { LanguageModel, StructuredRequest } from "../src/llm";
import type { RecognizerLoader } from "../src/recognizers";

export const silent = (): void => {};

export const config: MeetingSummarizerConfig = {
  transcription: { backend: "whisper", modelSize: "base" },
  summary: { provider: "gemini", modelId: "gemini-2.5-flash", apiKey: "test-secret" },
};

/** Language model whose every call answers with `body`, or throws it. */
export function stubModel(body: string | null | Error) {
  const generate = vi.fn(async (_request: StructuredRequest): Promise<string | null> => {
    if (body instanceof Error) throw body;
    return body;
  });
  const model: LanguageModel = { generate };
  return { model, generate };
}

/** Loader whose recognizer answers `transcribe` with `transcribe`. */
export function stubRecognizer(transcribe: (audioPath: string) => Promise<string>) {
  const recognizer = { transcribe: vi.fn(transcribe) };
  const load = vi.fn<RecognizerLoader>(async () => recognizer);
  return { load, recognizer };
}

export function failingLoader(message: string) {
  return vi.fn<RecognizerLoader>(async () => {
    throw new Error(message);
  });
}
