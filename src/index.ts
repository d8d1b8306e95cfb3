export {
  loadConfig,
  SUMMARY_PROVIDERS,
  TRANSCRIPTION_BACKENDS,
  type MeetingSummarizerConfig,
  type SummaryConfig,
  type SummaryProvider,
  type TranscriptionBackend,
  type TranscriptionConfig,
} from "./config";
export { ConfigError, ModelServiceError } from "./errors";
export { renderMarkdown, toJson } from "./format";
export {
  ChatCompletionsModel,
  createChatCompletionsModel,
  type LanguageModel,
  type LanguageModelFactory,
  type StructuredRequest,
} from "./llm";
export { MeetingSummarizer, type CreateOptions, type Engines } from "./meeting";
export { formatActionItem, meetingNotesSchema, parseNotesPayload, type MeetingNotes } from "./notes";
export { buildPrompt, UNASSIGNED_OWNER } from "./prompt";
export {
  assemblyLoader,
  recognizerLoaderFor,
  whisperCppLoader,
  whisperLoader,
  type RecognizerLoader,
  type SpeechRecognizer,
} from "./recognizers";
export { SummaryGenerator } from "./summarizer";
export { MODEL_NOT_LOADED, TranscriptionEngine } from "./transcriber";
export * from "./types";
