import { errorMessage } from "./errors";
import type { RecognizerLoader, SpeechRecognizer } from "./recognizers";
import type { Log, ModelSize, TranscriptResult } from "./types";

export const MODEL_NOT_LOADED = "Transcription model not loaded.";

export interface TranscriptionEngineOptions {
  modelSize: ModelSize;
  load: RecognizerLoader;
  log?: Log;
}

/**
 * Audio-to-text stage. Loading happens once in {@link initialize}; a model
 * that fails to load leaves the engine unavailable instead of throwing.
 */
export class TranscriptionEngine {
  private constructor(
    private readonly recognizer: SpeechRecognizer | null,
    readonly modelSize: ModelSize,
    readonly initError: string | undefined,
    private readonly log: Log,
  ) {}

  static async initialize(options: TranscriptionEngineOptions): Promise<TranscriptionEngine> {
    const log = options.log ?? console.log;
    log(`Loading transcription model: ${options.modelSize}...`);
    try {
      const recognizer = await options.load(options.modelSize);
      return new TranscriptionEngine(recognizer, options.modelSize, undefined, log);
    } catch (error) {
      const detail = errorMessage(error);
      log(`Error loading transcription model: ${detail}`);
      return new TranscriptionEngine(null, options.modelSize, detail, log);
    }
  }

  get available(): boolean {
    return this.recognizer !== null;
  }

  async transcribe(audioPath: string): Promise<TranscriptResult> {
    if (!this.recognizer) {
      return { text: "", ok: false, errorKind: "ModelUnavailable", errorDetail: MODEL_NOT_LOADED };
    }

    this.log(`Transcribing ${audioPath}...`);
    let text: string;
    try {
      text = (await this.recognizer.transcribe(audioPath)).trim();
    } catch (error) {
      this.log(`Transcription error: ${errorMessage(error)}`);
      return { text: "", ok: false, errorKind: "DecodeError", errorDetail: errorMessage(error) };
    }

    if (text === "") {
      return {
        text: "",
        ok: false,
        errorKind: "EmptyTranscript",
        errorDetail: `No speech found in ${audioPath}.`,
      };
    }
    this.log("Transcription complete.");
    return { text, ok: true };
  }
}
