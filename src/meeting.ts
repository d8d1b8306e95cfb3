import type { MeetingSummarizerConfig } from "./config";
import type { LanguageModelFactory } from "./llm";
import { recognizerLoaderFor, type RecognizerLoader } from "./recognizers";
import { SummaryGenerator } from "./summarizer";
import { TranscriptionEngine } from "./transcriber";
import type { Log, RunResult, RunState } from "./types";

export interface Engines {
  transcription: TranscriptionEngine;
  summary: SummaryGenerator;
}

export interface CreateOptions {
  log?: Log;
  /** Replaces the recognizer picked from `config.transcription.backend`. */
  loadRecognizer?: RecognizerLoader;
  createModel?: LanguageModelFactory;
}

export interface MeetingSummarizerOptions {
  onStateChange?: (state: RunState) => void;
}

/**
 * Runs transcription, then summarization, for one recording at a time.
 *
 * Engines are initialized once and may be shared by several summarizers;
 * each instance tracks the state of its own current run.
 */
export class MeetingSummarizer {
  private current: RunState = "Idle";

  constructor(
    readonly engines: Engines,
    private readonly options: MeetingSummarizerOptions = {},
  ) {}

  static async initializeEngines(
    config: MeetingSummarizerConfig,
    options: CreateOptions = {},
  ): Promise<Engines> {
    const transcription = await TranscriptionEngine.initialize({
      modelSize: config.transcription.modelSize,
      load: options.loadRecognizer ?? recognizerLoaderFor(config.transcription),
      log: options.log,
    });
    const summary = SummaryGenerator.initialize(
      {
        modelId: config.summary.modelId,
        credential: config.summary.apiKey,
        baseURL: config.summary.baseURL,
        log: options.log,
      },
      options.createModel,
    );
    return { transcription, summary };
  }

  static async create(
    config: MeetingSummarizerConfig,
    options: CreateOptions & MeetingSummarizerOptions = {},
  ): Promise<MeetingSummarizer> {
    const engines = await MeetingSummarizer.initializeEngines(config, options);
    return new MeetingSummarizer(engines, { onStateChange: options.onStateChange });
  }

  get state(): RunState {
    return this.current;
  }

  availability(): { transcription: boolean; summary: boolean } {
    return {
      transcription: this.engines.transcription.available,
      summary: this.engines.summary.available,
    };
  }

  async run(audioPath: string): Promise<RunResult> {
    this.moveTo("Idle");
    this.moveTo("Transcribing");
    const transcript = await this.engines.transcription.transcribe(audioPath);
    if (!transcript.ok) {
      this.moveTo("TranscriptionFailed");
      return { state: "TranscriptionFailed", audioPath, transcript };
    }
    this.moveTo("Transcribed");

    this.moveTo("Summarizing");
    const summary = await this.engines.summary.summarize(transcript.text);
    if (summary.status === "failure") {
      this.moveTo("SummaryFailed");
      return { state: "SummaryFailed", audioPath, transcript: transcript.text, failure: summary };
    }
    this.moveTo("Done");
    return { state: "Done", audioPath, transcript: transcript.text, summary };
  }

  private moveTo(state: RunState): void {
    this.current = state;
    this.options.onStateChange?.(state);
  }
}
