export const MODEL_SIZES = ["tiny", "base", "small", "medium", "large"] as const;
export type ModelSize = (typeof MODEL_SIZES)[number];

export type TranscriptionErrorKind =
  | "ModelUnavailable"
  | "DecodeError"
  | "EmptyTranscript";

export interface TranscriptSuccess {
  readonly text: string;
  readonly ok: true;
}

export interface TranscriptFailure {
  readonly text: "";
  readonly ok: false;
  readonly errorKind: TranscriptionErrorKind;
  readonly errorDetail: string;
}

export type TranscriptResult = TranscriptSuccess | TranscriptFailure;

export type SummaryErrorKind =
  | "Unavailable"
  | "MalformedResponse"
  | "ServiceError"
  | "Unexpected";

export interface SummarySuccess {
  readonly status: "success";
  readonly summary: string;
  /** In the order the model emitted them. */
  readonly decisions: readonly string[];
  /** Formatted as `"<owner>: <task>"`, owner defaulting to `TBD`. */
  readonly actionItems: readonly string[];
}

export interface SummaryFailure {
  readonly status: "failure";
  readonly kind: SummaryErrorKind;
  readonly detail: string;
}

export type SummaryResult = SummarySuccess | SummaryFailure;

export type RunState =
  | "Idle"
  | "Transcribing"
  | "TranscriptionFailed"
  | "Transcribed"
  | "Summarizing"
  | "SummaryFailed"
  | "Done";

export type RunResult =
  | {
      readonly state: "TranscriptionFailed";
      readonly audioPath: string;
      readonly transcript: TranscriptFailure;
    }
  | {
      readonly state: "SummaryFailed";
      readonly audioPath: string;
      readonly transcript: string;
      readonly failure: SummaryFailure;
    }
  | {
      readonly state: "Done";
      readonly audioPath: string;
      readonly transcript: string;
      readonly summary: SummarySuccess;
    };

export type Log = (message: string) => void;
