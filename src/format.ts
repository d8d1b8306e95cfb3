import _ from "lodash";
import type { RunResult } from "./types";

const PREVIEW_CHARS = 500;

function bullets(items: readonly string[]): string {
  if (items.length === 0) return "_None._";
  return _.map(items, (item) => `- ${item}`).join("\n");
}

/** Markdown minutes for one run. */
export function renderMarkdown(result: RunResult, options: { fullTranscript?: boolean } = {}): string {
  const title = `# ${result.audioPath}`;

  if (result.state === "TranscriptionFailed") {
    const { errorKind, errorDetail } = result.transcript;
    return `${title}\n\n**Transcription failed** (${errorKind}): ${errorDetail}\n`;
  }

  const transcript = options.fullTranscript
    ? result.transcript
    : _.truncate(result.transcript, { length: PREVIEW_CHARS, omission: "..." });
  const sections = [title, `## Transcript\n\n${transcript}`];

  if (result.state === "SummaryFailed") {
    sections.push(`**Summarization failed** (${result.failure.kind}): ${result.failure.detail}`);
  } else {
    sections.push(
      `## Summary\n\n${result.summary.summary}`,
      `## Key Decisions\n\n${bullets(result.summary.decisions)}`,
      `## Action Items\n\n${bullets(result.summary.actionItems)}`,
    );
  }
  return `${sections.join("\n\n")}\n`;
}

/** Field names follow the model's wire keys for downstream consumers. */
export function toJson(result: RunResult): Record<string, unknown> {
  switch (result.state) {
    case "TranscriptionFailed":
      return {
        audio: result.audioPath,
        state: result.state,
        error: { kind: result.transcript.errorKind, detail: result.transcript.errorDetail },
      };
    case "SummaryFailed":
      return {
        audio: result.audioPath,
        state: result.state,
        transcript: result.transcript,
        error: { kind: result.failure.kind, detail: result.failure.detail },
      };
    case "Done":
      return {
        audio: result.audioPath,
        state: result.state,
        transcript: result.transcript,
        summary: result.summary.summary,
        key_decisions: [...result.summary.decisions],
        action_items: [...result.summary.actionItems],
      };
  }
}
