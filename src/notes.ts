import { z } from "zod";
import { UNASSIGNED_OWNER } from "./prompt";

/** Shape requested from the model as its structured-output schema. */
export const meetingNotesSchema = z.object({
  summary: z.string(),
  key_decisions: z.array(z.string()),
  action_items: z.array(
    z.object({
      task: z.string(),
      owner: z.string(),
    }),
  ),
});

export type MeetingNotes = z.infer<typeof meetingNotesSchema>;

// Backends do not always honor the requested schema, so the response is read
// more loosely than it is requested.
const actionItemPayload = z.union([
  z.string(),
  z.object({
    task: z.string(),
    owner: z.string().nullish(),
  }),
]);

const notesPayload = z.object({
  summary: z.string(),
  key_decisions: z.array(z.string()),
  action_items: z.array(actionItemPayload),
});

export type ActionItemPayload = z.infer<typeof actionItemPayload>;

export interface ParsedNotes {
  summary: string;
  decisions: string[];
  actionItems: string[];
}

export class MalformedPayloadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedPayloadError";
  }
}

const PREFIX = /^([^:\n]{1,60}):\s+(\S.*)$/s;
// One to three words, the first capitalized: "Alice", "Dr. Chen", "Finance team".
const NAME_LIKE = /^\p{Lu}[\p{L}'.]*(?: [\p{L}'.]+){0,2}$/u;
const NO_OWNER = new Set(["", "tbd", "none", "unassigned", "unknown", "n/a"]);
const ITEM_LABELS = new Set([
  "action",
  "action item",
  "decision",
  "follow up",
  "next step",
  "next steps",
  "note",
  "owner",
  "task",
  "todo",
]);

function ownerOrDefault(owner: string | null | undefined): string {
  const trimmed = owner?.trim() ?? "";
  return NO_OWNER.has(trimmed.toLowerCase()) ? UNASSIGNED_OWNER : trimmed;
}

/** Splits `"<owner>: <task>"` when the prefix reads as a person or team. */
function splitOwner(text: string): { owner: string; task: string } | null {
  const match = PREFIX.exec(text);
  if (!match) return null;
  const prefix = match[1].trim();
  const lower = prefix.toLowerCase();
  if (NO_OWNER.has(lower)) return { owner: UNASSIGNED_OWNER, task: match[2] };
  if (ITEM_LABELS.has(lower) || !NAME_LIKE.test(prefix)) return null;
  return { owner: prefix, task: match[2] };
}

/**
 * Renders an action item as `"<owner>: <task>"`. A plain string keeps its
 * owner prefix only when the prefix looks like a name.
 */
export function formatActionItem(item: ActionItemPayload): string {
  if (typeof item === "string") {
    const text = item.trim();
    const split = splitOwner(text);
    return split ? `${split.owner}: ${split.task}` : `${UNASSIGNED_OWNER}: ${text}`;
  }

  const owner = ownerOrDefault(item.owner);
  let task = item.task.trim();
  const repeated = splitOwner(task);
  if (repeated && repeated.owner.toLowerCase() === owner.toLowerCase()) task = repeated.task;
  return `${owner}: ${task}`;
}

function stripCodeFence(body: string): string {
  const fenced = /^```[a-zA-Z]*\s*\n([\s\S]*?)\n?```$/.exec(body.trim());
  return fenced ? fenced[1] : body.trim();
}

/**
 * Parses a model response body into summary, decisions and action items.
 * Throws {@link MalformedPayloadError} when the body is not JSON or does not
 * carry the three fields.
 */
export function parseNotesPayload(body: string): ParsedNotes {
  let data: unknown;
  try {
    data = JSON.parse(stripCodeFence(body));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedPayloadError(`Model did not return valid JSON: ${reason}`);
  }

  const parsed = notesPayload.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new MalformedPayloadError(`Model response does not match the notes schema: ${issues}`);
  }

  return {
    summary: parsed.data.summary.trim(),
    decisions: parsed.data.key_decisions.map((decision) => decision.trim()),
    actionItems: parsed.data.action_items.map(formatActionItem),
  };
}
