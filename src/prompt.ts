export const UNASSIGNED_OWNER = "TBD";

export const PROMPT = `
Below is a transcript of a meeting. Analyze it and produce meeting minutes as a
JSON object with exactly three top-level keys: "summary", "key_decisions" and
"action_items".

summary
A concise paragraph summarizing the entire meeting: the main discussion topics,
the conclusions reached and any open issues.

key_decisions
A list of every finalized decision made in the meeting, one decision per entry,
in the order the decisions were reached. Leave out proposals that were discussed
but not agreed.

action_items
A list of every task assigned during the meeting, in the order they were
assigned. Each entry states the task and its owner: the person or team named as
responsible. When the transcript names no one, use "${UNASSIGNED_OWNER}" as the owner.
An entry written as plain text takes the form "<owner>: <task>".

Use only what is said in the transcript. If a list has nothing to report, return
it empty.
`;

export function buildPrompt(transcript: string): string {
  return `${PROMPT}
TRANSCRIPT:
---
${transcript}
---
`;
}
