import { describe, expect, it, vi } from "vitest";
import { ModelServiceError } from "../src/errors";
import type { LanguageModelFactory } from "../src/llm";
import { meetingNotesSchema } from "../src/notes";
import { SummaryGenerator } from "../src/summarizer";
import { silent, stubModel } from "./helpers";

function generatorWith(body: string | null | Error) {
  const { model, generate } = stubModel(body);
  const generator = SummaryGenerator.initialize(
    { modelId: "gemini-2.5-flash", credential: "test-secret", log: silent },
    () => model,
  );
  return { generator, generate };
}

describe("SummaryGenerator", () => {
  it("is unavailable without a credential and never calls the model", async () => {
    const { model, generate } = stubModel("{}");
    const factory = vi.fn<LanguageModelFactory>(() => model);

    const generator = SummaryGenerator.initialize({ modelId: "m", log: silent }, factory);
    const result = await generator.summarize("We decided to launch Friday.");

    expect(generator.available).toBe(false);
    expect(result).toEqual({
      status: "failure",
      kind: "Unavailable",
      detail: "Summary model not initialized. Check the API key.",
    });
    expect(factory).not.toHaveBeenCalled();
    expect(generate).not.toHaveBeenCalled();
  });

  it("stays unavailable when the model client cannot be built", async () => {
    const log = vi.fn();
    const generator = SummaryGenerator.initialize(
      { modelId: "m", credential: "test-secret", log },
      () => {
        throw new Error("bad client config");
      },
    );

    expect(generator.available).toBe(false);
    expect(generator.initError).toBe("bad client config");
    expect(log).toHaveBeenCalledWith("Error creating the summary model client: bad client config");
    expect(await generator.summarize("transcript")).toEqual({
      status: "failure",
      kind: "Unavailable",
      detail: "Summary model not initialized. Check the API key.",
    });
  });

  it("treats a blank credential as missing", () => {
    const generator = SummaryGenerator.initialize(
      { modelId: "m", credential: "   ", log: silent },
      () => stubModel("{}").model,
    );

    expect(generator.available).toBe(false);
  });

  it("builds the model once with the credential and endpoint", () => {
    const factory = vi.fn<LanguageModelFactory>(() => stubModel("{}").model);

    SummaryGenerator.initialize(
      { modelId: "m", credential: "test-secret", baseURL: "https://llm.example.test/v1/", log: silent },
      factory,
    );

    expect(factory).toHaveBeenCalledTimes(1);
    expect(factory).toHaveBeenCalledWith({
      apiKey: "test-secret",
      baseURL: "https://llm.example.test/v1/",
    });
  });

  it("requests structured output with the transcript embedded verbatim", async () => {
    const { generator, generate } = generatorWith(
      JSON.stringify({ summary: "s", key_decisions: [], action_items: [] }),
    );
    const transcript = "Bob: \"Let's ship it.\"\nCarol: Agreed.";

    await generator.summarize(transcript);

    expect(generate).toHaveBeenCalledTimes(1);
    const request = generate.mock.calls[0][0];
    expect(request.model).toBe("gemini-2.5-flash");
    expect(request.schemaName).toBe("meeting_notes");
    expect(request.schema).toBe(meetingNotesSchema);
    expect(request.prompt).toContain(`---\n${transcript}\n---`);
    expect(request.prompt).toContain('"summary", "key_decisions" and\n"action_items"');
  });

  it("keeps decision order and labels unowned action items TBD", async () => {
    const { generator } = generatorWith(
      JSON.stringify({
        summary: "Quarterly planning for the platform team.",
        key_decisions: ["Ship v2 in March", "Hire two engineers", "Drop the legacy API"],
        action_items: [
          { task: "Draft the roadmap", owner: "Priya" },
          { task: "Book the offsite venue" },
        ],
      }),
    );

    const result = await generator.summarize("transcript");

    expect(result).toEqual({
      status: "success",
      summary: "Quarterly planning for the platform team.",
      decisions: ["Ship v2 in March", "Hire two engineers", "Drop the legacy API"],
      actionItems: ["Priya: Draft the roadmap", "TBD: Book the offsite venue"],
    });
  });

  it("reports a body that is not JSON as a malformed response", async () => {
    const { generator } = generatorWith("Here are your meeting notes!");

    const result = await generator.summarize("transcript");

    expect(result.status).toBe("failure");
    if (result.status === "failure") {
      expect(result.kind).toBe("MalformedResponse");
      expect(result.detail).toMatch(/^Model did not return valid JSON: /);
    }
  });

  it("reports JSON missing a field as a malformed response", async () => {
    const { generator } = generatorWith(JSON.stringify({ summary: "s", key_decisions: [] }));

    const result = await generator.summarize("transcript");

    expect(result).toEqual({
      status: "failure",
      kind: "MalformedResponse",
      detail: "Model response does not match the notes schema: action_items: Required",
    });
  });

  it("reports an empty body as a malformed response", async () => {
    const { generator } = generatorWith(null);

    expect(await generator.summarize("transcript")).toEqual({
      status: "failure",
      kind: "MalformedResponse",
      detail: "Model returned an empty response.",
    });
  });

  it("keeps the service message for remote failures", async () => {
    const { generator, generate } = generatorWith(
      new ModelServiceError("429 Resource has been exhausted", 429),
    );

    const result = await generator.summarize("transcript");

    expect(result).toEqual({
      status: "failure",
      kind: "ServiceError",
      detail: "429 Resource has been exhausted",
    });
    expect(generate).toHaveBeenCalledTimes(1);
  });

  it("turns any other error into an unexpected failure", async () => {
    const { generator } = generatorWith(new TypeError("Cannot read properties of undefined"));

    expect(await generator.summarize("transcript")).toEqual({
      status: "failure",
      kind: "Unexpected",
      detail: "Cannot read properties of undefined",
    });
  });
});
