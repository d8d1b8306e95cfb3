import fs from "fs";
import os from "os";
import path from "path";
import { describe, expect, it } from "vitest";
import { assemblyLoader, whisperCppLoader, whisperLoader } from "../src/recognizers";

describe("recognizer loaders", () => {
  it("requires a whisper.cpp checkout", async () => {
    await expect(whisperCppLoader(undefined)("base")).rejects.toThrow(
      "Missing Whisper CPP path. Set WHISPER_CPP in .env",
    );
  });

  it("checks the whisper.cpp binary before the model", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "whisper-cpp-"));
    try {
      await expect(whisperCppLoader(dir)("base")).rejects.toThrow(
        `whisper.cpp file not found: ${path.join(dir, "build", "bin", "whisper-cli")}`,
      );
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("looks for the large-v3 weights for the large tier", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "whisper-cpp-"));
    try {
      fs.mkdirSync(path.join(dir, "build", "bin"), { recursive: true });
      fs.writeFileSync(path.join(dir, "build", "bin", "whisper-cli"), "");
      await expect(whisperCppLoader(dir)("large")).rejects.toThrow(
        `whisper.cpp file not found: ${path.join(dir, "models", "ggml-large-v3.bin")}`,
      );
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("requires an AssemblyAI key", async () => {
    await expect(assemblyLoader(undefined)("base")).rejects.toThrow(
      "Missing AssemblyAI API key. Set ASSEMBLYAI_API_KEY in .env",
    );
  });

  it("fails to load when the whisper command is missing", async () => {
    await expect(whisperLoader("meeting-minutes-no-such-whisper")("base")).rejects.toThrow(
      /^Whisper is not available \(meeting-minutes-no-such-whisper\): /,
    );
  });
});
