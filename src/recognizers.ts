import { execFile } from "child_process";
import fs from "fs";
import os from "os";
import path from "path";
import { AssemblyAI } from "assemblyai";
import type { TranscriptionConfig } from "./config";
import { errorMessage } from "./errors";
import type { ModelSize } from "./types";

/** Speech recognizer with its model loaded, ready to transcribe files. */
export interface SpeechRecognizer {
  transcribe(audioPath: string): Promise<string>;
}

/** Loads a recognizer for a model tier; rejects when the model cannot be loaded. */
export type RecognizerLoader = (modelSize: ModelSize) => Promise<SpeechRecognizer>;

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

function run(command: string, args: string[]): Promise<string> {
  return new Promise((resolve, reject) => {
    const options = { encoding: "utf8" as const, maxBuffer: MAX_OUTPUT_BYTES };
    // A failed command's message already carries its stderr.
    execFile(command, args, options, (error, stdout) => (error ? reject(error) : resolve(stdout)));
  });
}

/** openai-whisper's command line; the .txt it writes goes to a temp directory. */
export function whisperLoader(command = "whisper"): RecognizerLoader {
  return async (modelSize) => {
    try {
      await run(command, ["--help"]);
    } catch (error) {
      throw new Error(`Whisper is not available (${command}): ${errorMessage(error)}`);
    }

    return {
      async transcribe(audioPath) {
        const outputDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "whisper-"));
        try {
          await run(command, [
            audioPath,
            "--model",
            modelSize,
            "--output_format",
            "txt",
            "--output_dir",
            outputDir,
          ]);
          const baseName = path.basename(audioPath, path.extname(audioPath));
          return await fs.promises.readFile(path.join(outputDir, `${baseName}.txt`), "utf8");
        } finally {
          await fs.promises.rm(outputDir, { recursive: true, force: true });
        }
      },
    };
  };
}

const GGML_MODELS: Record<ModelSize, string> = {
  tiny: "ggml-tiny.bin",
  base: "ggml-base.bin",
  small: "ggml-small.bin",
  medium: "ggml-medium.bin",
  large: "ggml-large-v3.bin",
};

/** whisper.cpp's whisper-cli, built inside `whisperCppPath`. */
export function whisperCppLoader(whisperCppPath: string | undefined): RecognizerLoader {
  return async (modelSize) => {
    if (!whisperCppPath) {
      throw new Error("Missing Whisper CPP path. Set WHISPER_CPP in .env");
    }
    const binary = path.join(whisperCppPath, "build", "bin", "whisper-cli");
    const model = path.join(whisperCppPath, "models", GGML_MODELS[modelSize]);
    for (const file of [binary, model]) {
      if (!fs.existsSync(file)) throw new Error(`whisper.cpp file not found: ${file}`);
    }

    return {
      transcribe: (audioPath) =>
        run(binary, ["--model", model, "--no-timestamps", "--file", audioPath]),
    };
  };
}

/** AssemblyAI's hosted recognizer. Small tiers map to its fast model. */
export function assemblyLoader(apiKey: string | undefined): RecognizerLoader {
  return async (modelSize) => {
    if (!apiKey) {
      throw new Error("Missing AssemblyAI API key. Set ASSEMBLYAI_API_KEY in .env");
    }
    const client = new AssemblyAI({ apiKey });
    const speechModel = modelSize === "tiny" || modelSize === "base" ? "nano" : "best";

    return {
      async transcribe(audioPath) {
        const transcript = await client.transcripts.transcribe({
          audio: audioPath,
          speech_model: speechModel,
        });
        if (transcript.status === "error") {
          throw new Error(transcript.error ?? "AssemblyAI transcription failed");
        }
        return transcript.text ?? "";
      },
    };
  };
}

export function recognizerLoaderFor(config: TranscriptionConfig): RecognizerLoader {
  switch (config.backend) {
    case "whisper":
      return whisperLoader();
    case "whisper-cli":
      return whisperCppLoader(config.whisperCppPath);
    case "assembly":
      return assemblyLoader(config.assemblyApiKey);
  }
}

