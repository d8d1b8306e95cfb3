import { Command, CommanderError } from "commander";
import fs from "fs";
import path from "path";
import _ from "lodash";
import { loadConfig, type Env } from "./config";
import { ConfigError } from "./errors";
import { renderMarkdown, toJson } from "./format";
import { MeetingSummarizer, type CreateOptions, type Engines } from "./meeting";
import type { RunResult } from "./types";

export const AUDIO_EXTENSIONS = [".mp3", ".m4a", ".wav", ".ogg", ".flac", ".webm", ".mp4"];

interface CliOptions {
  recordings?: string;
  backend?: string;
  modelSize?: string;
  provider?: string;
  summaryModel?: string;
  json?: boolean;
  fullTranscript?: boolean;
}

export function listRecordings(recordingsDir: string): string[] {
  const files = fs.readdirSync(recordingsDir);
  const audioFiles = _.filter(files, (file) =>
    AUDIO_EXTENSIONS.includes(path.extname(file).toLowerCase()),
  );
  return _.map(_.sortBy(audioFiles), (file) => path.join(recordingsDir, file));
}

// One summarizer per file; the engines behind them are shared.
async function summarizeAll(engines: Engines, audioPaths: string[]): Promise<RunResult[]> {
  return Promise.all(audioPaths.map((audioPath) => new MeetingSummarizer(engines).run(audioPath)));
}

function report(results: RunResult[], options: CliOptions): void {
  if (options.json) {
    const payload = _.map(results, toJson);
    console.log(JSON.stringify(results.length === 1 ? payload[0] : payload, null, 2));
    return;
  }
  for (const result of results) {
    console.log(renderMarkdown(result, { fullTranscript: options.fullTranscript }));
  }
}

export async function main(
  argv: string[],
  env: Env = process.env,
  createOptions: CreateOptions = {},
): Promise<number> {
  const program = new Command();
  let exitCode = 0;

  program
    .exitOverride()
    .name("meeting-minutes")
    .description(
      "Transcribe a meeting recording and extract its summary, decisions and action items",
    )
    .version("1.0.0")
    .argument("[audio]", "Audio file to summarize")
    .option("-r, --recordings <dir>", "Summarize every recording in this directory")
    .option("-b, --backend <backend>", "Transcription backend: whisper, whisper-cli, or assembly")
    .option("-m, --model-size <size>", "Whisper model size: tiny, base, small, medium, large")
    .option("-p, --provider <provider>", "Summary model provider: gemini or openai")
    .option("--summary-model <model>", "Summary model id")
    .option("--json", "Print results as JSON")
    .option("--full-transcript", "Print the whole transcript instead of a preview")
    .action(async (audio: string | undefined, options: CliOptions) => {
      if (!audio && !options.recordings) {
        program.error("Pass an audio file or --recordings <dir>.");
      }

      const config = loadConfig(env, {
        TRANSCRIPTION_BACKEND: options.backend,
        WHISPER_MODEL_SIZE: options.modelSize,
        SUMMARY_PROVIDER: options.provider,
        SUMMARY_MODEL: options.summaryModel,
      });

      let audioPaths: string[];
      if (options.recordings) {
        if (!fs.existsSync(options.recordings)) {
          console.error(`Recordings directory ${options.recordings} does not exist.`);
          exitCode = 1;
          return;
        }
        audioPaths = listRecordings(options.recordings);
      } else {
        audioPaths = audio ? [audio] : [];
      }

      const missing = audioPaths.filter((audioPath) => !fs.existsSync(audioPath));
      if (missing.length > 0) {
        for (const audioPath of missing) console.error(`File ${audioPath} does not exist.`);
        exitCode = 1;
        return;
      }
      if (audioPaths.length === 0) {
        console.error("No audio files found.");
        exitCode = 1;
        return;
      }

      // Progress goes to stderr so --json output stays parseable.
      const engines = await MeetingSummarizer.initializeEngines(config, {
        log: (message) => console.error(message),
        ...createOptions,
      });
      const results = await summarizeAll(engines, audioPaths);
      report(results, options);
      exitCode = results.every((result) => result.state === "Done") ? 0 : 1;
    });

  try {
    await program.parseAsync(argv);
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    if (err instanceof ConfigError) {
      console.error(err.message);
      return 1;
    }
    throw err;
  }
  return exitCode;
}
