import { z } from "zod";
import { ConfigError } from "./errors";
import { MODEL_SIZES } from "./types";

export const TRANSCRIPTION_BACKENDS = ["whisper", "whisper-cli", "assembly"] as const;
export type TranscriptionBackend = (typeof TRANSCRIPTION_BACKENDS)[number];

export const SUMMARY_PROVIDERS = ["gemini", "openai"] as const;
export type SummaryProvider = (typeof SUMMARY_PROVIDERS)[number];

const PROVIDER_DEFAULTS: Record<
  SummaryProvider,
  { modelId: string; keyVar: "GEMINI_API_KEY" | "OPENAI_API_KEY"; baseURL?: string }
> = {
  gemini: {
    modelId: "gemini-2.5-flash",
    keyVar: "GEMINI_API_KEY",
    baseURL: "https://generativelanguage.googleapis.com/v1beta/openai/",
  },
  openai: { modelId: "gpt-4o-mini", keyVar: "OPENAI_API_KEY" },
};

export interface TranscriptionConfig {
  backend: TranscriptionBackend;
  modelSize: (typeof MODEL_SIZES)[number];
  whisperCppPath?: string;
  assemblyApiKey?: string;
}

export interface SummaryConfig {
  provider: SummaryProvider;
  modelId: string;
  apiKey?: string;
  baseURL?: string;
}

export interface MeetingSummarizerConfig {
  transcription: TranscriptionConfig;
  summary: SummaryConfig;
}

// Blank values in a .env file count as unset.
const unsetIfBlank = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optional = z.preprocess(unsetIfBlank, z.string().trim().optional());

const envSchema = z.object({
  TRANSCRIPTION_BACKEND: z.preprocess(
    unsetIfBlank,
    z.enum(TRANSCRIPTION_BACKENDS).default("whisper"),
  ),
  WHISPER_MODEL_SIZE: z.preprocess(unsetIfBlank, z.enum(MODEL_SIZES).default("base")),
  WHISPER_CPP: optional,
  ASSEMBLYAI_API_KEY: optional,
  SUMMARY_PROVIDER: z.preprocess(unsetIfBlank, z.enum(SUMMARY_PROVIDERS).default("gemini")),
  SUMMARY_MODEL: optional,
  SUMMARY_BASE_URL: z.preprocess(unsetIfBlank, z.string().url().optional()),
  GEMINI_API_KEY: optional,
  OPENAI_API_KEY: optional,
});

export type Env = Record<string, string | undefined>;

/**
 * Builds the pipeline configuration from environment variables. Keys in
 * `overrides` (CLI flags) win over the environment. A provider switched by an
 * override falls back to its own default model unless one is also overridden.
 */
export function loadConfig(env: Env, overrides: Env = {}): MeetingSummarizerConfig {
  const merged: Env = { ...env };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }

  const providerOverride = unsetIfBlank(overrides.SUMMARY_PROVIDER);
  const envProvider = unsetIfBlank(env.SUMMARY_PROVIDER) ?? "gemini";
  if (
    providerOverride !== undefined &&
    providerOverride !== envProvider &&
    unsetIfBlank(overrides.SUMMARY_MODEL) === undefined
  ) {
    delete merged.SUMMARY_MODEL;
  }

  const parsed = envSchema.safeParse(merged);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join("."));
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`, keys);
  }

  const vars = parsed.data;
  const provider = PROVIDER_DEFAULTS[vars.SUMMARY_PROVIDER];

  return {
    transcription: {
      backend: vars.TRANSCRIPTION_BACKEND,
      modelSize: vars.WHISPER_MODEL_SIZE,
      whisperCppPath: vars.WHISPER_CPP,
      assemblyApiKey: vars.ASSEMBLYAI_API_KEY,
    },
    summary: {
      provider: vars.SUMMARY_PROVIDER,
      modelId: vars.SUMMARY_MODEL ?? provider.modelId,
      apiKey: vars[provider.keyVar],
      baseURL: vars.SUMMARY_BASE_URL ?? provider.baseURL,
    },
  };
}
