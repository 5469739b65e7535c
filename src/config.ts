// Environment-driven configuration. `loadConfig` is pure: it reads only the
// record it is given, so tests pass plain objects and the entry point passes
// process.env after dotenv has populated it.

import type {
  AnalysisProfile,
  AppConfig,
  AudioSourceKind,
  SpeechToTextBackend,
} from "./types.js";

export type Env = Record<string, string | undefined>;

const parseIntOrDefault = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const parseFloatOrDefault = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseFloat(value);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const resolveSpeechToTextBackend = (value: string | undefined): SpeechToTextBackend => {
  if (value === undefined || value === "" || value === "openai") {
    return "openai";
  }
  if (value === "deepgram") {
    return "deepgram";
  }
  throw new Error(`STT_BACKEND must be "openai" or "deepgram" (got "${value}")`);
};

const resolveAudioSource = (value: string | undefined): AudioSourceKind => {
  if (value === undefined || value === "" || value === "websocket") {
    return "websocket";
  }
  if (value === "ffmpeg") {
    return "ffmpeg";
  }
  throw new Error(`AUDIO_SOURCE must be "websocket" or "ffmpeg" (got "${value}")`);
};

const resolveProfile = (value: string | undefined): AnalysisProfile => {
  if (value === undefined || value === "" || value === "general") {
    return "general";
  }
  if (value === "technical") {
    return "technical";
  }
  throw new Error(`ANALYSIS_PROFILE must be "general" or "technical" (got "${value}")`);
};

const requirePositive = (name: string, value: number): void => {
  if (!(value > 0)) {
    throw new Error(`${name} must be positive (got ${value})`);
  }
};

/**
 * Build the application config from environment variables.
 * @throws Error naming the offending variable when a value is invalid or a
 *   required API key is missing.
 */
export function loadConfig(env: Env): AppConfig {
  const sttBackend = resolveSpeechToTextBackend(env.STT_BACKEND);
  const openaiKey = env.OPENAI_API_KEY ?? "";
  const deepgramKey = env.DEEPGRAM_API_KEY ?? "";
  const completionKey = env.COMPLETION_API_KEY || openaiKey;

  const config: AppConfig = {
    port: parseIntOrDefault(env.PORT, 3000),
    capture: {
      sampleRate: parseIntOrDefault(env.SAMPLE_RATE, 16000),
      chunkSamples: parseIntOrDefault(env.CHUNK_SAMPLES, 4096),
      windowSeconds: parseFloatOrDefault(env.WINDOW_SECONDS, 3),
      overlapSeconds: parseFloatOrDefault(env.OVERLAP_SECONDS, 1.5),
      minFlushSeconds: parseFloatOrDefault(env.MIN_FLUSH_SECONDS, 1),
      queueHighWaterMark: parseIntOrDefault(env.CAPTURE_QUEUE_HIGH_WATER, 256),
      languageHint: env.STT_LANGUAGE || "en",
    },
    analysis: {
      wordsPerAnalysis: parseIntOrDefault(env.WORDS_PER_ANALYSIS, 50),
      wordsPerRollingSummary: parseIntOrDefault(env.WORDS_PER_ROLLING_SUMMARY, 300),
      maxPriorSummaryWords: parseIntOrDefault(env.MAX_PRIOR_SUMMARY_WORDS, 1000),
      finalTranscriptWordCap: parseIntOrDefault(env.FINAL_TRANSCRIPT_WORD_CAP, 1000),
      profile: resolveProfile(env.ANALYSIS_PROFILE),
    },
    stopTimeoutMs: parseIntOrDefault(env.STOP_TIMEOUT_MS, 5000),
    audioSource: resolveAudioSource(env.AUDIO_SOURCE),
    ffmpeg: {
      inputFormat: env.FFMPEG_INPUT_FORMAT || "pulse",
      inputDevice: env.FFMPEG_INPUT_DEVICE || "default",
    },
    speechToText: {
      backend: sttBackend,
      model: env.STT_MODEL || (sttBackend === "deepgram" ? "nova-2" : "gpt-4o-transcribe"),
      apiKey: sttBackend === "deepgram" ? deepgramKey : openaiKey,
    },
    completion: {
      apiKey: completionKey,
      baseURL: env.COMPLETION_BASE_URL || null,
      model: env.COMPLETION_MODEL || "gpt-4o-mini",
    },
  };

  validateConfig(config);
  return config;
}

function validateConfig(config: AppConfig): void {
  const { capture, analysis } = config;

  if (config.port < 0 || config.port > 65535) {
    throw new Error(`PORT must be between 0 and 65535 (got ${config.port})`);
  }

  requirePositive("SAMPLE_RATE", capture.sampleRate);
  requirePositive("CHUNK_SAMPLES", capture.chunkSamples);
  requirePositive("WINDOW_SECONDS", capture.windowSeconds);
  requirePositive("CAPTURE_QUEUE_HIGH_WATER", capture.queueHighWaterMark);
  if (capture.overlapSeconds < 0 || capture.overlapSeconds >= capture.windowSeconds) {
    throw new Error(
      `OVERLAP_SECONDS must be >= 0 and less than WINDOW_SECONDS (got ${capture.overlapSeconds} with window ${capture.windowSeconds})`,
    );
  }
  if (capture.minFlushSeconds < 0) {
    throw new Error(`MIN_FLUSH_SECONDS must be >= 0 (got ${capture.minFlushSeconds})`);
  }

  requirePositive("WORDS_PER_ANALYSIS", analysis.wordsPerAnalysis);
  requirePositive("WORDS_PER_ROLLING_SUMMARY", analysis.wordsPerRollingSummary);
  requirePositive("MAX_PRIOR_SUMMARY_WORDS", analysis.maxPriorSummaryWords);
  requirePositive("FINAL_TRANSCRIPT_WORD_CAP", analysis.finalTranscriptWordCap);
  requirePositive("STOP_TIMEOUT_MS", config.stopTimeoutMs);

  if (!config.speechToText.apiKey) {
    throw new Error(
      config.speechToText.backend === "deepgram"
        ? "DEEPGRAM_API_KEY is not set. Add it to your .env file."
        : "OPENAI_API_KEY is not set. Add it to your .env file.",
    );
  }
  if (!config.completion.apiKey) {
    throw new Error("COMPLETION_API_KEY (or OPENAI_API_KEY) is not set. Add it to your .env file.");
  }
}
