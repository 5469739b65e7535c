// Live Meeting Analyzer - Entry point
// Wires configuration, API clients and the pipeline, then starts the server.

import "dotenv/config";
import { createClient as createDeepgramClient } from "@deepgram/sdk";
import OpenAI from "openai";
import { loadConfig } from "./config.js";
import { createAppServer, ClientBroadcaster } from "./server.js";
import { SessionManager } from "./session-manager.js";
import { OpenAICompletionClient } from "./completion-client.js";
import type { OpenAIChatClient } from "./completion-client.js";
import { DeepgramSpeechToText, OpenAISpeechToText } from "./speech-to-text.js";
import type { DeepgramPrerecordedClient, OpenAITranscriptionClient, SpeechToText } from "./speech-to-text.js";
import { FfmpegAudioSource, PushAudioSource } from "./audio-source.js";
import type { AudioSource } from "./audio-source.js";
import { createConsoleLogger } from "./logger.js";
import { errorMessage } from "./utils.js";
import type { AppConfig } from "./types.js";

export const APP_NAME = "Live Meeting Analyzer";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

// ─── Configuration ──────────────────────────────────────────────────────────────

let config: AppConfig;
try {
  config = loadConfig(process.env);
} catch (err) {
  logFatal(errorMessage(err));
  process.exit(1);
}

logInit(`Configuration loaded (profile: ${config.analysis.profile}, audio: ${config.audioSource})`);

// ─── API clients ────────────────────────────────────────────────────────────────

logInit(`Creating completion client (${config.completion.model}${config.completion.baseURL ? ` @ ${config.completion.baseURL}` : ""})...`);
const completionOpenAI = new OpenAI({
  apiKey: config.completion.apiKey,
  ...(config.completion.baseURL ? { baseURL: config.completion.baseURL } : {}),
});
const completionClient = new OpenAICompletionClient(
  completionOpenAI as unknown as OpenAIChatClient,
  config.completion.model,
  createConsoleLogger("Completion"),
);

let speechToText: SpeechToText;
if (config.speechToText.backend === "deepgram") {
  logInit(`Creating Deepgram speech-to-text (${config.speechToText.model})...`);
  const deepgramClient = createDeepgramClient(config.speechToText.apiKey);
  speechToText = new DeepgramSpeechToText(
    deepgramClient as unknown as DeepgramPrerecordedClient,
    config.speechToText.model,
  );
} else {
  logInit(`Creating OpenAI speech-to-text (${config.speechToText.model})...`);
  const transcriptionOpenAI = new OpenAI({ apiKey: config.speechToText.apiKey });
  speechToText = new OpenAISpeechToText(
    transcriptionOpenAI as unknown as OpenAITranscriptionClient,
    config.speechToText.model,
  );
}

// ─── Audio source ───────────────────────────────────────────────────────────────

const { capture } = config;
let pushSource: PushAudioSource | undefined;
let audioSourceFactory: () => AudioSource;

if (config.audioSource === "ffmpeg") {
  logInit(`Audio from ffmpeg (${config.ffmpeg.inputFormat}:${config.ffmpeg.inputDevice})`);
  audioSourceFactory = () =>
    new FfmpegAudioSource({
      inputFormat: config.ffmpeg.inputFormat,
      inputDevice: config.ffmpeg.inputDevice,
      sampleRate: capture.sampleRate,
      chunkSamples: capture.chunkSamples,
    });
} else {
  logInit("Audio from WebSocket clients (binary LINEAR16 frames)");
  const source = new PushAudioSource(capture.chunkSamples);
  pushSource = source;
  audioSourceFactory = () => source;
}

// ─── Pipeline and server ────────────────────────────────────────────────────────

logInit("Wiring SessionManager pipeline...");
const broadcaster = new ClientBroadcaster();
const sessionManager = new SessionManager({
  audioSourceFactory,
  speechToText,
  completionClient,
  config,
  hooks: broadcaster.hooks(),
});

const server = createAppServer({ sessionManager, broadcaster, pushSource });

server
  .listen(config.port)
  .then((port) => {
    logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${port}`);
    logInit(
      `Windows: ${capture.windowSeconds}s (overlap ${capture.overlapSeconds}s); analysis every ${config.analysis.wordsPerAnalysis} words`,
    );
    logInit("Ready for connections");
  })
  .catch((err: unknown) => {
    logFatal(`Server failed to start: ${errorMessage(err)}`);
    process.exit(1);
  });
