// Speech-to-text capability
// One stateless call per audio window: normalized samples in, timed text
// segments out. Two backends share the interface:
//   - OpenAI audio transcriptions (gpt-4o-transcribe / whisper-1)
//   - Deepgram pre-recorded transcription (nova-2 and friends)
// Both receive the window as an in-memory WAV file. Audio is never written to disk.

import { File } from "node:buffer";
import { encodeWav, float32ToPcm16 } from "./audio-codec.js";

export interface SpeechSegment {
  text: string;
  /** Seconds from the start of the window. */
  start: number;
  end: number;
}

export interface SpeechToText {
  /**
   * @param samples - Mono samples normalized to [-1, 1].
   * @param languageHint - BCP-47 language code, e.g. "en".
   * @throws Error when the backend call fails.
   */
  transcribe(samples: Float32Array, sampleRate: number, languageHint: string): Promise<SpeechSegment[]>;
}

function toWavBytes(samples: Float32Array, sampleRate: number): Uint8Array {
  return new Uint8Array(encodeWav(float32ToPcm16(samples), sampleRate));
}

// ─── OpenAI ─────────────────────────────────────────────────────────────────────

/**
 * Minimal interface for the OpenAI audio transcriptions API surface we use.
 * Mirrors `audio.transcriptions.create()` so tests can inject a fake.
 */
export interface OpenAITranscriptionClient {
  audio: {
    transcriptions: {
      create(params: {
        file: File;
        model: string;
        response_format?: "json" | "verbose_json";
        timestamp_granularities?: Array<"word" | "segment">;
        language?: string;
      }): Promise<OpenAITranscriptionResponse>;
    };
  };
}

/**
 * `segments` and `duration` only come back with `verbose_json` (whisper-1);
 * gpt-4o-transcribe answers with text alone.
 */
export interface OpenAITranscriptionResponse {
  text: string;
  duration?: number;
  segments?: Array<{
    start: number;
    end: number;
    text: string;
  }>;
}

export class OpenAISpeechToText implements SpeechToText {
  private readonly client: OpenAITranscriptionClient;
  private readonly model: string;

  constructor(client: OpenAITranscriptionClient, model: string = "gpt-4o-transcribe") {
    this.client = client;
    this.model = model;
  }

  async transcribe(samples: Float32Array, sampleRate: number, languageHint: string): Promise<SpeechSegment[]> {
    if (samples.length === 0) {
      return [];
    }

    const file = new File([toWavBytes(samples, sampleRate)], "window.wav", { type: "audio/wav" });
    const useVerboseJson = this.model === "whisper-1";

    const response = await this.client.audio.transcriptions.create({
      file,
      model: this.model,
      language: languageHint,
      ...(useVerboseJson
        ? { response_format: "verbose_json" as const, timestamp_granularities: ["segment" as const] }
        : { response_format: "json" as const }),
    });

    const text = response.text?.trim();
    if (!text) {
      return [];
    }

    if (response.segments && response.segments.length > 0) {
      return response.segments
        .filter((seg) => seg.text.trim().length > 0)
        .map((seg) => ({ text: seg.text.trim(), start: seg.start, end: seg.end }));
    }

    // Text-only response: one segment spanning the window.
    const duration = response.duration ?? samples.length / sampleRate;
    return [{ text, start: 0, end: duration }];
  }
}

// ─── Deepgram ───────────────────────────────────────────────────────────────────

export interface DeepgramPrerecordedOptions {
  model: string;
  language: string;
  punctuate: boolean;
  smart_format: boolean;
  utterances: boolean;
}

/**
 * Pre-recorded response fields we read. Matches the SDK's
 * SyncPrerecordedResponse but is defined locally to avoid coupling to SDK internals.
 */
export interface DeepgramPrerecordedResult {
  metadata?: { duration?: number };
  results: {
    channels: Array<{
      alternatives: Array<{ transcript: string }>;
    }>;
    utterances?: Array<{ start: number; end: number; transcript: string }>;
  };
}

/** Minimal interface for `listen.prerecorded.transcribeFile()` of the Deepgram SDK. */
export interface DeepgramPrerecordedClient {
  listen: {
    prerecorded: {
      transcribeFile(
        source: Buffer,
        options: DeepgramPrerecordedOptions,
      ): Promise<{ result: DeepgramPrerecordedResult | null; error: unknown }>;
    };
  };
}

export class DeepgramSpeechToText implements SpeechToText {
  private readonly client: DeepgramPrerecordedClient;
  private readonly model: string;

  constructor(client: DeepgramPrerecordedClient, model: string = "nova-2") {
    this.client = client;
    this.model = model;
  }

  async transcribe(samples: Float32Array, sampleRate: number, languageHint: string): Promise<SpeechSegment[]> {
    if (samples.length === 0) {
      return [];
    }

    const { result, error } = await this.client.listen.prerecorded.transcribeFile(
      encodeWav(float32ToPcm16(samples), sampleRate),
      {
        model: this.model,
        language: languageHint,
        punctuate: true,
        smart_format: true,
        utterances: true,
      },
    );

    if (error) {
      throw error instanceof Error ? error : new Error(`Deepgram transcription failed: ${String(error)}`);
    }
    if (!result) {
      throw new Error("Deepgram returned no result");
    }

    const utterances = result.results.utterances ?? [];
    if (utterances.length > 0) {
      return utterances
        .filter((u) => u.transcript.trim().length > 0)
        .map((u) => ({ text: u.transcript.trim(), start: u.start, end: u.end }));
    }

    const transcript = result.results.channels[0]?.alternatives[0]?.transcript?.trim();
    if (!transcript) {
      return [];
    }
    const duration = result.metadata?.duration ?? samples.length / sampleRate;
    return [{ text: transcript, start: 0, end: duration }];
  }
}
