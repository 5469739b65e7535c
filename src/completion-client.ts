// Completion capability: prompt in, text (or a JSON object as text) out.
// The summarization engine only sees the CompletionClient interface; the
// OpenAI adapter below also serves OpenAI-compatible endpoints (set baseURL on
// the SDK client).

export type ResponseShape = "free_text" | "json_object";

export interface CompletionRequest {
  systemInstruction: string;
  userContent: string;
  responseShape: ResponseShape;
  maxOutputTokens: number;
  temperature: number;
}

export interface CompletionClient {
  complete(request: CompletionRequest): Promise<string>;
}

// ─── OpenAI client interface (for testability / dependency injection) ────────────

/**
 * Minimal interface for the OpenAI chat completions API surface we use.
 * This allows injecting a mock client in tests without importing the full SDK.
 */
export interface OpenAIChatClient {
  chat: {
    completions: {
      create(params: {
        model: string;
        messages: Array<{ role: "system" | "user"; content: string }>;
        response_format?: { type: "json_object" | "text" };
        max_tokens?: number;
        temperature?: number;
      }): Promise<{
        choices: Array<{
          message: {
            content: string | null;
          };
        }>;
        usage?: {
          prompt_tokens: number;
          completion_tokens: number;
          total_tokens: number;
        };
      }>;
    };
  };
}

export interface CompletionUsageLogger {
  debug(message: string, ...args: unknown[]): void;
}

export class OpenAICompletionClient implements CompletionClient {
  private readonly openai: OpenAIChatClient;
  private readonly model: string;
  private readonly logger?: CompletionUsageLogger;

  constructor(openaiClient: OpenAIChatClient, model: string = "gpt-4o-mini", logger?: CompletionUsageLogger) {
    this.openai = openaiClient;
    this.model = model;
    this.logger = logger;
  }

  /**
   * @throws Error when the API call fails or returns no content.
   */
  async complete(request: CompletionRequest): Promise<string> {
    const response = await this.openai.chat.completions.create({
      model: this.model,
      messages: [
        { role: "system", content: request.systemInstruction },
        { role: "user", content: request.userContent },
      ],
      ...(request.responseShape === "json_object" ? { response_format: { type: "json_object" as const } } : {}),
      max_tokens: request.maxOutputTokens,
      temperature: request.temperature,
    });

    if (response.usage) {
      this.logger?.debug(
        `Tokens: ${response.usage.total_tokens} (in: ${response.usage.prompt_tokens}, out: ${response.usage.completion_tokens})`,
      );
    }

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error("LLM returned empty response");
    }
    return content;
  }
}
