// ---------------------------------------------------------------------------
// Completion service backed by the Anthropic Messages API.
// ---------------------------------------------------------------------------

import Anthropic from "@anthropic-ai/sdk";
import type pino from "pino";
import {
  CompletionAuthError,
  CompletionConnectionError,
  CompletionError,
  CompletionRateLimitError,
  CompletionRequestError,
  CompletionServerError,
  CompletionTimeoutError,
} from "../core/errors.js";
import type {
  ApiConfig,
  CompletionRequest,
  CompletionResponse,
  CompletionService,
} from "../core/types.js";

/** Assistant prefill that forces the reply to open a JSON array. */
export const JSON_PREFILL = "[";

/**
 * Translate an SDK error into the labeler's error hierarchy so the retry
 * policy can reason about it without knowing the SDK.
 */
export function mapSdkError(err: unknown, model: string): CompletionError {
  const message = err instanceof Error ? err.message : String(err);
  const options = { cause: err };

  if (err instanceof Anthropic.APIConnectionTimeoutError) {
    return new CompletionTimeoutError(message, model, options);
  }
  if (err instanceof Anthropic.APIConnectionError) {
    return new CompletionConnectionError(message, model, options);
  }
  if (err instanceof Anthropic.RateLimitError) {
    return new CompletionRateLimitError(message, model, options);
  }
  if (err instanceof Anthropic.AuthenticationError || err instanceof Anthropic.PermissionDeniedError) {
    return new CompletionAuthError(message, model, options);
  }
  if (err instanceof Anthropic.APIError) {
    const status = err.status;
    if (status !== undefined && status >= 500) {
      return new CompletionServerError(message, model, status, options);
    }
    return new CompletionRequestError(message, model, status, options);
  }
  if (err instanceof CompletionError) return err;
  return new CompletionError(message, model, options);
}

/** The slice of a reply the service reads. */
export interface MessageReply {
  content: ReadonlyArray<{ type: string; text?: string }>;
  usage: { input_tokens: number; output_tokens: number };
}

/** The part of the SDK client the service calls. An `Anthropic` instance satisfies it. */
export interface MessagesClient {
  messages: {
    create(params: Anthropic.MessageCreateParamsNonStreaming): Promise<MessageReply>;
  };
}

/**
 * Sends classification prompts through `client.messages.create`.
 *
 * The SDK's built-in retries are disabled; retrying is owned by the
 * classification policy.
 */
export class AnthropicCompletionService implements CompletionService {
  private readonly client: MessagesClient;
  private readonly logger: pino.Logger;

  constructor(config: ApiConfig, logger: pino.Logger, client?: MessagesClient) {
    this.client =
      client ??
      new Anthropic({
        apiKey: config.apiKey,
        baseURL: config.baseUrl,
        timeout: config.requestTimeoutMs,
        maxRetries: 0,
      });
    this.logger = logger.child({ component: "anthropic" });
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const system = request.messages
      .filter((turn) => turn.role === "system")
      .map((turn) => turn.content)
      .join("\n\n");

    const messages: Anthropic.MessageParam[] = [];
    for (const turn of request.messages) {
      if (turn.role === "user" || turn.role === "assistant") {
        messages.push({ role: turn.role, content: turn.content });
      }
    }
    if (request.jsonMode) {
      messages.push({ role: "assistant", content: JSON_PREFILL });
    }

    let response: MessageReply;
    try {
      response = await this.client.messages.create({
        model: request.model,
        max_tokens: request.maxOutputTokens,
        temperature: request.temperature,
        ...(system ? { system } : {}),
        messages,
      });
    } catch (err) {
      const mapped = mapSdkError(err, request.model);
      this.logger.warn(
        { model: request.model, errorType: mapped.name, err: mapped.message },
        "completion request failed",
      );
      throw mapped;
    }

    const text = response.content
      .flatMap((block) => (block.type === "text" && block.text !== undefined ? [block.text] : []))
      .join("");

    return {
      text: request.jsonMode ? `${JSON_PREFILL}${text}` : text,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
      model: request.model,
    };
  }

  async ping(model: string): Promise<void> {
    try {
      await this.client.messages.create({
        model,
        max_tokens: 10,
        messages: [{ role: "user", content: "Hello, this is a test." }],
      });
    } catch (err) {
      throw mapSdkError(err, model);
    }
  }
}
