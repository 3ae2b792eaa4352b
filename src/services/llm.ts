import type { Prompt } from "../types.js";
import { config } from "../config.js";
import { CollaboratorError, isTransientStatus, toCollaboratorError } from "../errors.js";
import { logger } from "../logger.js";
import { readErrorDetails, readJson } from "./http.js";

const {
  host: OLLAMA_HOST,
  chatModel: CHAT_MODEL,
  temperature: TEMPERATURE,
  maxAnswerTokens: MAX_ANSWER_TOKENS,
  requestTimeoutMs: REQUEST_TIMEOUT_MS,
} = config.ollama;

const log = logger.child("llm");

export interface LanguageModel {
  generate(prompt: Prompt): Promise<string>;
}

export type OllamaChatModelOptions = {
  host?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
};

function readMessageContent(data: unknown): string | null {
  if (typeof data !== "object" || data === null || !("message" in data)) {
    return null;
  }
  const { message } = data;
  if (typeof message !== "object" || message === null || !("content" in message)) {
    return null;
  }
  return typeof message.content === "string" ? message.content : null;
}

export class OllamaChatModel implements LanguageModel {
  private readonly host: string;
  readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly timeoutMs: number;

  constructor(options: OllamaChatModelOptions = {}) {
    this.host = options.host ?? OLLAMA_HOST;
    this.model = options.model ?? CHAT_MODEL;
    this.temperature = options.temperature ?? TEMPERATURE;
    this.maxTokens = options.maxTokens ?? MAX_ANSWER_TOKENS;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
  }

  async generate(prompt: Prompt): Promise<string> {
    let response: Response;
    try {
      response = await fetch(`${this.host}/api/chat`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          model: this.model,
          stream: false,
          messages: [
            { role: "system", content: prompt.system },
            { role: "user", content: prompt.user },
          ],
          options: { temperature: this.temperature, num_predict: this.maxTokens },
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw toCollaboratorError("llm", error, "Chat request");
    }

    if (!response.ok) {
      const details = await readErrorDetails(response);
      log.error("Ollama chat failed", undefined, { status: response.status, details });
      throw new CollaboratorError(
        "llm",
        isTransientStatus(response.status) ? "transient" : "permanent",
        `Language model returned HTTP ${response.status}`,
        { status: response.status }
      );
    }

    const content = readMessageContent(await readJson(response, "llm", "Reading chat response"));
    if (content === null) {
      throw new CollaboratorError("llm", "permanent", "Invalid response from language model");
    }

    return content.trim();
  }
}
