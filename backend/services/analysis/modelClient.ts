import { z } from "zod";
import type { OllamaSettings } from "../../config/env";
import { AIServiceError, errorMessage } from "../../utils/analysisErrors";
import logger from "../../utils/logger";

export interface ModelClient {
  checkAvailability(): Promise<boolean>;
  invoke(model: string, systemPrompt: string, userPrompt: string): Promise<string>;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

const generateResponseSchema = z.object({
  response: z.string().optional(),
});

const isConnectionRefused = (error: unknown): boolean => {
  if (!(error instanceof Error)) return false;
  const { cause } = error;
  const code =
    typeof cause === "object" && cause !== null && "code" in cause ? cause.code : undefined;
  return code === "ECONNREFUSED" || ("code" in error && error.code === "ECONNREFUSED");
};

/**
 * Talks to an Ollama server over its HTTP API. Every request carries its own
 * abort timer, so a slow generation never affects the next call.
 */
export class OllamaClient implements ModelClient {
  constructor(
    private readonly settings: OllamaSettings,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  async checkAvailability(): Promise<boolean> {
    try {
      const response = await this.request(
        "/api/tags",
        { method: "GET" },
        this.settings.probeTimeoutMs,
        async (res) => res
      );
      return response.ok;
    } catch (error) {
      logger.debug({ host: this.settings.host, error: errorMessage(error) }, "Model service probe failed");
      return false;
    }
  }

  async invoke(model: string, systemPrompt: string, userPrompt: string): Promise<string> {
    const body = JSON.stringify({
      model,
      prompt: `${systemPrompt}\n\n${userPrompt}`,
      stream: false,
      options: { temperature: this.settings.temperature },
    });

    let timedOut = false;
    try {
      return await this.request(
        "/api/generate",
        { method: "POST", headers: { "Content-Type": "application/json" }, body },
        this.settings.requestTimeoutMs,
        async (response) => {
          if (!response.ok) {
            const text = await response.text();
            throw new AIServiceError(`Ollama returned status ${response.status}: ${text}`, {
              status: response.status,
              body: text,
            });
          }
          const payload = generateResponseSchema.parse(await response.json());
          return payload.response ?? "";
        },
        () => {
          timedOut = true;
        }
      );
    } catch (error) {
      if (error instanceof AIServiceError) throw error;
      if (timedOut) {
        throw new AIServiceError("AI request timed out. The model may still be loading.", { model });
      }
      if (isConnectionRefused(error)) {
        throw new AIServiceError(
          `Model service is not reachable at ${this.settings.host}. Is Ollama running?`
        );
      }
      throw new AIServiceError(`AI request failed: ${errorMessage(error)}`, { model });
    }
  }

  private async request<T>(
    path: string,
    init: RequestInit,
    timeoutMs: number,
    read: (response: Response) => Promise<T>,
    onTimeout?: () => void
  ): Promise<T> {
    const controller = new AbortController();
    const timer = setTimeout(() => {
      onTimeout?.();
      controller.abort();
    }, timeoutMs);

    try {
      const response = await this.fetchImpl(`${this.settings.host}${path}`, {
        ...init,
        signal: controller.signal,
      });
      return await read(response);
    } finally {
      clearTimeout(timer);
    }
  }
}

export default OllamaClient;
