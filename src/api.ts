import axios, { AxiosInstance, AxiosResponse } from "axios";
import FormData from "form-data";
import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

import { RateLimitedError, ServiceError } from "./errors";
import { TranscriptionRequest, TranscriptionService } from "./types";

export const DEFAULT_BASE_URL = "https://api.openai.com";
export const DEFAULT_MODEL = "whisper-1";
export const DEFAULT_API_KEY_ENV = "OPENAI_API_KEY";
export const DEFAULT_TIMEOUT_MS = 300_000;

function loadEnvFile(filePath: string): void {
  const content = fs.readFileSync(filePath, "utf-8");
  const parsed = dotenv.parse(content);
  for (const [key, value] of Object.entries(parsed)) {
    if (process.env[key] === undefined) {
      process.env[key] = value;
    }
  }
}

function candidateEnvPaths(extraPaths?: string[]): string[] {
  const seen = new Set<string>();
  const add = (p: string): void => {
    seen.add(path.resolve(p));
  };

  if (extraPaths) {
    for (const p of extraPaths) {
      add(p);
    }
    return Array.from(seen);
  }

  add(path.join(process.cwd(), ".env"));
  add(path.join(path.resolve(__dirname, ".."), ".env"));

  return Array.from(seen);
}

/**
 * Reads the transcription API key from the environment, falling back to `.env`
 * files. Values already present in `process.env` are never overwritten.
 */
export function requireApiKey(
  envVar = DEFAULT_API_KEY_ENV,
  options?: { searchPaths?: string[] }
): string {
  let apiKey = process.env[envVar];
  if (!apiKey) {
    for (const envPath of candidateEnvPaths(options?.searchPaths)) {
      if (fs.existsSync(envPath)) {
        loadEnvFile(envPath);
        apiKey = process.env[envVar];
        if (apiKey) {
          break;
        }
      }
    }
  }

  if (!apiKey) {
    throw new Error(
      `${envVar} is not set.\n` +
        "Create an API key and export it:\n" +
        `  export ${envVar}=<YOUR_API_KEY>`
    );
  }
  return apiKey;
}

function parseRetryAfter(value: unknown): number | undefined {
  if (typeof value !== "string" && typeof value !== "number") {
    return undefined;
  }
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

function errorMessageOf(payload: unknown): string | undefined {
  if (typeof payload !== "object" || payload === null || !("error" in payload)) {
    return undefined;
  }
  const error: unknown = payload.error;
  if (typeof error === "object" && error !== null && "message" in error) {
    return typeof error.message === "string" ? error.message : undefined;
  }
  return undefined;
}

function describeFailure(response: AxiosResponse<unknown>): string {
  const data = response.data;
  if (typeof data === "string" && data.trim()) {
    try {
      return errorMessageOf(JSON.parse(data)) ?? data.trim();
    } catch {
      return data.trim();
    }
  }
  return errorMessageOf(data) ?? (response.statusText || `HTTP ${response.status}`);
}

export interface OpenAITranscriptionClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  /** Pre-configured axios instance; the client still sends its own auth header. */
  http?: AxiosInstance;
}

export class OpenAITranscriptionClient implements TranscriptionService {
  private readonly client: AxiosInstance;

  constructor(
    private readonly apiKey: string,
    options: OpenAITranscriptionClientOptions = {}
  ) {
    this.client =
      options.http ??
      axios.create({
        baseURL: options.baseUrl ?? DEFAULT_BASE_URL,
        timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS
      });
  }

  async transcribe(request: TranscriptionRequest): Promise<string> {
    const resolved = path.resolve(request.filePath);
    const form = new FormData();
    form.append("file", fs.createReadStream(resolved));
    form.append("model", request.model);
    form.append("response_format", request.responseFormat);
    if (request.language) {
      form.append("language", request.language);
    }
    if (request.prompt) {
      form.append("prompt", request.prompt);
    }

    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.post<unknown>("/v1/audio/transcriptions", form, {
        headers: {
          ...form.getHeaders(),
          Authorization: `Bearer ${this.apiKey}`
        },
        responseType: "text",
        maxBodyLength: Infinity,
        validateStatus: () => true
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ServiceError(`Transcription request failed: ${message}`, undefined, {
        cause: error
      });
    }

    if (response.status === 429) {
      throw new RateLimitedError(
        `Rate limit hit: ${describeFailure(response)}`,
        parseRetryAfter(response.headers?.["retry-after"])
      );
    }
    if (response.status < 200 || response.status >= 300) {
      throw new ServiceError(
        `Transcription failed: ${describeFailure(response)}`,
        response.status
      );
    }
    if (typeof response.data !== "string") {
      throw new ServiceError(
        `Unexpected transcription response: ${JSON.stringify(response.data)}`,
        response.status
      );
    }
    return response.data;
  }
}

export default OpenAITranscriptionClient;
