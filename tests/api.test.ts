import axios, { InternalAxiosRequestConfig } from "axios";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { OpenAITranscriptionClient, requireApiKey } from "../src/api";
import { RateLimitedError, ServiceError } from "../src/errors";

const ENV_VAR = "TS_EXAM_TRANSCRIBER_API_KEY_TEST";
let originalValue: string | undefined;

beforeEach(() => {
  originalValue = process.env[ENV_VAR];
  delete process.env[ENV_VAR];
});

afterEach(() => {
  if (originalValue !== undefined) {
    process.env[ENV_VAR] = originalValue;
  } else {
    delete process.env[ENV_VAR];
  }
});

describe("requireApiKey", () => {
  it("loads API key from .env file", () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "exam-transcriber-"));
    const envPath = path.join(tempDir, ".env");
    fs.writeFileSync(envPath, `${ENV_VAR}=from-env-file\n`, { encoding: "utf-8" });

    const apiKey = requireApiKey(ENV_VAR, { searchPaths: [envPath] });

    expect(apiKey).toBe("from-env-file");
    expect(process.env[ENV_VAR]).toBe("from-env-file");
  });

  it("prefers the process environment over .env files", () => {
    process.env[ENV_VAR] = "from-process";
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "exam-transcriber-"));
    const envPath = path.join(tempDir, ".env");
    fs.writeFileSync(envPath, `${ENV_VAR}=from-env-file\n`, { encoding: "utf-8" });

    expect(requireApiKey(ENV_VAR, { searchPaths: [envPath] })).toBe("from-process");
  });

  it("throws when key missing", () => {
    expect(() => requireApiKey("TS_MISSING_KEY", { searchPaths: [] })).toThrowError(
      /TS_MISSING_KEY is not set/
    );
  });
});

interface FakeReply {
  status: number;
  data: unknown;
  headers?: Record<string, string>;
}

function fakeHttp(reply: FakeReply | Error) {
  const calls: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    baseURL: "https://api.test",
    adapter: async (config) => {
      calls.push(config);
      if (reply instanceof Error) {
        throw reply;
      }
      return {
        data: reply.data,
        status: reply.status,
        statusText: `status ${reply.status}`,
        headers: reply.headers ?? {},
        config
      };
    }
  });
  return { http, calls };
}

describe("OpenAITranscriptionClient", () => {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "exam-transcriber-"));
  const audioPath = path.join(tmpDir, "chunk_0.mp3");
  fs.writeFileSync(audioPath, "ID3");

  const request = {
    filePath: audioPath,
    model: "whisper-1",
    responseFormat: "vtt" as const
  };

  it("posts the chunk and returns the subtitle text", async () => {
    const vtt = "WEBVTT\n\n00:00:00.000 --> 00:00:01.000\nhello\n";
    const { http, calls } = fakeHttp({ status: 200, data: vtt });
    const client = new OpenAITranscriptionClient("test-secret", { http });

    const result = await client.transcribe(request);

    expect(result).toBe(vtt);
    expect(calls).toHaveLength(1);
    expect(calls[0].method).toBe("post");
    expect(calls[0].url).toBe("/v1/audio/transcriptions");
    expect(calls[0].headers.Authorization).toBe("Bearer test-secret");
  });

  it("maps 429 to a rate-limit error with Retry-After", async () => {
    const { http } = fakeHttp({
      status: 429,
      data: JSON.stringify({ error: { message: "Rate limit reached" } }),
      headers: { "retry-after": "7" }
    });
    const client = new OpenAITranscriptionClient("test-secret", { http });

    const error = await client.transcribe(request).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error).toMatchObject({
      message: "Rate limit hit: Rate limit reached",
      retryAfterSeconds: 7
    });
  });

  it("maps other HTTP failures to a service error", async () => {
    const { http } = fakeHttp({
      status: 500,
      data: JSON.stringify({ error: { message: "boom" } })
    });
    const client = new OpenAITranscriptionClient("test-secret", { http });

    const error = await client.transcribe(request).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ServiceError);
    expect(error).toMatchObject({ message: "Transcription failed: boom", status: 500 });
  });

  it("wraps transport failures as service errors", async () => {
    const { http } = fakeHttp(new Error("socket hang up"));
    const client = new OpenAITranscriptionClient("test-secret", { http });

    const error = await client.transcribe(request).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ServiceError);
    expect(error).toMatchObject({
      message: "Transcription request failed: socket hang up",
      status: undefined
    });
  });
});
