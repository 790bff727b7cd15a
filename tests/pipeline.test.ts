import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";

import { NoOutputGeneratedError, RateLimitedError, ServiceError } from "../src/errors";
import { postprocessTranscript, transcribeExamVideo } from "../src/pipeline";
import { RetryPolicy } from "../src/retry";
import { ProgressEvent } from "../src/types";
import { FakeToolkit, ScriptedService, makeTempVideo, recordingSleep } from "./fakes";

function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "exam-transcriber-test-"));
}

const firstChunk = [
  "WEBVTT",
  "",
  "00:00:00.000 --> 00:00:02.000",
  "Uhh okey, read the top line.",
  "",
  "00:00:02.000 --> 00:00:04.000",
  "E.",
  ""
].join("\n");

const lastChunk = "WEBVTT\n\n00:00:00.000 --> 00:00:03.000\nCover your left ey.\n";

function singleCue(text: string): string {
  return `WEBVTT\n\n00:00:00.000 --> 00:00:01.000\n${text}\n`;
}

describe("transcribeExamVideo", () => {
  it("skips a failed chunk and keeps the rest in order", async () => {
    const root = tempDir();
    const videoPath = makeTempVideo(root);
    const service = new ScriptedService({
      chunk_0: [firstChunk],
      chunk_1: [new ServiceError("Transcription failed: bad audio", 400)],
      chunk_2: [lastChunk]
    });

    const result = await transcribeExamVideo({
      videoPath,
      toolkit: new FakeToolkit(125),
      tempRoot: root,
      service
    });

    expect(result.totalDuration).toBe(125);
    expect(result.outcomes.map((outcome) => outcome.segment.end - outcome.segment.start)).toEqual([
      60, 60, 5
    ]);
    expect(result.outcomes.map((outcome) => outcome.status)).toEqual([
      "transcribed",
      "failed",
      "transcribed"
    ]);
    expect(result.document).toBe(
      [
        "WEBVTT",
        "",
        "00:00:00.000 --> 00:00:02.000",
        "Interviewer: okay, read the top line.",
        "",
        "00:00:02.000 --> 00:00:04.000",
        "Patient: E.",
        "",
        "00:00:00.000 --> 00:00:03.000",
        "Interviewer: Cover your left eye.",
        "",
        ""
      ].join("\n")
    );
    expect(service.requests.map((request) => path.basename(request.filePath))).toEqual([
      "chunk_0.mp3",
      "chunk_1.mp3",
      "chunk_2.mp3"
    ]);
    expect(fs.readdirSync(root)).toEqual(["exam.mp4"]);
  });

  it("reports no output when every chunk fails", async () => {
    const root = tempDir();
    const videoPath = makeTempVideo(root);
    const service = new ScriptedService({
      chunk_0: [new ServiceError("down", 503)],
      chunk_1: [new ServiceError("down", 503)]
    });

    await expect(
      transcribeExamVideo({ videoPath, toolkit: new FakeToolkit(90), tempRoot: root, service })
    ).rejects.toBeInstanceOf(NoOutputGeneratedError);
    expect(fs.readdirSync(root)).toEqual(["exam.mp4"]);
  });

  it("skips chunks that stay rate limited", async () => {
    const root = tempDir();
    const videoPath = makeTempVideo(root);
    const { sleep, waits } = recordingSleep();
    const service = new ScriptedService({
      chunk_0: [new RateLimitedError("limited"), singleCue("Hello.")],
      chunk_1: [new RateLimitedError("limited")]
    });

    const result = await transcribeExamVideo({
      videoPath,
      toolkit: new FakeToolkit(100),
      tempRoot: root,
      service,
      retryPolicy: new RetryPolicy({ maxRetries: 2, sleep })
    });

    expect(result.outcomes.map((outcome) => outcome.status)).toEqual(["transcribed", "failed"]);
    expect(waits).toEqual([5, 5]);
    expect(result.document).toBe(
      "WEBVTT\n\n00:00:00.000 --> 00:00:01.000\nInterviewer: Hello.\n\n"
    );
  });

  it("aborts on unexpected errors", async () => {
    const root = tempDir();
    const videoPath = makeTempVideo(root);
    const service = new ScriptedService({ chunk_0: [new TypeError("bad state")] });

    await expect(
      transcribeExamVideo({ videoPath, toolkit: new FakeToolkit(30), tempRoot: root, service })
    ).rejects.toBeInstanceOf(TypeError);
    expect(fs.readdirSync(root)).toEqual(["exam.mp4"]);
  });

  it("restarts speaker alternation per chunk unless asked to carry it", async () => {
    const root = tempDir();
    const videoPath = makeTempVideo(root);
    const script = () => ({
      chunk_0: [singleCue("one")],
      chunk_1: [singleCue("two")],
      chunk_2: [singleCue("three")]
    });

    const perSegment = await transcribeExamVideo({
      videoPath,
      toolkit: new FakeToolkit(150),
      tempRoot: root,
      service: new ScriptedService(script())
    });
    const continuous = await transcribeExamVideo({
      videoPath,
      toolkit: new FakeToolkit(150),
      tempRoot: root,
      service: new ScriptedService(script()),
      speakerContinuity: "document"
    });

    expect(perSegment.document.match(/^\w+(?=: )/gm)).toEqual([
      "Interviewer",
      "Interviewer",
      "Interviewer"
    ]);
    expect(continuous.document.match(/^\w+(?=: )/gm)).toEqual([
      "Interviewer",
      "Patient",
      "Interviewer"
    ]);
  });

  it("offsets cue times by chunk start when requested", async () => {
    const root = tempDir();
    const videoPath = makeTempVideo(root);
    const service = new ScriptedService({
      chunk_0: [singleCue("first")],
      chunk_1: [singleCue("second")]
    });

    const result = await transcribeExamVideo({
      videoPath,
      toolkit: new FakeToolkit(80),
      tempRoot: root,
      service,
      offsetTimestamps: true
    });

    expect(result.document).toBe(
      [
        "WEBVTT",
        "",
        "00:00:00.000 --> 00:00:01.000",
        "Interviewer: first",
        "",
        "00:01:00.000 --> 00:01:01.000",
        "Interviewer: second",
        "",
        ""
      ].join("\n")
    );
  });

  it("emits progress events in order", async () => {
    const root = tempDir();
    const videoPath = makeTempVideo(root);
    const events: ProgressEvent[] = [];
    const failure = new ServiceError("bad audio", 400);
    const service = new ScriptedService({
      chunk_0: [singleCue("hello")],
      chunk_1: [failure]
    });

    await transcribeExamVideo({
      videoPath,
      toolkit: new FakeToolkit(61),
      tempRoot: root,
      service,
      onProgress: (event) => events.push(event)
    });

    expect(events).toEqual([
      { type: "segmented", total: 2, reportedDuration: 61 },
      { type: "segment-started", index: 0, total: 2 },
      { type: "segment-finished", index: 0, total: 2 },
      { type: "segment-started", index: 1, total: 2 },
      { type: "segment-failed", index: 1, total: 2, error: failure }
    ]);
  });
});

describe("postprocessTranscript", () => {
  it("corrects before labeling", () => {
    const { text, nextIndex } = postprocessTranscript(singleCue("Um, okey"));
    expect(text).toBe("WEBVTT\n\n00:00:00.000 --> 00:00:01.000\nInterviewer: okay\n");
    expect(nextIndex).toBe(1);
  });
});
