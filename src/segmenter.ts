import { execFile } from "node:child_process";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { promisify } from "node:util";

import { DecodeError, InvalidParameterError } from "./errors";
import { MediaSegment, SegmentedMedia, SegmentFormat, SegmentPlan } from "./types";

const execFileAsync = promisify(execFile);

export const DEFAULT_CHUNK_SECONDS = 60;
export const DEFAULT_SEGMENT_FORMAT: SegmentFormat = "mp3";

export interface MediaToolkit {
  probeDuration(sourcePath: string): Promise<number>;
  extractSegment(
    sourcePath: string,
    plan: SegmentPlan,
    targetPath: string,
    format: SegmentFormat
  ): Promise<void>;
}

/** Shells out to the `ffprobe` and `ffmpeg` binaries found on PATH (or given explicitly). */
export class FfmpegToolkit implements MediaToolkit {
  constructor(
    private readonly ffmpegPath: string = process.env.FFMPEG_PATH ?? "ffmpeg",
    private readonly ffprobePath: string = process.env.FFPROBE_PATH ?? "ffprobe"
  ) {}

  async probeDuration(sourcePath: string): Promise<number> {
    const { stdout } = await execFileAsync(this.ffprobePath, [
      "-v",
      "error",
      "-show_entries",
      "format=duration",
      "-of",
      "default=noprint_wrappers=1:nokey=1",
      sourcePath
    ]);
    const duration = Number.parseFloat(stdout.trim());
    if (!Number.isFinite(duration)) {
      throw new DecodeError(`Could not read duration of ${sourcePath}: "${stdout.trim()}"`);
    }
    return duration;
  }

  async extractSegment(
    sourcePath: string,
    plan: SegmentPlan,
    targetPath: string,
    format: SegmentFormat
  ): Promise<void> {
    const codecArgs =
      format === "mp3"
        ? ["-vn", "-ac", "1", "-ar", "16000", "-c:a", "libmp3lame", "-b:a", "64k"]
        : ["-c:v", "libx264", "-c:a", "aac"];
    await execFileAsync(this.ffmpegPath, [
      "-hide_banner",
      "-loglevel",
      "error",
      "-y",
      "-ss",
      plan.start.toFixed(3),
      "-t",
      (plan.end - plan.start).toFixed(3),
      "-i",
      sourcePath,
      ...codecArgs,
      targetPath
    ]);
  }
}

function assertChunkSeconds(chunkSeconds: number): void {
  if (!Number.isFinite(chunkSeconds) || Math.round(chunkSeconds * 1000) < 1) {
    throw new InvalidParameterError(
      `Chunk duration must be at least 0.001 seconds, got ${chunkSeconds}.`
    );
  }
}

/**
 * Splits `[0, totalDuration)` into contiguous slices of `chunkSeconds`; only the
 * last slice may be shorter. Boundaries are placed on a millisecond grid (the
 * precision ffmpeg is given), and the last slice always ends at `totalDuration`.
 */
export function planSegments(totalDuration: number, chunkSeconds: number): SegmentPlan[] {
  assertChunkSeconds(chunkSeconds);
  if (!Number.isFinite(totalDuration) || totalDuration < 0) {
    throw new DecodeError(`Invalid media duration: ${totalDuration}`);
  }

  const totalMs = Math.round(totalDuration * 1000);
  const chunkMs = Math.round(chunkSeconds * 1000);
  const count = Math.ceil(totalMs / chunkMs);
  const plans: SegmentPlan[] = [];
  for (let index = 0; index < count; index += 1) {
    plans.push({
      index,
      start: (index * chunkMs) / 1000,
      end: index === count - 1 ? totalDuration : ((index + 1) * chunkMs) / 1000
    });
  }
  return plans;
}

export interface SegmentOptions {
  chunkSeconds?: number;
  format?: SegmentFormat;
  toolkit?: MediaToolkit;
  tempRoot?: string;
}

function asDecodeError(error: unknown, sourcePath: string): DecodeError {
  if (error instanceof DecodeError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new DecodeError(`Failed to decode ${sourcePath}: ${message}`, { cause: error });
}

export async function segmentVideo(
  videoPath: string,
  options: SegmentOptions = {}
): Promise<SegmentedMedia> {
  const {
    chunkSeconds = DEFAULT_CHUNK_SECONDS,
    format = DEFAULT_SEGMENT_FORMAT,
    toolkit = new FfmpegToolkit(),
    tempRoot = os.tmpdir()
  } = options;

  assertChunkSeconds(chunkSeconds);

  const sourcePath = path.resolve(videoPath);
  if (!fs.existsSync(sourcePath)) {
    throw new DecodeError(`Video file not found: ${sourcePath}`);
  }

  let totalDuration: number;
  try {
    totalDuration = await toolkit.probeDuration(sourcePath);
  } catch (error) {
    throw asDecodeError(error, sourcePath);
  }

  const plans = planSegments(totalDuration, chunkSeconds);
  const reportedDuration = Math.ceil(totalDuration);
  console.info(
    `Total video length: ${reportedDuration} seconds. Splitting into ${plans.length} chunks...`
  );

  const workDir = await fs.promises.mkdtemp(path.join(tempRoot, "exam-transcriber-"));
  const dispose = async (): Promise<void> => {
    await fs.promises.rm(workDir, { recursive: true, force: true });
  };

  const segments: MediaSegment[] = [];
  try {
    for (const plan of plans) {
      const target = path.join(workDir, `chunk_${plan.index}.${format}`);
      try {
        await toolkit.extractSegment(sourcePath, plan, target, format);
      } catch (error) {
        throw asDecodeError(error, sourcePath);
      }
      segments.push({ ...plan, path: target });
    }
  } catch (error) {
    await dispose();
    throw error;
  }

  return { segments, totalDuration, reportedDuration, workDir, dispose };
}

/** Segments the video, hands the segments to `fn`, and always removes the temporary files. */
export async function withSegmentedVideo<T>(
  videoPath: string,
  options: SegmentOptions,
  fn: (media: SegmentedMedia) => Promise<T>
): Promise<T> {
  const media = await segmentVideo(videoPath, options);
  try {
    return await fn(media);
  } finally {
    await media.dispose();
  }
}
