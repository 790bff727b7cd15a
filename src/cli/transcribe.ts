#!/usr/bin/env node
import { Command, Option } from "commander";
import fs from "node:fs";
import path from "node:path";

import { DEFAULT_BASE_URL, DEFAULT_MODEL } from "../api";
import { loadCorrectionRules } from "../corrector";
import { DEFAULT_MAX_RETRIES, RetryPolicy } from "../retry";
import { DEFAULT_CHUNK_SECONDS } from "../segmenter";
import { transcribeExamVideo } from "../pipeline";
import { vttToSrt, writeSubtitleFile } from "../subtitles";
import { parseRoles, previewLines } from "./shared";

function buildCommand(): Command {
  const program = new Command();
  program
    .description("Transcribe an eye-exam video into a labeled subtitle file.")
    .requiredOption("--video <path>", "Path to the exam video to transcribe")
    .option("--output <path>", "Path for the subtitle file (default: <video>_transcript.<format>)")
    .option(
      "--chunk-seconds <seconds>",
      "Length of each chunk sent for transcription",
      (value) => parseFloat(value),
      DEFAULT_CHUNK_SECONDS
    )
    .option(
      "--max-retries <count>",
      "Attempts per chunk when the service rate limits",
      (value) => parseInt(value, 10),
      DEFAULT_MAX_RETRIES
    )
    .addOption(
      new Option("--model <name>", "Transcription model").env("TRANSCRIBE_MODEL").default(DEFAULT_MODEL)
    )
    .option("--language <code>", "ISO-639-1 language of the recording")
    .addOption(new Option("--format <format>", "Output format").choices(["vtt", "srt"]).default("vtt"))
    .addOption(
      new Option("--segment-format <format>", "Media format of the chunks")
        .choices(["mp3", "mp4"])
        .default("mp3")
    )
    .option("--rules <path>", "JSON correction table replacing the built-in one")
    .option("--roles <a,b>", "Speaker labels, first one starts", "Interviewer,Patient")
    .option("--offset-timestamps", "Shift cue times by each chunk's position in the video", false)
    .option("--continuous-speakers", "Carry speaker alternation across chunks", false)
    .addOption(
      new Option("--base-url <url>", "Override the transcription API base URL")
        .env("OPENAI_BASE_URL")
        .default(DEFAULT_BASE_URL)
    )
    .option(
      "--preview-lines <count>",
      "Lines of the result to print",
      (value) => parseInt(value, 10),
      20
    );
  return program;
}

async function main(argv: string[]): Promise<number> {
  const program = buildCommand();
  program.exitOverride();

  try {
    const options = program.parse(argv).opts<{
      video: string;
      output?: string;
      chunkSeconds: number;
      maxRetries: number;
      model: string;
      language?: string;
      format: "vtt" | "srt";
      segmentFormat: "mp3" | "mp4";
      rules?: string;
      roles: string;
      offsetTimestamps: boolean;
      continuousSpeakers: boolean;
      baseUrl: string;
      previewLines: number;
    }>();

    const videoPath = path.resolve(options.video);
    if (!fs.existsSync(videoPath)) {
      throw new Error(`Video file not found: ${videoPath}`);
    }
    console.info(`Processing video ${videoPath}`);

    const result = await transcribeExamVideo({
      videoPath,
      chunkSeconds: options.chunkSeconds,
      segmentFormat: options.segmentFormat,
      retryPolicy: new RetryPolicy({ maxRetries: options.maxRetries }),
      model: options.model,
      language: options.language,
      baseUrl: options.baseUrl,
      rules: options.rules ? loadCorrectionRules(options.rules) : undefined,
      roles: parseRoles(options.roles),
      speakerContinuity: options.continuousSpeakers ? "document" : "per-segment",
      offsetTimestamps: options.offsetTimestamps
    });

    const content = options.format === "srt" ? vttToSrt(result.document) : result.document;
    const outputPath =
      options.output ??
      path.join(
        path.dirname(videoPath),
        `${path.parse(videoPath).name}_transcript.${options.format}`
      );
    const written = writeSubtitleFile(content, outputPath);

    console.log(previewLines(content, options.previewLines));
    console.info(`Transcription saved to ${written}`);
    return 0;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "commander.helpDisplayed") {
      return 0;
    }
    console.error(error instanceof Error ? error.message : String(error));
    return 1;
  }
}

if (require.main === module) {
  main(process.argv).then(
    (code) => {
      process.exit(code);
    },
    (err) => {
      console.error(err instanceof Error ? err.message : String(err));
      process.exit(1);
    }
  );
}

export default main;
