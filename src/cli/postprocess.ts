#!/usr/bin/env node
import { Command, Option } from "commander";
import fs from "node:fs";
import path from "node:path";

import { loadCorrectionRules } from "../corrector";
import { postprocessTranscript } from "../pipeline";
import { vttToSrt, writeSubtitleFile } from "../subtitles";
import { parseRoles } from "./shared";

function buildCommand(): Command {
  const program = new Command();
  program
    .description("Correct and speaker-label an existing WebVTT transcript.")
    .option("--input <path>", "Path to the WebVTT transcript", "transcript.vtt")
    .option("--output <path>", "Path for the processed file (default: <input>_labeled.<format>)")
    .option("--rules <path>", "JSON correction table replacing the built-in one")
    .option("--roles <a,b>", "Speaker labels, first one starts", "Interviewer,Patient")
    .addOption(new Option("--format <format>", "Output format").choices(["vtt", "srt"]).default("vtt"));
  return program;
}

async function main(argv: string[]): Promise<number> {
  const program = buildCommand();
  program.exitOverride();

  try {
    const options = program.parse(argv).opts<{
      input: string;
      output?: string;
      rules?: string;
      roles: string;
      format: "vtt" | "srt";
    }>();

    const inputPath = path.resolve(options.input);
    if (!fs.existsSync(inputPath)) {
      throw new Error(`Input file not found: ${inputPath}`);
    }

    const { text } = postprocessTranscript(fs.readFileSync(inputPath, "utf-8"), {
      rules: options.rules ? loadCorrectionRules(options.rules) : undefined,
      roles: parseRoles(options.roles)
    });
    const outputPath =
      options.output ??
      path.join(path.dirname(inputPath), `${path.parse(inputPath).name}_labeled.${options.format}`);
    const written = writeSubtitleFile(options.format === "srt" ? vttToSrt(text) : text, outputPath);
    console.info(`Wrote subtitles to ${written}`);
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
    (code) => process.exit(code),
    (error) => {
      console.error(error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  );
}

export default main;
