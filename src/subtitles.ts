import fs from "node:fs";
import path from "node:path";

import { Cue, SubtitleDocument } from "./types";

export const WEBVTT_HEADER = "WEBVTT";
export const TIMING_MARKER = "-->";

const TIMESTAMP_PATTERN = /(?:(\d{1,}):)?(\d{2}):(\d{2})[.,](\d{3})/g;
const TIMING_LINE = /^\s*(\S+)\s+-->\s+(\S+)(?:\s+(.*))?$/;

export function isTimingLine(line: string): boolean {
  return line.includes(TIMING_MARKER);
}

export function isHeaderLine(line: string): boolean {
  return line === WEBVTT_HEADER;
}

export function normalizeNewlines(text: string): string {
  return text.replace(/\r\n?/g, "\n");
}

/** Splits subtitle text into blocks separated by one or more blank lines. */
export function splitBlocks(text: string): string[] {
  return normalizeNewlines(text)
    .split(/\n[ \t]*\n/)
    .map((block) => block.replace(/^\n+|\n+$/g, ""))
    .filter((block) => block.length > 0);
}

export function formatTimestamp(ms: number, separator: "." | "," = "."): string {
  const millis = Math.max(0, Math.round(ms));
  const totalSeconds = Math.floor(millis / 1000);
  const remainderMillis = millis % 1000;
  const seconds = totalSeconds % 60;
  const totalMinutes = Math.floor(totalSeconds / 60);
  const minutes = totalMinutes % 60;
  const hours = Math.floor(totalMinutes / 60);
  return `${hours.toString().padStart(2, "0")}:${minutes
    .toString()
    .padStart(2, "0")}:${seconds.toString().padStart(2, "0")}${separator}${remainderMillis
    .toString()
    .padStart(3, "0")}`;
}

export function parseTimestamp(value: string): number {
  const match = /^(?:(\d{1,}):)?(\d{2}):(\d{2})[.,](\d{3})$/.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid timestamp: ${value}`);
  }
  const [, hours = "0", minutes, seconds, millis] = match;
  return (
    Number(hours) * 3_600_000 +
    Number(minutes) * 60_000 +
    Number(seconds) * 1000 +
    Number(millis)
  );
}

export function parseVtt(text: string): SubtitleDocument {
  const blocks = splitBlocks(text);
  let header = WEBVTT_HEADER;
  const cues: Cue[] = [];

  blocks.forEach((block, blockIndex) => {
    const lines = block.split("\n");
    if (blockIndex === 0 && lines[0].replace(/^\uFEFF/, "").startsWith(WEBVTT_HEADER)) {
      header = lines[0].replace(/^\uFEFF/, "");
      return;
    }
    const timingIndex = lines.findIndex(isTimingLine);
    if (timingIndex === -1) {
      return;
    }
    const timing = TIMING_LINE.exec(lines[timingIndex]);
    if (!timing) {
      throw new Error(`Malformed timing line: ${lines[timingIndex]}`);
    }
    const [, start, end, settings] = timing;
    const identifier = lines.slice(0, timingIndex).join(" ").trim();
    cues.push({
      ...(identifier ? { identifier } : {}),
      start_ms: parseTimestamp(start),
      end_ms: parseTimestamp(end),
      ...(settings ? { settings: settings.trim() } : {}),
      lines: lines.slice(timingIndex + 1)
    });
  });

  return { header, cues };
}

export function renderVtt(document: SubtitleDocument): string {
  const blocks = document.cues.map((cue) => {
    const timing = `${formatTimestamp(cue.start_ms)} ${TIMING_MARKER} ${formatTimestamp(cue.end_ms)}`;
    return [
      ...(cue.identifier ? [cue.identifier] : []),
      cue.settings ? `${timing} ${cue.settings}` : timing,
      ...cue.lines
    ].join("\n");
  });
  return `${[document.header, ...blocks].join("\n\n")}\n`;
}

/** Moves every timestamp on every timing line by `offsetMs`, leaving all other lines untouched. */
export function shiftTimestamps(text: string, offsetMs: number): string {
  if (offsetMs === 0) {
    return text;
  }
  return text
    .split("\n")
    .map((line) =>
      isTimingLine(line)
        ? line.replace(TIMESTAMP_PATTERN, (stamp) => formatTimestamp(parseTimestamp(stamp) + offsetMs))
        : line
    )
    .join("\n");
}

export function vttToSrt(text: string): string {
  const { cues } = parseVtt(text);
  const chunks: string[] = [];
  cues.forEach((cue, index) => {
    chunks.push(`${index + 1}`);
    chunks.push(
      `${formatTimestamp(cue.start_ms, ",")} ${TIMING_MARKER} ${formatTimestamp(cue.end_ms, ",")}`
    );
    chunks.push(...cue.lines);
    chunks.push("");
  });
  return `${chunks.join("\n")}\n`;
}

export function writeSubtitleFile(content: string, outputPath: string): string {
  const resolved = path.resolve(outputPath);
  console.info(`Writing subtitles to ${resolved}`);
  fs.writeFileSync(resolved, content, { encoding: "utf-8" });
  return resolved;
}
