import { NoOutputGeneratedError } from "./errors";
import { WEBVTT_HEADER, normalizeNewlines } from "./subtitles";

const LEADING_HEADER = /^\uFEFF?WEBVTT(?:[ \t][^\n]*)?(?:\n|$)/;

export function stripHeader(text: string): string {
  return normalizeNewlines(text).replace(LEADING_HEADER, "").trim();
}

/**
 * Joins per-segment transcripts under a single header. Absent entries stand
 * for failed segments and are skipped; if every entry is absent there is
 * nothing to emit.
 */
export function assembleTranscripts(transcripts: ReadonlyArray<string | null | undefined>): string {
  const present = transcripts.filter(
    (transcript): transcript is string => transcript !== null && transcript !== undefined
  );
  if (present.length === 0) {
    throw new NoOutputGeneratedError();
  }

  let combined = `${WEBVTT_HEADER}\n\n`;
  for (const transcript of present) {
    const body = stripHeader(transcript);
    if (!body) {
      continue;
    }
    combined += `${body}\n\n`;
  }
  return combined;
}
