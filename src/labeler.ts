import { isTimingLine, normalizeNewlines } from "./subtitles";
import { SpeakerRoles } from "./types";

export const DEFAULT_SPEAKER_ROLES: SpeakerRoles = ["Interviewer", "Patient"];

export interface LabelOptions {
  roles?: SpeakerRoles;
  /** Role index (0 or 1) given to the first cue block. */
  startIndex?: 0 | 1;
}

export interface LabelResult {
  text: string;
  nextIndex: 0 | 1;
}

function labelBlock(block: string, role: string): string {
  const lines = block.split("\n");
  const timingIndex = lines.findIndex(isTimingLine);
  let lastIndex = lines.length - 1;
  while (lastIndex > timingIndex && !lines[lastIndex].trim()) {
    lastIndex -= 1;
  }
  if (lastIndex > timingIndex) {
    lines[lastIndex] = `${role}: ${lines[lastIndex]}`;
  }
  return lines.join("\n");
}

/**
 * Prefixes the last text line of every cue block with a role, alternating
 * between the two roles block by block. Blocks without a timing line (header,
 * NOTE, STYLE) are left alone and do not advance the alternation.
 */
export function labelSpeakersFrom(text: string, options: LabelOptions = {}): LabelResult {
  const roles = options.roles ?? DEFAULT_SPEAKER_ROLES;
  let current: 0 | 1 = options.startIndex ?? 0;

  // odd entries are the blank-line separators, kept as written
  const parts = normalizeNewlines(text).split(/(\n[ \t]*\n)/);
  const labeled = parts.map((part, index) => {
    if (index % 2 === 1 || !part.split("\n").some(isTimingLine)) {
      return part;
    }
    const result = labelBlock(part, roles[current]);
    current = current === 0 ? 1 : 0;
    return result;
  });

  return { text: labeled.join(""), nextIndex: current };
}

export function labelSpeakers(text: string, options: LabelOptions = {}): string {
  return labelSpeakersFrom(text, options).text;
}
