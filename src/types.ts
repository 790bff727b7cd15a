export type SegmentFormat = "mp3" | "mp4";

export interface SegmentPlan {
  index: number;
  /** Inclusive start, in seconds from the beginning of the source. */
  start: number;
  /** Exclusive end, in seconds. */
  end: number;
}

export interface MediaSegment extends SegmentPlan {
  path: string;
}

export interface SegmentedMedia {
  segments: MediaSegment[];
  totalDuration: number;
  reportedDuration: number;
  workDir: string;
  dispose(): Promise<void>;
}

export interface Cue {
  identifier?: string;
  start_ms: number;
  end_ms: number;
  settings?: string;
  lines: string[];
}

export interface SubtitleDocument {
  header: string;
  cues: Cue[];
}

export type SpeakerRoles = readonly [string, string];

export interface CorrectionRule {
  pattern: string;
  replacement: string;
  caseSensitive?: boolean;
}

export interface CompiledCorrectionRule {
  regex: RegExp;
  replacement: string;
}

export interface TranscriptionRequest {
  filePath: string;
  model: string;
  responseFormat: "vtt" | "srt" | "text";
  language?: string;
  prompt?: string;
}

export interface TranscriptionService {
  transcribe(request: TranscriptionRequest): Promise<string>;
}

export type SegmentOutcome =
  | { segment: MediaSegment; status: "transcribed"; text: string }
  | { segment: MediaSegment; status: "failed"; error: Error };

export interface PipelineResult {
  document: string;
  outcomes: SegmentOutcome[];
  totalDuration: number;
  reportedDuration: number;
}

export type ProgressEvent =
  | { type: "segmented"; total: number; reportedDuration: number }
  | { type: "segment-started"; index: number; total: number }
  | { type: "segment-finished"; index: number; total: number }
  | { type: "segment-failed"; index: number; total: number; error: Error };
