export {
  DEFAULT_API_KEY_ENV,
  DEFAULT_BASE_URL,
  DEFAULT_MODEL,
  OpenAITranscriptionClient,
  requireApiKey
} from "./api";

export {
  DecodeError,
  InvalidParameterError,
  MaxRetriesExceededError,
  NoOutputGeneratedError,
  RateLimitedError,
  ServiceError,
  TranscriberError
} from "./errors";

export {
  DEFAULT_CHUNK_SECONDS,
  DEFAULT_SEGMENT_FORMAT,
  FfmpegToolkit,
  planSegments,
  segmentVideo,
  segmentVideo as segment,
  withSegmentedVideo
} from "./segmenter";

export { DEFAULT_MAX_RETRIES, RetryPolicy, realSleep } from "./retry";

export {
  createTranscriptionService,
  transcribeSegment,
  transcribeSegment as transcribe
} from "./transcriber";

export {
  DEFAULT_RULES_PATH,
  compileRules,
  correctLine,
  correctTranscript,
  correctTranscript as correct,
  defaultCorrectionRules,
  loadCorrectionRules,
  loadCorrectionTable,
  parseCorrectionTable
} from "./corrector";

export {
  DEFAULT_SPEAKER_ROLES,
  labelSpeakers,
  labelSpeakers as label,
  labelSpeakersFrom
} from "./labeler";

export { assembleTranscripts, assembleTranscripts as assemble, stripHeader } from "./assembler";

export {
  TIMING_MARKER,
  WEBVTT_HEADER,
  formatTimestamp,
  isHeaderLine,
  isTimingLine,
  parseTimestamp,
  parseVtt,
  renderVtt,
  shiftTimestamps,
  vttToSrt,
  writeSubtitleFile
} from "./subtitles";

export { postprocessTranscript, transcribeExamVideo } from "./pipeline";

export type { MediaToolkit, SegmentOptions } from "./segmenter";
export type { RetryHooks, RetryPolicyOptions, Sleep } from "./retry";
export type { CorrectionTable } from "./corrector";
export type { LabelOptions, LabelResult } from "./labeler";
export type { PipelineOptions, PostprocessOptions, SpeakerContinuity } from "./pipeline";
export type {
  CompiledCorrectionRule,
  CorrectionRule,
  Cue,
  MediaSegment,
  PipelineResult,
  ProgressEvent,
  SegmentedMedia,
  SegmentFormat,
  SegmentOutcome,
  SegmentPlan,
  SpeakerRoles,
  SubtitleDocument,
  TranscriptionRequest,
  TranscriptionService
} from "./types";
