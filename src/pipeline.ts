import { assembleTranscripts } from "./assembler";
import { correctTranscript, defaultCorrectionRules } from "./corrector";
import { MaxRetriesExceededError, ServiceError } from "./errors";
import { labelSpeakersFrom } from "./labeler";
import { RetryPolicy } from "./retry";
import { MediaToolkit, withSegmentedVideo } from "./segmenter";
import { shiftTimestamps } from "./subtitles";
import { createTranscriptionService, transcribeSegment } from "./transcriber";
import {
  CompiledCorrectionRule,
  PipelineResult,
  ProgressEvent,
  SegmentFormat,
  SegmentOutcome,
  SpeakerRoles,
  TranscriptionService
} from "./types";

export type SpeakerContinuity = "per-segment" | "document";

export interface PostprocessOptions {
  rules?: readonly CompiledCorrectionRule[];
  roles?: SpeakerRoles;
  startIndex?: 0 | 1;
}

/** Corrects a raw WebVTT transcript, then labels its cues with alternating speakers. */
export function postprocessTranscript(
  text: string,
  options: PostprocessOptions = {}
): { text: string; nextIndex: 0 | 1 } {
  const corrected = correctTranscript(text, options.rules ?? defaultCorrectionRules());
  return labelSpeakersFrom(corrected, {
    roles: options.roles,
    startIndex: options.startIndex
  });
}

export interface PipelineOptions {
  videoPath: string;
  chunkSeconds?: number;
  segmentFormat?: SegmentFormat;
  toolkit?: MediaToolkit;
  tempRoot?: string;
  service?: TranscriptionService;
  retryPolicy?: RetryPolicy;
  model?: string;
  language?: string;
  prompt?: string;
  baseUrl?: string;
  searchEnvPaths?: string[];
  rules?: readonly CompiledCorrectionRule[];
  roles?: SpeakerRoles;
  speakerContinuity?: SpeakerContinuity;
  /** Shift each segment's cue times by the segment's start in the source. */
  offsetTimestamps?: boolean;
  onProgress?: (event: ProgressEvent) => void;
}

function isSegmentFailure(error: unknown): error is ServiceError | MaxRetriesExceededError {
  return error instanceof ServiceError || error instanceof MaxRetriesExceededError;
}

export async function transcribeExamVideo(options: PipelineOptions): Promise<PipelineResult> {
  const {
    videoPath,
    chunkSeconds,
    segmentFormat,
    toolkit,
    tempRoot,
    retryPolicy = new RetryPolicy(),
    speakerContinuity = "per-segment",
    offsetTimestamps = false,
    onProgress
  } = options;
  const rules = options.rules ?? defaultCorrectionRules();
  const service =
    options.service ??
    createTranscriptionService({
      baseUrl: options.baseUrl,
      searchEnvPaths: options.searchEnvPaths
    });

  return withSegmentedVideo(
    videoPath,
    { chunkSeconds, format: segmentFormat, toolkit, tempRoot },
    async (media) => {
      const total = media.segments.length;
      onProgress?.({ type: "segmented", total, reportedDuration: media.reportedDuration });

      const outcomes: SegmentOutcome[] = [];
      let speakerIndex: 0 | 1 = 0;

      for (const segment of media.segments) {
        onProgress?.({ type: "segment-started", index: segment.index, total });
        let raw: string;
        try {
          raw = await transcribeSegment(segment, {
            service,
            retryPolicy,
            model: options.model,
            language: options.language,
            prompt: options.prompt
          });
        } catch (error) {
          if (!isSegmentFailure(error)) {
            throw error;
          }
          console.error(`Transcription of chunk ${segment.index + 1}/${total} failed: ${error.message}`);
          outcomes.push({ segment, status: "failed", error });
          onProgress?.({ type: "segment-failed", index: segment.index, total, error });
          continue;
        }

        const processed = postprocessTranscript(raw, {
          rules,
          roles: options.roles,
          startIndex: speakerContinuity === "document" ? speakerIndex : 0
        });
        speakerIndex = processed.nextIndex;
        const text = offsetTimestamps
          ? shiftTimestamps(processed.text, Math.round(segment.start * 1000))
          : processed.text;

        outcomes.push({ segment, status: "transcribed", text });
        onProgress?.({ type: "segment-finished", index: segment.index, total });
      }

      const document = assembleTranscripts(
        outcomes.map((outcome) => (outcome.status === "transcribed" ? outcome.text : null))
      );
      const failed = outcomes.filter((outcome) => outcome.status === "failed").length;
      console.info(
        `Transcription completed: ${total - failed}/${total} chunks transcribed.`
      );

      return {
        document,
        outcomes,
        totalDuration: media.totalDuration,
        reportedDuration: media.reportedDuration
      };
    }
  );
}
