import {
  DEFAULT_API_KEY_ENV,
  DEFAULT_BASE_URL,
  DEFAULT_MODEL,
  OpenAITranscriptionClient,
  requireApiKey
} from "./api";
import { RateLimitedError } from "./errors";
import { RetryPolicy } from "./retry";
import { MediaSegment, TranscriptionService } from "./types";

export interface TranscribeSegmentOptions {
  service?: TranscriptionService;
  retryPolicy?: RetryPolicy;
  model?: string;
  language?: string;
  prompt?: string;
  baseUrl?: string;
  searchEnvPaths?: string[];
}

export function createTranscriptionService(
  options: { baseUrl?: string; searchEnvPaths?: string[] } = {}
): TranscriptionService {
  const apiKey = requireApiKey(DEFAULT_API_KEY_ENV, { searchPaths: options.searchEnvPaths });
  return new OpenAITranscriptionClient(apiKey, {
    baseUrl: options.baseUrl ?? DEFAULT_BASE_URL
  });
}

/**
 * Transcribes one segment to WebVTT. Rate limiting is retried per the policy;
 * every other failure propagates on the first occurrence.
 */
export async function transcribeSegment(
  segment: MediaSegment,
  options: TranscribeSegmentOptions = {}
): Promise<string> {
  const {
    model = DEFAULT_MODEL,
    language,
    prompt,
    retryPolicy = new RetryPolicy()
  } = options;
  const service =
    options.service ??
    createTranscriptionService({
      baseUrl: options.baseUrl,
      searchEnvPaths: options.searchEnvPaths
    });

  return retryPolicy.run(
    (attempt) => {
      console.info(
        `Transcribing chunk ${segment.index + 1} (${segment.start}s-${segment.end}s, attempt ${attempt + 1}/${retryPolicy.maxRetries})`
      );
      return service.transcribe({
        filePath: segment.path,
        model,
        responseFormat: "vtt",
        language,
        prompt
      });
    },
    {
      isRetryable: (error) => error instanceof RateLimitedError,
      onRetry: ({ waitSeconds }) => {
        console.warn(`Rate limit hit. Retrying in ${waitSeconds} seconds...`);
      }
    }
  );
}
