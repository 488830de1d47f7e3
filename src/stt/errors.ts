export type TranscriptionErrorKind =
  | 'no_api_key'
  | 'network_error'
  | 'api_error'
  | 'invalid_response'
  | 'invalid_audio'
  | 'rate_limited'
  | 'max_retries_exceeded';

function describe(kind: TranscriptionErrorKind, detail?: string): string {
  switch (kind) {
    case 'no_api_key':
      return 'No API key configured. Please add your OpenAI API key in Settings.';
    case 'network_error':
      return `Network error: ${detail ?? 'unknown'}`;
    case 'api_error':
      return `API error: ${detail ?? 'unknown'}`;
    case 'invalid_response':
      return 'Invalid response from API';
    case 'invalid_audio':
      return 'Recorded audio is not a WAV file';
    case 'rate_limited':
      return 'Rate limited by API. Please try again later.';
    case 'max_retries_exceeded':
      return 'Transcription failed after multiple attempts';
  }
}

export class TranscriptionError extends Error {
  public readonly kind: TranscriptionErrorKind;
  public readonly detail?: string;
  public readonly status?: number;

  constructor(kind: TranscriptionErrorKind, detail?: string, options: { status?: number; cause?: unknown } = {}) {
    super(describe(kind, detail), options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'TranscriptionError';
    this.kind = kind;
    this.detail = detail;
    this.status = options.status;
  }
}

export function isTranscriptionError(error: unknown, kind?: TranscriptionErrorKind): error is TranscriptionError {
  return error instanceof TranscriptionError && (kind === undefined || error.kind === kind);
}
