export class TranslationApiError extends Error {
  constructor(
    message: string,
    public status?: number,
    public detail?: unknown
  ) {
    super(message);
    this.name = 'TranslationApiError';
  }
}

export class DocumentIOError extends Error {
  constructor(
    message: string,
    public path?: string
  ) {
    super(message);
    this.name = 'DocumentIOError';
  }
}

export class PipelineAbortedError extends Error {
  constructor(message = 'Pipeline aborted') {
    super(message);
    this.name = 'PipelineAbortedError';
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error occurred';
}
