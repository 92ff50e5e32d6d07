// src/pipeline/errors.ts

/**
 * Base class for errors a caller is expected to handle. `code` is the stable
 * machine-readable identifier sent to API clients, `status` the HTTP status
 * the API maps it to.
 */
export class PipelineError extends Error {
  readonly code: string;
  readonly status: number;

  constructor(code: string, status: number, message?: string, options?: { cause?: unknown }) {
    super(message || code, options);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

export class InputRequiredError extends PipelineError {
  constructor() {
    super('input_required', 400, 'Please enter a comment or a draft reply first.');
  }
}

export class InvalidFeedbackError extends PipelineError {
  constructor(message = 'Feedback needs a rating between 1 and 5 or a comment.') {
    super('invalid_feedback', 400, message);
  }
}

/** The model answered, but not with a usable JSON object. Terminal for the run. */
export class ReplyFormatError extends PipelineError {
  readonly rawOutput: string;

  constructor(rawOutput: string, detail?: string) {
    super('invalid_model_json', 422, 'The AI response was not valid JSON. Try rephrasing your input.');
    this.rawOutput = rawOutput;
    if (detail) this.message = `${this.message} (${detail})`;
  }
}

/** The reply-generation call itself failed. Terminal for the run. */
export class ReplyGenerationError extends PipelineError {
  constructor(cause: unknown) {
    super('generation_failed', 502, 'The reply could not be generated. Please try again.', { cause });
  }
}

export class SessionNotFoundError extends PipelineError {
  constructor(sessionId: string) {
    super('session_not_found', 404, `No session ${sessionId}`);
  }
}

export class SessionBusyError extends PipelineError {
  constructor() {
    super('session_busy', 409, 'A generation is already running for this session.');
  }
}

export class InvalidTransitionError extends PipelineError {
  constructor(command: string, state: string) {
    super('invalid_transition', 409, `Cannot ${command} while ${state}.`);
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
