// src/session/session.ts
import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { InvalidFeedbackError, InvalidTransitionError, PipelineError, SessionBusyError, errorMessage } from '../pipeline/errors';
import { normalizeInput, runPipeline } from '../pipeline/pipeline';
import type { Feedback, PipelineDeps, PipelineInput, PipelineRun } from '../pipeline/types';
import { toFeedbackRecord, toRunRecord } from '../records/build';
import type { RunRecorder } from '../records/types';
import type { NavigateDirection, Run, SessionSnapshot, SessionState } from './types';

export interface SessionOptions {
  recorder: RunRecorder;
  now?: () => Date;
  id?: string;
}

/** Rating must be an integer 1..5; text is kept verbatim but must not be blank. At least one must remain. */
export function validateFeedback(input: { rating?: number | null; text?: string | null }): Feedback {
  const feedback: Feedback = {};
  if (input.rating !== undefined && input.rating !== null) {
    if (!Number.isInteger(input.rating) || input.rating < 1 || input.rating > 5) {
      throw new InvalidFeedbackError('Rating must be a whole number from 1 to 5.');
    }
    feedback.rating = input.rating;
  }
  const text = input.text ?? '';
  if (text.trim()) feedback.text = text;
  if (feedback.rating === undefined && feedback.text === undefined) throw new InvalidFeedbackError();
  return feedback;
}

/**
 * Per-user conversation state. Owns the run history and the view cursor;
 * every generation goes through here so history, persistence and state
 * transitions stay in step.
 */
export class SessionContext {
  private _id: string;
  private _state: SessionState = 'idle';
  private runs: Run[] = [];
  private viewIndex: number | null = null;
  private currentInput: PipelineInput | null = null;
  private lastError: { code: string; message: string } | null = null;
  private _lastActivity: number;
  private inFlight = false;

  private readonly recorder: RunRecorder;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(private readonly deps: PipelineDeps, opts: SessionOptions) {
    this.recorder = opts.recorder;
    this.now = opts.now ?? (() => new Date());
    this._id = opts.id ?? randomUUID();
    this._lastActivity = this.now().getTime();
    this.log = deps.logger.child({ component: 'session' });
  }

  get id(): string {
    return this._id;
  }

  get state(): SessionState {
    return this._state;
  }

  /** True from the moment a command is accepted until it settles. */
  get busy(): boolean {
    return this.inFlight;
  }

  get lastActivity(): number {
    return this._lastActivity;
  }

  get latest(): Run | null {
    return this.runs.length ? this.runs[this.runs.length - 1] : null;
  }

  async generate(rawInput: Partial<PipelineInput>): Promise<Run> {
    this.claim();
    try {
      const input = normalizeInput(rawInput);
      const run = await this.execute(input, null);
      this.currentInput = input;
      return run;
    } finally {
      this.inFlight = false;
    }
  }

  async regenerate(feedback?: { rating?: number | null; text?: string | null }): Promise<Run> {
    this.claim();
    try {
      const latest = this.latest;
      const input = this.currentInput;
      if (!this.isDisplayed() || !latest || !input) {
        throw new InvalidTransitionError('regenerate', this._state);
      }
      if (feedback && (feedback.rating != null || (feedback.text ?? '').trim())) {
        await this.attachFeedback(latest, validateFeedback(feedback));
      }
      return await this.execute(input, latest.feedback);
    } finally {
      this.inFlight = false;
    }
  }

  async sendFeedback(feedback: { rating?: number | null; text?: string | null }): Promise<Feedback> {
    this.claim();
    try {
      const latest = this.latest;
      if (!latest) throw new InvalidTransitionError('send feedback', this._state);
      const valid = validateFeedback(feedback);
      await this.attachFeedback(latest, valid);
      return valid;
    } finally {
      this.inFlight = false;
    }
  }

  /** Clears everything and issues a fresh id. Returns the new id. */
  newSession(): string {
    this.assertNotRunning();
    const previous = this._id;
    this._id = randomUUID();
    this._state = 'idle';
    this.runs = [];
    this.viewIndex = null;
    this.currentInput = null;
    this.lastError = null;
    this.touch();
    this.log.info({ previous, sessionId: this._id }, 'new session');
    return this._id;
  }

  /** The latest run is never in the browsable range [0, N-2]. */
  navigate(direction: NavigateDirection): number | null {
    const last = this.runs.length - 2;
    if (last < 0) {
      this.viewIndex = null;
    } else if (direction === 'prev') {
      this.viewIndex = this.viewIndex === null ? last : Math.max(0, this.viewIndex - 1);
    } else if (this.viewIndex !== null) {
      this.viewIndex = Math.min(last, this.viewIndex + 1);
    }
    this.touch();
    return this.viewIndex;
  }

  snapshot(): SessionSnapshot {
    const latest = this.latest;
    return {
      session_id: this._id,
      state: this._state,
      runs: [...this.runs],
      latest,
      view_index: this.viewIndex,
      viewed: this.viewIndex === null ? latest : this.runs[this.viewIndex],
      pending_feedback: latest?.feedback ?? null,
      current_input: this.currentInput,
      last_error: this.lastError,
    };
  }

  private isDisplayed(): boolean {
    return this._state === 'clarification_displayed' || this._state === 'result_displayed';
  }

  private assertNotRunning(): void {
    if (this.inFlight) throw new SessionBusyError();
  }

  /** Taken before the first await so a second command cannot interleave. */
  private claim(): void {
    this.assertNotRunning();
    this.inFlight = true;
  }

  private touch(): void {
    this._lastActivity = this.now().getTime();
  }

  private async attachFeedback(run: Run, feedback: Feedback): Promise<void> {
    run.feedback = feedback;
    this.touch();
    await this.recorder.write(toFeedbackRecord(run, feedback, this.now()));
    this.log.info({ sessionId: this._id, version: run.version, rating: feedback.rating ?? null }, 'feedback recorded');
  }

  private async execute(input: PipelineInput, priorFeedback: Feedback | null): Promise<Run> {
    const before = this._state;
    this._state = 'running';
    this.touch();

    let output: PipelineRun;
    try {
      output = await runPipeline(this.deps, input, priorFeedback);
    } catch (e) {
      this._state = before === 'running' ? 'idle' : before;
      this.lastError = e instanceof PipelineError
        ? { code: e.code, message: e.message }
        : { code: 'internal_error', message: errorMessage(e) };
      this.touch();
      this.log.warn({ sessionId: this._id, code: this.lastError.code }, 'generation failed');
      throw e;
    }

    const run = this.toRun(output);
    this.runs.push(run);
    this._state = run.result.kind === 'clarification' ? 'clarification_displayed' : 'result_displayed';
    this.viewIndex = null;
    this.lastError = null;
    this.touch();
    await this.recorder.write(toRunRecord(run));
    return run;
  }

  private toRun(output: PipelineRun): Run {
    return {
      id: randomUUID(),
      session_id: this._id,
      version: this.runs.length + 1,
      created_at: this.now().toISOString(),
      input: output.input,
      tags: output.tags,
      matched_strategies: output.match.matched,
      matched_tags: output.match.matchedTags,
      result: output.result,
      rebuttal: output.rebuttal,
      evaluation: output.evaluation,
      prior_feedback: output.priorFeedback,
      feedback: null,
    };
  }
}
