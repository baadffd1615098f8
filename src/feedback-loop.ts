/**
 * Feedback Loop Controller
 *
 * Plans once, then alternates generation and validation until an attempt
 * compiles and runs or the attempt budget is spent. Each retry gets the
 * previous attempt's diagnostics embedded in the generator prompt.
 *
 * Content failures end the session with success=false. Infrastructure
 * failures (planning, missing toolchain, workspace I/O) abort the session
 * and are rethrown.
 */

import type { Planner, OperationPlan } from './departments/planning.js';
import type { Generator } from './departments/generation.js';
import type { ToolchainValidator } from './departments/quality-gate.js';
import { SessionManager } from './state.js';
import { buildFeedback, categorizeOutcome, compilerErrorLines } from './feedback.js';
import { errorMessage } from './errors.js';
import {
  isSuccessfulOutcome,
  type ArtifactSet,
  type AttemptRecord,
  type Session,
  type SessionPhase,
  type SessionResult,
  type TargetLanguage,
  type ValidationOutcome,
} from './types.js';

export interface FeedbackLoopOptions {
  planner: Pick<Planner, 'plan'>;
  generator: Pick<Generator, 'generate'>;
  validator: Pick<ToolchainValidator, 'validate'>;
  /** Directory the validator builds in */
  workspace: string;
  maxAttempts: number;
  language: TargetLanguage;
  /** Called after every validated attempt */
  onAttempt?: (record: AttemptRecord) => void;
  sessions?: SessionManager;
}

export class FeedbackLoopController {
  private planner: Pick<Planner, 'plan'>;
  private generator: Pick<Generator, 'generate'>;
  private validator: Pick<ToolchainValidator, 'validate'>;
  private workspace: string;
  private maxAttempts: number;
  private language: TargetLanguage;
  private onAttempt?: (record: AttemptRecord) => void;
  private sessions: SessionManager;

  constructor(options: FeedbackLoopOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
    }
    this.planner = options.planner;
    this.generator = options.generator;
    this.validator = options.validator;
    this.workspace = options.workspace;
    this.maxAttempts = options.maxAttempts;
    this.language = options.language;
    this.onAttempt = options.onAttempt;
    this.sessions = options.sessions ?? new SessionManager();
  }

  async run(request: string): Promise<SessionResult> {
    const session = this.sessions.createSession(request, this.language, this.maxAttempts);

    try {
      return await this.runSession(session);
    } catch (error) {
      this.move(session, 'aborted', errorMessage(error));
      console.error(`[FeedbackLoop] Session aborted: ${errorMessage(error)}`);
      throw error;
    }
  }

  private async runSession(session: Session): Promise<SessionResult> {
    const plan = await this.planner.plan(session.request);
    this.sessions.setPlan(session.id, plan);

    let artifacts: ArtifactSet = new Map();
    let outcome: ValidationOutcome | undefined;
    let feedback: string | undefined;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      console.log(`[FeedbackLoop] Attempt ${attempt}/${this.maxAttempts}`);
      const startTime = Date.now();

      this.move(session, 'generating');
      const generated = await this.generate(plan, feedback);
      artifacts = generated.artifacts;

      this.move(session, 'validating');
      outcome = await this.validator.validate(artifacts, this.workspace);

      const { category, phase } = categorizeOutcome(outcome);
      const record: AttemptRecord = {
        attempt,
        artifactNames: Array.from(artifacts.keys()),
        outcome,
        category,
        phase,
        generationError: generated.error,
        durationMs: Date.now() - startTime,
      };
      this.sessions.recordAttempt(session.id, record);
      this.onAttempt?.(record);

      if (isSuccessfulOutcome(outcome)) {
        console.log(`[FeedbackLoop] ✓ Attempt ${attempt} compiled and ran`);
        this.move(session, 'succeeded', `attempt ${attempt}`);
        return { success: true, artifacts, diagnosticText: outcome.diagnosticText, session };
      }

      const errors = compilerErrorLines(outcome.diagnosticText);
      console.log(
        `[FeedbackLoop] ✗ Attempt ${attempt} failed (${category})` +
        (errors.length > 0 ? `: ${errors.length} compiler error(s)` : '')
      );
      feedback = buildFeedback(outcome);
    }

    this.move(session, 'failed', `${this.maxAttempts} attempt(s) exhausted`);
    return {
      success: false,
      artifacts,
      diagnosticText: outcome?.diagnosticText ?? '',
      session,
    };
  }

  /**
   * A failed completion is an attempt that produced nothing.
   */
  private async generate(
    plan: OperationPlan,
    feedback: string | undefined
  ): Promise<{ artifacts: ArtifactSet; error?: string }> {
    try {
      return { artifacts: await this.generator.generate(plan, feedback) };
    } catch (error) {
      console.warn(`[FeedbackLoop] Generation failed: ${errorMessage(error)}`);
      return { artifacts: new Map(), error: errorMessage(error) };
    }
  }

  private move(session: Session, next: SessionPhase, reason?: string): void {
    const result = this.sessions.transition(session.id, next, reason);
    if (!result.success) {
      console.warn(`[FeedbackLoop] ${result.error}`);
    }
  }
}

export function createFeedbackLoopController(options: FeedbackLoopOptions): FeedbackLoopController {
  return new FeedbackLoopController(options);
}
