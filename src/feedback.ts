/**
 * Attempt Feedback
 *
 * Categorizes a validation outcome for the attempt log and builds the text
 * that is fed back to the generator on the next attempt.
 */

import type { AttemptCategory, FailurePhase, ValidationOutcome } from './types.js';
import {
  MISSING_ENTRY_POINT_DIAGNOSTIC,
  UNSAFE_ARTIFACT_DIAGNOSTIC,
} from './departments/quality-gate.js';

export interface OutcomeCategory {
  category: AttemptCategory;
  phase?: FailurePhase;
}

/**
 * Classify an outcome. Checks run most specific first: nothing generated,
 * rejected names, timeouts, then the stage that failed.
 */
export function categorizeOutcome(outcome: ValidationOutcome): OutcomeCategory {
  if (outcome.compiled && outcome.ran) {
    return { category: 'success' };
  }

  if (outcome.metadata.files.length === 0) {
    return { category: 'empty_extraction', phase: 'generation' };
  }

  if (outcome.diagnosticText.startsWith(UNSAFE_ARTIFACT_DIAGNOSTIC)) {
    return { category: 'unsafe_artifact', phase: 'generation' };
  }

  const phase: FailurePhase = outcome.compiled ? 'execution' : 'compilation';

  if (/stage timed out after \d+ms/.test(outcome.diagnosticText)) {
    return { category: 'timeout', phase };
  }

  if (!outcome.compiled) {
    return { category: 'compile_failure', phase };
  }

  if (
    outcome.metadata.entryPoint === undefined &&
    outcome.diagnosticText.includes(MISSING_ENTRY_POINT_DIAGNOSTIC)
  ) {
    return { category: 'missing_entry_point', phase };
  }

  return { category: 'runtime_failure', phase };
}

/**
 * Text given to the generator on the next attempt: the diagnostics as
 * captured, then the analyst's notes when there are any.
 */
export function buildFeedback(outcome: ValidationOutcome): string {
  if (outcome.analysis) {
    return `${outcome.diagnosticText}\n\nAnalysis:\n${outcome.analysis}`;
  }
  return outcome.diagnosticText;
}

// javac: `src/Foo.java:12: error: ...`; kotlinc: `e: file:///x/Foo.kt:3:5 ...` or `e: Foo.kt: (3, 5): ...`
const ERROR_LINE = /^(?:\S+\.java:\d+: error: .+|e: .+)$/;

/**
 * Compiler error lines in a diagnostic, for log output.
 */
export function compilerErrorLines(diagnosticText: string): string[] {
  return diagnosticText
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => ERROR_LINE.test(line));
}
