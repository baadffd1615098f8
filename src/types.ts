/**
 * Engine Types
 *
 * Session data model plus the on-disk record schemas, validated with Zod.
 */

import { z } from 'zod';

// ============================================================================
// Artifacts
// ============================================================================

/**
 * One generated source unit. `name` is a relative path.
 */
export interface Artifact {
  name: string;
  content: string;
}

/**
 * Artifacts produced by one generation attempt, keyed by name.
 * Insertion order is the listing order.
 */
export type ArtifactSet = Map<string, string>;

// ============================================================================
// Languages & Build Systems
// ============================================================================

export const TargetLanguage = z.enum(['java', 'kotlin']);
export type TargetLanguage = z.infer<typeof TargetLanguage>;

export const BuildSystem = z.enum(['javac', 'maven', 'kotlinc', 'gradle']);
export type BuildSystem = z.infer<typeof BuildSystem>;

export type ToolchainStage = 'compile' | 'run';

// ============================================================================
// Validation Outcome
// ============================================================================

export interface ValidationMetadata {
  /** ISO-8601 */
  startedAt: string;
  /** ISO-8601 */
  endedAt: string;
  /** Artifact names validated, in set order */
  files: string[];
  buildSystem: BuildSystem;
  /** Commands run, one per stage attempted */
  toolchain: string[];
  /** Qualified name of the entry point that was run, if any */
  entryPoint?: string;
}

export interface ValidationOutcome {
  compiled: boolean;
  /** Only meaningful when compiled; always false otherwise */
  ran: boolean;
  diagnosticText: string;
  metadata: ValidationMetadata;
  /** Model-written failure analysis, when an analyst is configured */
  analysis?: string;
}

export function isSuccessfulOutcome(outcome: ValidationOutcome): boolean {
  return outcome.compiled && outcome.ran;
}

// ============================================================================
// Failure Taxonomy
// ============================================================================

/**
 * Where in an attempt the failure happened.
 */
export const FailurePhase = z.enum([
  'generation',  // Model produced nothing usable
  'compilation', // Toolchain compile stage
  'execution',   // Toolchain run stage
]);
export type FailurePhase = z.infer<typeof FailurePhase>;

export const AttemptCategory = z.enum([
  'success',
  'empty_extraction',
  'unsafe_artifact',
  'compile_failure',
  'runtime_failure',
  'missing_entry_point',
  'timeout',
]);
export type AttemptCategory = z.infer<typeof AttemptCategory>;

export interface AttemptRecord {
  /** 1-based */
  attempt: number;
  artifactNames: string[];
  outcome: ValidationOutcome;
  category: AttemptCategory;
  phase?: FailurePhase;
  /** Completion error raised while generating, if any */
  generationError?: string;
  durationMs: number;
}

// ============================================================================
// Session
// ============================================================================

export const SessionPhase = z.enum([
  'planning',
  'generating',
  'validating',
  'succeeded', // terminal
  'failed',    // terminal: attempts exhausted
  'aborted',   // terminal: infrastructure error
]);
export type SessionPhase = z.infer<typeof SessionPhase>;

export interface PhaseTransition {
  from: SessionPhase;
  to: SessionPhase;
  timestamp: Date;
  reason?: string;
}

export interface Session {
  id: string;
  request: string;
  plan?: string;
  language: TargetLanguage;
  maxAttempts: number;
  phase: SessionPhase;
  attempts: AttemptRecord[];
  history: PhaseTransition[];
  success: boolean;
  created: Date;
  updated: Date;
}

/**
 * Terminal result of a session. Returned, never thrown, for content failures.
 */
export interface SessionResult {
  success: boolean;
  artifacts: ArtifactSet;
  diagnosticText: string;
  session: Session;
}

// ============================================================================
// On-disk Records
// ============================================================================

export const GenerationSummary = z.object({
  generated_at: z.string().datetime({ offset: true }),
  file_count: z.number().int().nonnegative(),
  files: z.array(z.string()),
});
export type GenerationSummary = z.infer<typeof GenerationSummary>;

export const ValidationRecord = z.object({
  timestamp: z.string().datetime({ offset: true }),
  end_time: z.string().datetime({ offset: true }),
  compilation_success: z.boolean(),
  run_success: z.boolean(),
  files_validated: z.array(z.string()),
  diagnostic_text: z.string(),
  build_system: BuildSystem,
});
export type ValidationRecord = z.infer<typeof ValidationRecord>;

export const GenerationStatus = z.object({
  success: z.boolean(),
  file_count: z.number().int().nonnegative(),
  files: z.array(z.string()),
  attempts: z.number().int().nonnegative(),
});
export type GenerationStatus = z.infer<typeof GenerationStatus>;

export function toValidationRecord(outcome: ValidationOutcome): ValidationRecord {
  return {
    timestamp: outcome.metadata.startedAt,
    end_time: outcome.metadata.endedAt,
    compilation_success: outcome.compiled,
    run_success: outcome.compiled && outcome.ran,
    files_validated: outcome.metadata.files,
    diagnostic_text: outcome.diagnosticText,
    build_system: outcome.metadata.buildSystem,
  };
}
