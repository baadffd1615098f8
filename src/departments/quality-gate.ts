/**
 * Quality Gate Department
 *
 * Validates one artifact set with the real toolchain: write the files into
 * the workspace, compile, and run the entry point if compilation passed.
 * Content failures come back as a ValidationOutcome; only a missing
 * toolchain or an unusable workspace is thrown.
 */

import * as path from 'path';
import type { TextCompletion } from '../models.js';
import type { ToolchainRunner, StageResult } from '../toolchain.js';
import { FileStore } from '../workspace.js';
import { errorMessage } from '../errors.js';
import {
  BUILD_DIR,
  artifactPath,
  findEntryPoint,
  isSourceFile,
  selectStrategy,
  type BuildStrategy,
  type LanguageProfile,
} from '../languages.js';
import {
  toValidationRecord,
  type ArtifactSet,
  type ToolchainStage,
  type ValidationOutcome,
} from '../types.js';
import { buildAnalysisSystemPrompt, buildAnalysisUserPrompt } from '../prompts.js';

export const VALIDATION_RESULTS_FILE = 'validation_results.json';

export const EMPTY_SET_DIAGNOSTIC = 'No files were generated; nothing to compile.';
export const UNSAFE_ARTIFACT_DIAGNOSTIC = 'Refusing to write unsafe file names';
export const MISSING_ENTRY_POINT_DIAGNOSTIC = 'No entry point found';

const COMPILE_SUCCESS_PHRASES = [/compilation successful/i, /compiled successfully/i];
const RUN_SUCCESS_PHRASES = [/ran successfully/i, /execution successful/i];

export interface ToolchainValidatorOptions {
  /** Per-stage timeout */
  timeoutMs: number;
  /** Writes a markdown analysis of failed outcomes when set */
  analyst?: TextCompletion;
}

/**
 * Whether a stage passed. A timeout always fails; an exit code decides when
 * there is one; otherwise the output has to say so.
 */
export function stagePassed(stage: ToolchainStage, result: StageResult): boolean {
  if (result.timedOut) return false;
  if (result.exitCode !== null) return result.exitCode === 0;
  const phrases = stage === 'compile' ? COMPILE_SUCCESS_PHRASES : RUN_SUCCESS_PHRASES;
  return phrases.some((phrase) => phrase.test(result.output));
}

const PLAIN_NAME = /^[\w./-]+$/;

/**
 * Names that may not be written: absolute, containing `..`, empty, or with
 * characters outside letters, digits, `_`, `.`, `/` and `-`.
 */
export function unsafeArtifactNames(artifacts: ArtifactSet): string[] {
  return Array.from(artifacts.keys()).filter((name) => {
    if (!PLAIN_NAME.test(name)) return true;
    if (path.posix.isAbsolute(name)) return true;
    return name.split('/').includes('..');
  });
}

export class ToolchainValidator {
  private profile: LanguageProfile;
  private runner: ToolchainRunner;
  private timeoutMs: number;
  private analyst?: TextCompletion;
  /** Workspace-relative paths written by the previous call, keyed by workspace */
  private written = new Map<string, string[]>();

  constructor(profile: LanguageProfile, runner: ToolchainRunner, options: ToolchainValidatorOptions) {
    this.profile = profile;
    this.runner = runner;
    this.timeoutMs = options.timeoutMs;
    this.analyst = options.analyst;
  }

  /**
   * Fail fast when the direct compiler for this language is not installed.
   */
  async preflight(): Promise<void> {
    const direct = this.profile.strategies.find((s) => s.descriptors.length === 0);
    if (direct) {
      await this.runner.checkAvailable(direct.executable);
    }
  }

  async validate(artifacts: ArtifactSet, workspace: string): Promise<ValidationOutcome> {
    const startedAt = new Date().toISOString();
    const store = new FileStore(workspace);
    const files = Array.from(artifacts.keys());
    const strategy = selectStrategy(this.profile, artifacts);

    const outcome: ValidationOutcome = {
      compiled: false,
      ran: false,
      diagnosticText: '',
      metadata: {
        startedAt,
        endedAt: startedAt,
        files,
        buildSystem: strategy.buildSystem,
        toolchain: [],
      },
    };

    await store.ensureRoot();
    await this.cleanPrevious(store);

    if (artifacts.size === 0) {
      outcome.diagnosticText = EMPTY_SET_DIAGNOSTIC;
      return this.finish(outcome, store);
    }

    const unsafe = unsafeArtifactNames(artifacts);
    const placements = this.placeArtifacts(strategy, artifacts, store);
    const outside = placements.filter((p) => !store.isInside(p.target)).map((p) => p.name);
    const rejected = Array.from(new Set([...unsafe, ...outside]));
    if (rejected.length > 0) {
      outcome.diagnosticText = `${UNSAFE_ARTIFACT_DIAGNOSTIC}: ${rejected.join(', ')}`;
      return this.finish(outcome, store);
    }

    const writtenPaths: string[] = [];
    for (const placement of placements) {
      await store.write(placement.target, placement.content);
      writtenPaths.push(placement.target);
    }
    this.written.set(store.root, writtenPaths);

    const sources = placements
      .filter((p) => isSourceFile(this.profile, p.name))
      .map((p) => p.target);
    const compileCommand = strategy.compileCommand(sources);
    outcome.metadata.toolchain.push(compileCommand);
    const compile = await this.runner.run({
      workspace: store.root,
      buildSystem: strategy.buildSystem,
      stage: 'compile',
      command: compileCommand,
      timeoutMs: this.timeoutMs,
    });
    outcome.compiled = stagePassed('compile', compile);
    const sections = [compile.output];

    if (outcome.compiled) {
      const entryPoint = findEntryPoint(this.profile, artifacts);
      if (entryPoint === null) {
        sections.push(
          `${MISSING_ENTRY_POINT_DIAGNOSTIC}: none of the generated ${this.profile.displayName} files defines a main function.`
        );
      } else {
        outcome.metadata.entryPoint = entryPoint;
        const runCommand = strategy.runCommand(entryPoint);
        outcome.metadata.toolchain.push(runCommand);
        const run = await this.runner.run({
          workspace: store.root,
          buildSystem: strategy.buildSystem,
          stage: 'run',
          command: runCommand,
          timeoutMs: this.timeoutMs,
        });
        outcome.ran = stagePassed('run', run);
        sections.push(run.output);
      }
    }

    outcome.diagnosticText = sections.filter((s) => s.length > 0).join('\n\n');
    if (!outcome.compiled || !outcome.ran) {
      outcome.analysis = await this.analyze(outcome);
    }
    return this.finish(outcome, store);
  }

  private placeArtifacts(
    strategy: BuildStrategy,
    artifacts: ArtifactSet,
    store: FileStore
  ): Array<{ name: string; target: string; content: string }> {
    return Array.from(artifacts, ([name, content]) => ({
      name,
      content,
      target: store.isInside(name) ? artifactPath(this.profile, strategy, name, content) : name,
    }));
  }

  private async cleanPrevious(store: FileStore): Promise<void> {
    for (const relPath of this.written.get(store.root) ?? []) {
      await store.remove(relPath);
    }
    this.written.delete(store.root);
    await store.remove(BUILD_DIR);
  }

  private async analyze(outcome: ValidationOutcome): Promise<string | undefined> {
    if (!this.analyst || outcome.diagnosticText.length === 0) return undefined;
    const errorType = outcome.compiled ? 'runtime' : 'compilation';
    try {
      const analysis = await this.analyst.complete(
        buildAnalysisSystemPrompt(this.profile),
        buildAnalysisUserPrompt(this.profile, errorType, outcome.diagnosticText)
      );
      return analysis.trim() || undefined;
    } catch (error) {
      console.warn(`[ToolchainValidator] Failure analysis skipped: ${errorMessage(error)}`);
      return undefined;
    }
  }

  private async finish(outcome: ValidationOutcome, store: FileStore): Promise<ValidationOutcome> {
    outcome.metadata.endedAt = new Date().toISOString();
    await store.writeJson(VALIDATION_RESULTS_FILE, toValidationRecord(outcome));

    const status = outcome.compiled && outcome.ran
      ? 'passed'
      : outcome.compiled ? 'compiled, run failed' : 'compile failed';
    console.log(
      `[ToolchainValidator] ${outcome.metadata.files.length} file(s) via ${outcome.metadata.buildSystem}: ${status}`
    );
    return outcome;
  }
}

export function createToolchainValidator(
  profile: LanguageProfile,
  runner: ToolchainRunner,
  options: ToolchainValidatorOptions
): ToolchainValidator {
  return new ToolchainValidator(profile, runner, options);
}
