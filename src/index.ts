#!/usr/bin/env node
/**
 * curlgen - Main Entry Point
 *
 * Turns a cURL command into a compiling, runnable REST client in Java or
 * Kotlin: plan the operation, generate the sources, validate them with the
 * real toolchain, and feed diagnostics back until they pass.
 *
 * Usage:
 *   npx tsx src/index.ts [options] "<curl command>"
 *
 * Example:
 *   npx tsx src/index.ts --language kotlin "curl -X POST https://api.example.com/users -d '{\"name\":\"Ada\"}'"
 */

import * as fs from 'fs';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { loadConfig, type EngineConfig } from './config.js';
import { ConfigError, errorMessage } from './errors.js';
import { getLanguageProfile, type LanguageProfile } from './languages.js';
import { ModelRouter, validateApiKeys } from './models.js';
import { createToolchainRunner, type ToolchainRunner } from './toolchain.js';
import { createFileStore } from './workspace.js';
import { createPlanner } from './departments/planning.js';
import { createGenerator, type Generator } from './departments/generation.js';
import { createToolchainValidator, type ToolchainValidator } from './departments/quality-gate.js';
import { FeedbackLoopController } from './feedback-loop.js';
import type { AttemptRecord, GenerationStatus, SessionResult } from './types.js';

export const FEEDBACK_FILE = 'validation_feedback.txt';
export const STATUS_FILE = 'generation_status.json';

// ============================================================================
// Codegen Engine
// ============================================================================

export interface CodegenEngineDeps {
  router?: ModelRouter;
  runner?: ToolchainRunner;
  onAttempt?: (record: AttemptRecord) => void;
}

export class CodegenEngine {
  readonly config: EngineConfig;
  readonly profile: LanguageProfile;
  readonly router: ModelRouter;
  private generator: Generator;
  private validator: ToolchainValidator;
  private controller: FeedbackLoopController;

  constructor(config: EngineConfig, deps: CodegenEngineDeps = {}) {
    this.config = config;
    this.profile = getLanguageProfile(config.language);
    this.router = deps.router ?? new ModelRouter({ models: config.models });

    this.generator = createGenerator(this.router.completionFor('generator'), this.profile);
    this.validator = createToolchainValidator(this.profile, deps.runner ?? createToolchainRunner(), {
      timeoutMs: config.toolchainTimeoutMs,
      analyst: config.analyzeFailures ? this.router.completionFor('analyst') : undefined,
    });
    this.controller = new FeedbackLoopController({
      planner: createPlanner(this.router.completionFor('planner')),
      generator: this.generator,
      validator: this.validator,
      workspace: path.resolve(config.workspace),
      maxAttempts: config.maxAttempts,
      language: config.language,
      onAttempt: deps.onAttempt,
    });
  }

  /**
   * Run a full session for one request.
   *
   * @throws ToolchainUnavailableError before any model call when the compiler is missing
   */
  async generate(request: string): Promise<SessionResult> {
    await this.validator.preflight();
    const result = await this.controller.run(request);
    console.log(
      `[Engine] Session ${result.session.id} ${result.session.phase} after ` +
      `${result.session.attempts.length} attempt(s), cost $${this.router.getTotalCost().toFixed(4)}`
    );
    return result;
  }

  /**
   * Write the final artifacts and the session records into an output directory.
   */
  async saveResults(result: SessionResult, outputDir: string): Promise<GenerationStatus> {
    const store = createFileStore(outputDir);
    await store.ensureRoot();

    const summary = await this.generator.persist(result.artifacts, store);
    await store.write(FEEDBACK_FILE, result.diagnosticText);

    const status: GenerationStatus = {
      success: result.success,
      file_count: summary.file_count,
      files: summary.files,
      attempts: result.session.attempts.length,
    };
    await store.writeJson(STATUS_FILE, status);
    console.log(`[Engine] Results saved to ${store.root}`);
    return status;
  }
}

// ============================================================================
// CLI
// ============================================================================

export interface CliArgs {
  request?: string;
  curlFile?: string;
  output: string;
  /** CURLGEN_* overrides taken from flags */
  env: Record<string, string>;
}

const VALUE_FLAGS: Record<string, string | null> = {
  '--language': 'CURLGEN_LANGUAGE',
  '--max-attempts': 'CURLGEN_MAX_ATTEMPTS',
  '--workspace': 'CURLGEN_WORKSPACE',
  '--output': null,
  '--curl-file': null,
};

/**
 * Parse argv (without the node and script entries).
 *
 * @throws ConfigError on an unknown flag or a flag missing its value
 */
export function parseArgs(argv: string[]): CliArgs {
  const parsed: CliArgs = { output: 'generated', env: {} };
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--analyze') {
      parsed.env.CURLGEN_ANALYZE_FAILURES = 'true';
      continue;
    }
    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }
    if (!(arg in VALUE_FLAGS)) {
      throw new ConfigError(`Unknown option: ${arg}`);
    }
    const value = argv[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigError(`Option ${arg} needs a value`);
    }
    i++;

    const envKey = VALUE_FLAGS[arg];
    if (envKey) {
      parsed.env[envKey] = value;
    } else if (arg === '--output') {
      parsed.output = value;
    } else {
      parsed.curlFile = value;
    }
  }

  if (positional.length > 0) {
    parsed.request = positional.join(' ');
  }
  return parsed;
}

function printUsage(): void {
  console.log('Usage: curlgen [options] "<curl command>"');
  console.log('       curlgen [options] --curl-file <path>');
  console.log('');
  console.log('Options:');
  console.log('  --language <java|kotlin>   Target language (default: java)');
  console.log('  --max-attempts <n>         Generation attempts before giving up (default: 3)');
  console.log('  --workspace <dir>          Build directory for validation (default: workspace)');
  console.log('  --output <dir>             Where the final sources are written (default: generated)');
  console.log('  --curl-file <path>         Read the cURL command from a file');
  console.log('  --analyze                  Add a model-written analysis to failed attempts');
  console.log('');
  console.log('Environment: CURLGEN_PROVIDER (ollama|anthropic|openai), CURLGEN_BASE_URL,');
  console.log('  CURLGEN_PLANNER_MODEL, CURLGEN_GENERATOR_MODEL, CURLGEN_ANALYST_MODEL,');
  console.log('  CURLGEN_TOOLCHAIN_TIMEOUT_MS');
}

function readRequest(args: CliArgs): string {
  if (args.curlFile) {
    try {
      return fs.readFileSync(args.curlFile, 'utf-8').trim();
    } catch (error) {
      throw new ConfigError(`Cannot read ${args.curlFile}: ${errorMessage(error)}`, { cause: error });
    }
  }
  return args.request?.trim() ?? '';
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    console.error(errorMessage(error));
    printUsage();
    return 1;
  }

  const request = readRequest(args);
  if (request.length === 0) {
    printUsage();
    return 1;
  }

  const config = loadConfig({ ...process.env, ...args.env });
  const missingKeys = validateApiKeys(config.models);
  if (missingKeys.length > 0) {
    throw new ConfigError(`Missing API key environment variable(s): ${missingKeys.join(', ')}`);
  }

  const engine = new CodegenEngine(config, {
    onAttempt: (record) => {
      const mark = record.category === 'success' ? '✓' : '✗';
      console.log(`  ${mark} Attempt ${record.attempt}: ${record.category} (${record.artifactNames.length} file(s))`);
    },
  });

  console.log('═'.repeat(60));
  console.log(`CURLGEN: ${engine.profile.displayName} client, up to ${config.maxAttempts} attempt(s)`);
  console.log('═'.repeat(60));

  const result = await engine.generate(request);
  const status = await engine.saveResults(result, args.output);

  console.log('\n' + '═'.repeat(60));
  console.log(result.success ? '✓ GENERATION SUCCEEDED' : '✗ GENERATION FAILED');
  console.log('═'.repeat(60));
  console.log(`Attempts: ${status.attempts}/${config.maxAttempts}`);
  console.log(`Files (${status.file_count}) written to ${path.resolve(args.output)}:`);
  for (const file of status.files) {
    console.log(`  - ${file}`);
  }
  if (!result.success) {
    console.log(`\nLast diagnostics saved to ${FEEDBACK_FILE}`);
  }

  return result.success ? 0 : 1;
}

// Only run main() when this file is the entry point, not when imported
function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isMainModule()) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(`[curlgen] ${errorMessage(error)}`);
      process.exitCode = 1;
    });
}

// Export for programmatic use
export { loadConfig, type EngineConfig } from './config.js';
export { ModelRouter, createModelRouter, type TextCompletion, type ModelRole } from './models.js';
export { getLanguageProfile, type LanguageProfile } from './languages.js';
export { extractArtifacts, inferFilename } from './extraction.js';
export { FileStore, createFileStore } from './workspace.js';
export { ShellToolchainRunner, createToolchainRunner, type ToolchainRunner } from './toolchain.js';
export { Planner, createPlanner } from './departments/planning.js';
export { Generator, createGenerator } from './departments/generation.js';
export { ToolchainValidator, createToolchainValidator } from './departments/quality-gate.js';
export { FeedbackLoopController, createFeedbackLoopController } from './feedback-loop.js';
export { SessionManager } from './state.js';
export * from './errors.js';
export type * from './types.js';
