/**
 * Generation Department
 *
 * Turns an operation plan, plus the previous attempt's feedback on a retry,
 * into an artifact set: one generator completion, then extraction.
 * There is no retry logic here; the feedback loop owns all of it.
 */

import type { TextCompletion } from '../models.js';
import type { ArtifactSet, GenerationSummary } from '../types.js';
import { extractArtifacts } from '../extraction.js';
import { artifactPath, selectStrategy, type LanguageProfile } from '../languages.js';
import type { FileStore } from '../workspace.js';
import { stripReasoning, type OperationPlan } from './planning.js';
import { buildGenerationSystemPrompt, buildGenerationUserPrompt } from '../prompts.js';

export const GENERATION_SUMMARY_FILE = 'generation_summary.json';

export class Generator {
  private completion: TextCompletion;
  private profile: LanguageProfile;
  private systemPrompt: string;

  constructor(completion: TextCompletion, profile: LanguageProfile) {
    this.completion = completion;
    this.profile = profile;
    this.systemPrompt = buildGenerationSystemPrompt(profile);
  }

  getSystemPrompt(): string {
    return this.systemPrompt;
  }

  /**
   * The user message for one attempt. On a retry the feedback is embedded
   * verbatim below the plan.
   */
  buildUserPrompt(plan: OperationPlan, priorFeedback?: string): string {
    return buildGenerationUserPrompt(plan, priorFeedback);
  }

  /**
   * Generate a fresh artifact set. Completion errors propagate to the caller.
   */
  async generate(plan: OperationPlan, priorFeedback?: string): Promise<ArtifactSet> {
    const response = await this.completion.complete(
      this.systemPrompt,
      this.buildUserPrompt(plan, priorFeedback)
    );

    const artifacts = extractArtifacts(stripReasoning(response), this.profile);
    if (artifacts.size === 0) {
      console.warn('[Generator] No artifacts found in generation response');
    } else {
      console.log(`[Generator] Extracted ${artifacts.size} artifact(s): ${Array.from(artifacts.keys()).join(', ')}`);
    }
    return artifacts;
  }

  /**
   * Write the artifacts into a store using their package layout, plus a
   * generation summary record. Names that would land outside the store are
   * skipped and left out of the summary.
   */
  async persist(artifacts: ArtifactSet, store: FileStore): Promise<GenerationSummary> {
    const strategy = selectStrategy(this.profile, artifacts);
    const written: string[] = [];
    for (const [name, content] of artifacts) {
      const target = artifactPath(this.profile, strategy, name, content);
      if (!store.isInside(target)) {
        console.warn(`[Generator] Skipping artifact outside the output directory: ${name}`);
        continue;
      }
      await store.write(target, content);
      written.push(name);
    }

    const summary: GenerationSummary = {
      generated_at: new Date().toISOString(),
      file_count: written.length,
      files: written,
    };
    await store.writeJson(GENERATION_SUMMARY_FILE, summary);
    return summary;
  }
}

export function createGenerator(completion: TextCompletion, profile: LanguageProfile): Generator {
  return new Generator(completion, profile);
}
