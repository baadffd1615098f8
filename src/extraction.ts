/**
 * Artifact Extraction
 *
 * Parses a free-text generation response into named artifacts.
 *
 * Two tiers, first match wins:
 * 1. Filename markers: a comment line such as `// Filename: User.java`
 *    starts a new artifact; following lines belong to it.
 * 2. Fenced blocks (``` or ~~~) tagged with the target language, optionally
 *    annotated with a filename: ```java (User.java). Used only when tier 1
 *    finds nothing.
 *
 * A response that matches neither tier yields an empty set. The caller
 * treats that as a failed attempt; extraction never throws.
 */

import type { ArtifactSet } from './types.js';
import type { LanguageProfile } from './languages.js';

// ============================================================================
// Patterns
// ============================================================================

/** `// Filename: X`, `# filename: X`, `/* Filename: X *\/`, `<!-- Filename: X -->`, `-- Filename: X` */
const FILENAME_MARKER = /^(?:\/\/+|#+|\/\*+|<!--|--)\s*filename\s*:(.*)$/i;
const COMMENT_CLOSER = /\s*(?:\*\/|-->)\s*$/;
const FENCE_LINE = /^\s*(```|~~~)/;
const FENCED_BLOCK = /(```|~~~)([\w+#-]*)[ \t]*(?:\(([^)\n]+)\))?[ \t]*\r?\n([\s\S]*?)\1/g;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Drop blank lines at both ends, keep everything in between untouched.
 */
export function trimBlankLines(text: string): string {
  const lines = text.split(/\r?\n/);
  let start = 0;
  let end = lines.length;
  while (start < end && lines[start].trim() === '') start++;
  while (end > start && lines[end - 1].trim() === '') end--;
  return lines.slice(start, end).join('\n');
}

/**
 * Filename named by a marker line, or null if the line is not a marker.
 */
export function parseFilenameMarker(line: string): string | null {
  const match = line.trim().match(FILENAME_MARKER);
  if (!match) return null;
  const name = match[1].replace(COMMENT_CLOSER, '').trim();
  return name.length > 0 ? name : null;
}

/**
 * Filename for an unnamed block: `<DeclaredType><ext>`, else the profile's
 * fallback.
 */
export function inferFilename(content: string, profile: LanguageProfile): string {
  const typeName = profile.declaredTypeName(content);
  return typeName ? `${typeName}${profile.extension}` : profile.fallbackFilename;
}

// ============================================================================
// Tier 1: Filename Markers
// ============================================================================

function extractByMarkers(responseText: string): ArtifactSet {
  const artifacts: ArtifactSet = new Map();
  let currentName: string | null = null;
  let currentLines: string[] = [];
  // Markers usually sit inside fenced blocks. Fence lines are dropped, and
  // prose between a closing fence and the next opening one is skipped.
  let insideFence = false;
  let sawFence = false;

  const flush = () => {
    if (currentName === null) return;
    const content = trimBlankLines(currentLines.join('\n'));
    if (content.length > 0) {
      artifacts.set(currentName, content);
    }
    currentLines = [];
  };

  for (const line of responseText.split(/\r?\n/)) {
    const name = parseFilenameMarker(line);
    if (name !== null) {
      flush();
      currentName = name;
      continue;
    }

    if (FENCE_LINE.test(line)) {
      insideFence = !insideFence;
      sawFence = true;
      continue;
    }

    if (currentName === null) continue;
    if (sawFence && !insideFence) continue;
    currentLines.push(line);
  }
  flush();

  return artifacts;
}

// ============================================================================
// Tier 2: Fenced Blocks
// ============================================================================

function extractByFencedBlocks(responseText: string, profile: LanguageProfile): ArtifactSet {
  const artifacts: ArtifactSet = new Map();

  for (const match of responseText.matchAll(FENCED_BLOCK)) {
    const [, , tag, explicitName, body] = match;
    if (!profile.fenceTags.includes(tag.toLowerCase())) continue;

    const content = trimBlankLines(body);
    if (content.length === 0) continue;

    const name = explicitName?.trim() || inferFilename(content, profile);
    artifacts.set(name, content);
  }

  return artifacts;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Extract the artifact set from a generation response.
 * Deterministic: the same text always yields the same names, contents and order.
 */
export function extractArtifacts(responseText: string, profile: LanguageProfile): ArtifactSet {
  const byMarkers = extractByMarkers(responseText);
  if (byMarkers.size > 0) {
    return byMarkers;
  }
  return extractByFencedBlocks(responseText, profile);
}
