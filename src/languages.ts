/**
 * Language Profiles
 *
 * Everything the extractor and the validator need to know about a target
 * language: how its code blocks are tagged, how files are named, where
 * sources live on disk, and which toolchain commands build and run them.
 *
 * Each profile lists its build strategies with descriptor-based ones first
 * (Maven, Gradle) and the direct compiler last. The first strategy whose
 * descriptor appears in the artifact set wins.
 */

import * as path from 'path';
import type { ArtifactSet, BuildSystem, TargetLanguage } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface BuildStrategy {
  buildSystem: BuildSystem;
  /** Artifact basenames that select this strategy; empty for direct compilation */
  descriptors: string[];
  /** Directory, relative to the workspace, that source files are placed under */
  sourceRoot: string;
  /** Executable that must be on PATH for this strategy */
  executable: string;
  compileCommand(sourceFiles: string[]): string;
  runCommand(entryPoint: string): string;
}

export interface LanguageProfile {
  name: TargetLanguage;
  displayName: string;
  /** Accepted info strings on a fenced code block, lower case */
  fenceTags: string[];
  /** Source file extension including the dot */
  extension: string;
  /** Used when no type declaration can be found in a block */
  fallbackFilename: string;
  strategies: BuildStrategy[];
  /** Identifier of the first type declaration, or null */
  declaredTypeName(content: string): string | null;
  /** Package declarations found in the content, in order */
  packageDeclarations(content: string): string[];
  /** Qualified entry point for a source artifact, or null if it has none */
  entryPointOf(name: string, content: string): string | null;
}

/** Build output directory inside the workspace */
export const BUILD_DIR = '.build';

// ============================================================================
// Shared Helpers
// ============================================================================

/**
 * Remove line and block comments. String, char and triple-quoted literals
 * are copied through untouched, so `/*` inside a string does not open a
 * comment.
 */
export function stripComments(content: string): string {
  let result = '';
  let i = 0;
  while (i < content.length) {
    if (content.startsWith('//', i)) {
      const end = content.indexOf('\n', i);
      i = end === -1 ? content.length : end;
    } else if (content.startsWith('/*', i)) {
      const end = content.indexOf('*/', i + 2);
      i = end === -1 ? content.length : end + 2;
    } else if (content.startsWith('"""', i)) {
      const end = content.indexOf('"""', i + 3);
      const stop = end === -1 ? content.length : end + 3;
      result += content.slice(i, stop);
      i = stop;
    } else if (content[i] === '"' || content[i] === "'") {
      const stop = literalEnd(content, i);
      result += content.slice(i, stop);
      i = stop;
    } else {
      result += content[i];
      i++;
    }
  }
  return result;
}

/** Index just past a single-line literal opened at `start` */
function literalEnd(content: string, start: number): number {
  const delimiter = content[start];
  let i = start + 1;
  while (i < content.length) {
    const ch = content[i];
    if (ch === '\\') {
      i += 2;
    } else if (ch === delimiter) {
      return i + 1;
    } else if (ch === '\n') {
      return i;
    } else {
      i++;
    }
  }
  return content.length;
}

function quote(file: string): string {
  return `"${file}"`;
}

function baseNameWithoutExtension(name: string): string {
  return path.basename(name, path.extname(name));
}

// ============================================================================
// Java
// ============================================================================

const JAVA_DECLARATION = /\b(?:class|interface|enum|record)\s+([A-Za-z_$][\w$]*)/;
const JAVA_PACKAGE = /^\s*package\s+([A-Za-z_][\w]*(?:\.[A-Za-z_][\w]*)*)\s*;/gm;
const JAVA_MAIN = /\bstatic\s+void\s+main\s*\(/;

const javaProfile: LanguageProfile = {
  name: 'java',
  displayName: 'Java',
  fenceTags: ['java'],
  extension: '.java',
  fallbackFilename: 'JavaFile.java',
  strategies: [
    {
      buildSystem: 'maven',
      descriptors: ['pom.xml'],
      sourceRoot: 'src/main/java',
      executable: 'mvn',
      compileCommand: () => 'mvn -q -B compile',
      runCommand: (entryPoint) => `mvn -q -B exec:java -Dexec.mainClass=${entryPoint}`,
    },
    {
      buildSystem: 'javac',
      descriptors: [],
      sourceRoot: '',
      executable: 'javac',
      compileCommand: (sourceFiles) =>
        `javac -d ${BUILD_DIR}/classes ${sourceFiles.map(quote).join(' ')}`,
      runCommand: (entryPoint) => `java -cp ${BUILD_DIR}/classes ${entryPoint}`,
    },
  ],

  declaredTypeName(content) {
    const match = stripComments(content).match(JAVA_DECLARATION);
    return match ? match[1] : null;
  },

  packageDeclarations(content) {
    return Array.from(stripComments(content).matchAll(JAVA_PACKAGE), (m) => m[1]);
  },

  entryPointOf(name, content) {
    if (!JAVA_MAIN.test(stripComments(content))) return null;
    const className = baseNameWithoutExtension(name);
    const packages = this.packageDeclarations(content);
    return packages.length === 1 ? `${packages[0]}.${className}` : className;
  },
};

// ============================================================================
// Kotlin
// ============================================================================

const KOTLIN_DECLARATION = /\b(?:class|interface|object|enum\s+class)\s+([A-Za-z_][\w]*)/;
const KOTLIN_PACKAGE = /^\s*package\s+([A-Za-z_][\w]*(?:\.[A-Za-z_][\w]*)*)\s*;?\s*$/gm;
const KOTLIN_MAIN = /^fun\s+main\s*\(/m;
const KOTLIN_STATIC_MAIN = /@JvmStatic\s+(?:public\s+)?fun\s+main\s*\(/;
const KOTLIN_OBJECT = /\b(companion\s+)?object(?:\s+([A-Za-z_]\w*))?/g;
const KOTLIN_CLASS = /\bclass\s+([A-Za-z_]\w*)/g;

/**
 * Class that owns a `@JvmStatic fun main`: the enclosing named object, or
 * the class around a companion object.
 */
function staticMainOwner(code: string): string | null {
  const main = code.match(KOTLIN_STATIC_MAIN);
  if (!main) return null;
  const before = code.slice(0, main.index ?? 0);

  const owner = Array.from(before.matchAll(KOTLIN_OBJECT)).pop();
  if (!owner) return null;
  if (!owner[1]) return owner[2] ?? null;

  const outer = Array.from(before.slice(0, owner.index ?? 0).matchAll(KOTLIN_CLASS)).pop();
  return outer ? outer[1] : null;
}

const kotlinProfile: LanguageProfile = {
  name: 'kotlin',
  displayName: 'Kotlin',
  fenceTags: ['kotlin', 'kt'],
  extension: '.kt',
  fallbackFilename: 'KotlinFile.kt',
  strategies: [
    {
      buildSystem: 'gradle',
      descriptors: ['build.gradle.kts', 'build.gradle'],
      sourceRoot: 'src/main/kotlin',
      executable: 'gradle',
      compileCommand: () => 'gradle -q --console=plain build -x test',
      runCommand: () => 'gradle -q --console=plain run',
    },
    {
      buildSystem: 'kotlinc',
      descriptors: [],
      sourceRoot: '',
      executable: 'kotlinc',
      compileCommand: (sourceFiles) =>
        `kotlinc ${sourceFiles.map(quote).join(' ')} -include-runtime -d ${BUILD_DIR}/app.jar`,
      runCommand: (entryPoint) => `java -cp ${BUILD_DIR}/app.jar ${entryPoint}`,
    },
  ],

  declaredTypeName(content) {
    const match = stripComments(content).match(KOTLIN_DECLARATION);
    return match ? match[1] : null;
  },

  packageDeclarations(content) {
    return Array.from(stripComments(content).matchAll(KOTLIN_PACKAGE), (m) => m[1]);
  },

  // Top-level `fun main` compiles into a synthetic <File>Kt class
  entryPointOf(name, content) {
    const code = stripComments(content);
    let className: string | null = null;
    if (KOTLIN_MAIN.test(code)) {
      const base = baseNameWithoutExtension(name);
      className = `${base.charAt(0).toUpperCase()}${base.slice(1)}Kt`;
    } else {
      className = staticMainOwner(code);
    }
    if (className === null) return null;
    const packages = this.packageDeclarations(content);
    return packages.length === 1 ? `${packages[0]}.${className}` : className;
  },
};

// ============================================================================
// Registry
// ============================================================================

const PROFILES: Record<TargetLanguage, LanguageProfile> = {
  java: javaProfile,
  kotlin: kotlinProfile,
};

export function getLanguageProfile(language: TargetLanguage): LanguageProfile {
  return PROFILES[language];
}

// ============================================================================
// Layout & Strategy Selection
// ============================================================================

/**
 * Directory implied by the content's package declaration.
 * Exactly one declaration maps `a.b` to `a/b`; none or several give null,
 * meaning the source root.
 */
export function packagePath(profile: LanguageProfile, content: string): string | null {
  const declarations = profile.packageDeclarations(content);
  if (declarations.length !== 1) return null;
  return declarations[0].split('.').join('/');
}

export function isSourceFile(profile: LanguageProfile, name: string): boolean {
  return name.toLowerCase().endsWith(profile.extension);
}

/**
 * Pick the build strategy for an artifact set: the first strategy whose
 * descriptor is present, else the direct compiler.
 */
export function selectStrategy(profile: LanguageProfile, artifacts: ArtifactSet): BuildStrategy {
  const basenames = new Set(
    Array.from(artifacts.keys(), (name) => path.posix.basename(name).toLowerCase())
  );
  for (const strategy of profile.strategies) {
    if (strategy.descriptors.some((d) => basenames.has(d.toLowerCase()))) {
      return strategy;
    }
  }
  const direct = profile.strategies.find((s) => s.descriptors.length === 0);
  if (!direct) {
    throw new Error(`No direct build strategy defined for ${profile.displayName}`);
  }
  return direct;
}

/**
 * Workspace-relative path an artifact is written to.
 *
 * Sources with a single package declaration go to
 * `<sourceRoot>/<package path>/<basename>`; other sources keep their name
 * under the source root; non-source artifacts (build descriptors, resources)
 * keep their name at the workspace root.
 */
export function artifactPath(
  profile: LanguageProfile,
  strategy: BuildStrategy,
  name: string,
  content: string
): string {
  if (!isSourceFile(profile, name)) {
    return path.posix.normalize(name);
  }
  const pkg = packagePath(profile, content);
  const relative = pkg ? path.posix.join(pkg, path.posix.basename(name)) : name;
  return strategy.sourceRoot
    ? path.posix.join(strategy.sourceRoot, relative)
    : path.posix.normalize(relative);
}

/**
 * First entry point found across the set's source artifacts.
 */
export function findEntryPoint(profile: LanguageProfile, artifacts: ArtifactSet): string | null {
  for (const [name, content] of artifacts) {
    if (!isSourceFile(profile, name)) continue;
    const entry = profile.entryPointOf(name, content);
    if (entry) return entry;
  }
  return null;
}
