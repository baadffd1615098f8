/**
 * Prompt Templates
 *
 * Planner, generator and analyst prompts. The plan format defined here is
 * the soft contract between the planner and the generator: labeled lines
 * that the generator prompt refers to but nothing parses strictly.
 */

import type { LanguageProfile } from './languages.js';

export const PLAN_FIELDS = ['API', 'Operation', 'HTTP Method', 'Request Body', 'Response Body'] as const;
export type PlanField = (typeof PLAN_FIELDS)[number];

// ============================================================================
// Planner
// ============================================================================

export const PLANNING_SYSTEM_PROMPT = `You are an expert at parsing cURL commands and extracting REST API details.
Extract the HTTP method, headers, URL path, and request body from the provided cURL command.
Infer an appropriate operation name based on the endpoint and method.
Analyze the request body and response type to determine appropriate DTO schemas.

Return a markdown string with these details in the following format:

# API: \`http://example.com/users\`
# Operation: \`getUser\`
# HTTP Method: \`GET\`
# Request Body: \`{ "id": 123 }\`
# Response Body: \`{ "name": "Jane Roe", "age": 42 }\``;

export function buildPlanningUserPrompt(request: string): string {
  return `Parse the following input and extract REST operation details:

\`\`\`
${request}
\`\`\``;
}

// ============================================================================
// Generator
// ============================================================================

const CLIENT_LIBRARY: Record<LanguageProfile['name'], string> = {
  java: 'java.net.http.HttpClient',
  kotlin: 'java.net.http.HttpClient',
};

export function buildGenerationSystemPrompt(profile: LanguageProfile): string {
  const tag = profile.fenceTags[0];
  const example = profile.name === 'java'
    ? `package com.example.api.user;

/**
 * Request DTO for creating a user
 */
public record CreateUserRequest(String name, String email) {}`
    : `package com.example.api.user

/** Request DTO for creating a user */
data class CreateUserRequest(val name: String, val email: String)`;

  return `You are an expert ${profile.displayName} developer specializing in REST API clients.
Generate idiomatic ${profile.displayName} code based on the provided REST operation plan.

Create the following files:
1. Data-transfer classes for the request and response bodies
2. An interface defining the operation
3. An implementation of the interface using ${CLIENT_LIBRARY[profile.name]}
4. A Main entry point (a \`main\` function) that builds a sample request DTO and prints it.
   The entry point must not perform any network call.

Follow these guidelines:
- Use the standard library only; do not depend on third-party packages
- Use proper ${profile.displayName} naming conventions and include all imports
- Put every file in the same package declaration
- Include appropriate exception handling and documentation comments

For each file, start with a filename comment like: // Filename: ClassName${profile.extension}

Example output format:
\`\`\`${tag}
// Filename: CreateUserRequest${profile.extension}
${example}
\`\`\``;
}

export function buildGenerationUserPrompt(plan: string, priorFeedback?: string): string {
  if (priorFeedback === undefined) {
    return `Generate code for the following REST operation plan:

${plan}`;
  }

  return `Generate code for the following REST operation plan:

${plan}

The previous attempt failed validation. Fix these issues and return every file again:

${priorFeedback}`;
}

// ============================================================================
// Failure Analyst
// ============================================================================

export function buildAnalysisSystemPrompt(profile: LanguageProfile): string {
  return `You are an expert ${profile.displayName} developer who can analyze both compilation and runtime errors.
Examine the provided error output and identify all issues.

For each error, provide:
1. The error location (file and line number if available)
2. The error message or exception
3. What caused the error
4. A suggested fix with code examples where appropriate

If there are multiple errors, address root causes first.
Return a concise markdown response.`;
}

export function buildAnalysisUserPrompt(
  profile: LanguageProfile,
  errorType: 'compilation' | 'runtime',
  errorOutput: string
): string {
  return `Analyze the following ${profile.displayName} ${errorType} error output and provide structured feedback:

\`\`\`
${errorOutput}
\`\`\`

Identify the issues, explain their causes, and suggest specific fixes.`;
}
