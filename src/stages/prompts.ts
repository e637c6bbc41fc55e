/**
 * Stage Prompts
 *
 * Prompt templates for the default code-generation stages. Every stage
 * shares one system prompt and gets a user prompt assembled from the task,
 * earlier artifacts, context items and pending feedback.
 *
 * @module stages/prompts
 */

import type { ContextItem, FeedbackItem, JsonObject, Task } from '../schemas/index.js';
import type { DefaultStageName, StageInput } from '../pipeline/types.js';
import type { ChatMessage } from './llm-client.js';

// ============================================================================
// Stage Definitions
// ============================================================================

export interface StagePromptDefinition {
  /** One-line description, shown by the CLI */
  description: string;
  /** What the model must do in this stage */
  instruction: string;
  /** Shape of the JSON object the model must return */
  outputFormat: string;
}

export const STAGE_PROMPTS: Record<DefaultStageName, StagePromptDefinition> = {
  requirements_gathering: {
    description: 'Clarify and structure the requirements of the task',
    instruction:
      'Restate the task as a precise list of functional requirements. Split compound requirements, ' +
      'make implicit requirements explicit and list any assumptions you had to make.',
    outputFormat: `{
  "requirements": ["..."],
  "assumptions": ["..."],
  "openQuestions": ["..."]
}`,
  },
  knowledge_gathering: {
    description: 'Collect the knowledge the implementation depends on',
    instruction:
      'Using the context items and the gathered requirements, summarize the APIs, conventions and ' +
      'facts the implementation will rely on. Cite the source of each fact.',
    outputFormat: `{
  "facts": [{ "statement": "...", "source": "..." }],
  "gaps": ["..."]
}`,
  },
  implementation_planning: {
    description: 'Plan files, components and steps',
    instruction:
      'Design the implementation. List the files to create or change, the responsibility of each ' +
      'and the ordered steps to build it.',
    outputFormat: `{
  "files": [{ "path": "...", "purpose": "..." }],
  "steps": ["..."],
  "risks": ["..."]
}`,
  },
  implementation_writing: {
    description: 'Write the code following the plan',
    instruction:
      'Write the complete content of every file in the plan. Follow the constraints of the task.',
    outputFormat: `{
  "files": [{ "path": "...", "content": "..." }],
  "notes": ["..."]
}`,
  },
  review: {
    description: 'Review the written code against the requirements',
    instruction:
      'Review the implementation against each requirement and constraint. Report every issue with ' +
      'its severity and say whether the implementation is acceptable.',
    outputFormat: `{
  "approved": true,
  "issues": [{ "severity": "low | medium | high", "description": "...", "file": "..." }],
  "summary": "..."
}`,
  },
};

// ============================================================================
// System Prompt
// ============================================================================

export const STAGE_SYSTEM_PROMPT = `You are a senior software engineer working through a staged code-generation pipeline.
Each stage receives the task, the results of earlier stages, reference context and reviewer feedback.

Rules:
1. Respond with a single JSON object and nothing else
2. Follow the requested output format exactly
3. Treat reviewer feedback of type "correction" as mandatory
4. Do not invent context that was not provided`;

// ============================================================================
// User Prompt
// ============================================================================

/**
 * Format context items as `--- source ---` delimited blocks.
 */
export function formatContextItems(items: readonly ContextItem[]): string {
  if (items.length === 0) {
    return '(no context provided)';
  }
  return items.map((item) => `--- ${item.source} ---\n${item.content}`).join('\n\n');
}

function formatTask(task: Task): string {
  const lines = [`Description: ${task.description}`, '', 'Requirements:'];
  lines.push(...task.requirements.map((r) => `- ${r}`));
  if (task.constraints.length > 0) {
    lines.push('', 'Constraints:', ...task.constraints.map((c) => `- ${c}`));
  }
  return lines.join('\n');
}

function formatArtifacts(artifacts: Readonly<Record<string, JsonObject>>): string {
  const entries = Object.entries(artifacts);
  if (entries.length === 0) {
    return '(none yet)';
  }
  return entries
    .map(([stage, artifact]) => `### ${stage}\n${JSON.stringify(artifact, null, 2)}`)
    .join('\n\n');
}

function formatFeedback(items: readonly FeedbackItem[]): string {
  return items.map((item) => `- [${item.type}] ${item.content}`).join('\n');
}

/**
 * Build the user prompt for one stage.
 */
export function buildStagePrompt(definition: StagePromptDefinition, input: StageInput): string {
  const sections = [
    `## Task\n${formatTask(input.task)}`,
    `## Results of earlier stages\n${formatArtifacts(input.artifacts)}`,
    `## Context\n${formatContextItems(input.contextItems)}`,
  ];

  if (input.feedback.length > 0) {
    sections.push(`## Reviewer feedback for this stage\n${formatFeedback(input.feedback)}`);
  }

  sections.push(
    `## Your job\n${definition.instruction}`,
    `## Output format\nReturn JSON matching:\n${definition.outputFormat}`
  );

  return sections.join('\n\n');
}

/**
 * Full conversation for one stage.
 */
export function buildStageMessages(
  definition: StagePromptDefinition,
  input: StageInput
): ChatMessage[] {
  return [
    { role: 'system', content: STAGE_SYSTEM_PROMPT },
    { role: 'user', content: buildStagePrompt(definition, input) },
  ];
}
