import type { AgentRole, TaskCategory } from './state.js';
import { TASK_CATEGORIES } from './state.js';
import type { ExecutionContext } from '../utils/context.js';

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Returns the current date formatted for prompts.
 */
export function getCurrentDate(): string {
  const options: Intl.DateTimeFormatOptions = {
    weekday: 'long',
    year: 'numeric',
    month: 'long',
    day: 'numeric',
  };
  return new Date().toLocaleDateString('en-US', options);
}

const TOOL_GUIDANCE = `If a tool would help, call it. Tool results are appended to your prompt as observations.
When you have what you need, answer directly without calling a tool.`;

// ============================================================================
// Role System Prompts
// ============================================================================

export const PLANNER_SYSTEM_PROMPT = `You are the Planner agent of a multi-agent coding assistant.

Your job is to turn the request into an implementation plan that the other agents will follow.

Responsibilities:
- Work out the full scope of the request
- Break it into short, ordered steps
- Call out dependencies between steps
- Note which agent (Coder, Reviewer, Debugger, Optimizer) should own each step

Output a numbered list of steps with any important considerations. Do not write the implementation.

${TOOL_GUIDANCE}`;

export const CODER_SYSTEM_PROMPT = `You are the Coder agent of a multi-agent coding assistant.

Your job is to write the code the request asks for, following any plan produced earlier in the pipeline.

Guidelines:
- Provide complete implementations, never placeholders
- Handle errors and edge cases
- Use types where the language has them
- Keep functions small and names descriptive
- Comment only what is not obvious from the code

Put all code in fenced markdown code blocks tagged with the language.
You can run JavaScript with the code_executor tool to check your work before answering.

${TOOL_GUIDANCE}`;

export const REVIEWER_SYSTEM_PROMPT = `You are the Reviewer agent of a multi-agent coding assistant.

Your job is to review the code and analysis produced so far, or the code in the request itself.

Check for:
- Logic errors and bugs
- Security problems such as injection or unsafe input handling
- Performance problems
- Missing error handling and unhandled edge cases
- Readability and naming

List findings by severity (Critical, High, Medium, Low) with a concrete fix for each, then note what is done well.

${TOOL_GUIDANCE}`;

export const DEBUGGER_SYSTEM_PROMPT = `You are the Debugger agent of a multi-agent coding assistant.

Your job is to find the root cause of the problem described in the request and fix it.

Approach:
1. Restate the observed behaviour and the expected behaviour
2. Read any error message or stack trace closely
3. Identify the root cause, not just the symptom
4. Propose a fix, with code
5. Explain why the problem happened and how to avoid it in future

${TOOL_GUIDANCE}`;

export const OPTIMIZER_SYSTEM_PROMPT = `You are the Optimizer agent of a multi-agent coding assistant.

Your job is to make the code in question faster or leaner without changing its behaviour.

Look at:
- Algorithmic complexity
- Choice of data structures
- Caching and repeated work
- Memory usage
- Opportunities for batching or concurrency

For every change, state what you changed, the expected improvement and any trade-off.

${TOOL_GUIDANCE}`;

// ============================================================================
// Role Instructions
// ============================================================================

export const ROLE_INSTRUCTIONS: Record<AgentRole, string> = {
  planner: 'Produce the implementation plan for the task above.',
  coder: 'Write the implementation for the task above, following the plan if there is one.',
  reviewer: 'Review the work above and report your findings.',
  debugger: 'Diagnose the problem described above and provide a fix.',
  optimizer: 'Optimize the code for the task above and explain each change.',
};

// ============================================================================
// Agent Prompt
// ============================================================================

const ROLE_TITLES: Record<AgentRole, string> = {
  planner: 'Planner',
  coder: 'Coder',
  reviewer: 'Reviewer',
  debugger: 'Debugger',
  optimizer: 'Optimizer',
};

export function getRoleTitle(role: AgentRole): string {
  return ROLE_TITLES[role];
}

/**
 * Serializes the execution context and the role instruction into the prompt
 * sent with every provider call of a step.
 */
export function buildAgentPrompt(context: ExecutionContext, role: AgentRole): string {
  const sections = [`## Task\n\n${context.query}`];

  if (context.snippets.length > 0) {
    const material = context.snippets
      .map(snippet => `[${snippet.sourceId}] (score ${snippet.score.toFixed(2)})\n${snippet.text}`)
      .join('\n\n');
    sections.push(`## Reference material\n\n${material}`);
  }

  if (context.outputs.length > 0) {
    const outputs = context.outputs
      .map(entry => {
        const suffix = entry.summarized ? ' (summarized)' : '';
        return `### ${getRoleTitle(entry.role)}${suffix}\n\n${entry.text}`;
      })
      .join('\n\n');
    sections.push(`## Prior agent outputs\n\n${outputs}`);
  }

  sections.push(`## Instructions\n\n${ROLE_INSTRUCTIONS[role]}`);
  return sections.join('\n\n');
}

/**
 * Appends one tool observation to the running prompt.
 */
export function appendToolObservation(
  prompt: string,
  toolName: string,
  args: Record<string, unknown>,
  observation: string
): string {
  return `${prompt}\n\n## Tool call: ${toolName}\n\nArguments: ${JSON.stringify(args)}\n\nObservation:\n${observation}`;
}

// ============================================================================
// Classification Prompts
// ============================================================================

export function getClassificationSystemPrompt(): string {
  return `You classify requests sent to a coding assistant.

Current date: ${getCurrentDate()}

Categories:
- code_generation: write new code, tests or components
- debugging: something is broken, throws, or behaves unexpectedly
- optimization: make existing code faster or use fewer resources
- review: assess existing code for quality, bugs or security
- general: questions and explanations that need no code written

Pick exactly one of: ${TASK_CATEGORIES.join(', ')}.`;
}

export function buildClassificationPrompt(query: string, candidates: readonly TaskCategory[]): string {
  const hint = candidates.length > 0
    ? `\n\nKeyword analysis found signals for: ${candidates.join(', ')}.`
    : '';
  return `Request:\n${query}${hint}`;
}
