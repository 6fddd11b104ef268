import type { AgentRole } from './state.js';
import { AGENT_ROLES } from './state.js';
import {
  CODER_SYSTEM_PROMPT,
  DEBUGGER_SYSTEM_PROMPT,
  OPTIMIZER_SYSTEM_PROMPT,
  PLANNER_SYSTEM_PROMPT,
  REVIEWER_SYSTEM_PROMPT,
} from './prompts.js';

export interface RoleDefinition {
  role: AgentRole;
  description: string;
  capabilities: readonly string[];
  systemPrompt: string;
  /** Tool names offered to the model. Unregistered names are skipped. */
  tools: readonly string[];
  /** Upper bound on the request temperature for this role. */
  maxTemperature?: number;
}

export const ROLE_DEFINITIONS: Record<AgentRole, RoleDefinition> = {
  planner: {
    role: 'planner',
    description: 'Breaks a request down into ordered, actionable steps',
    capabilities: ['Task breakdown', 'Dependency analysis', 'Execution planning', 'Agent delegation'],
    systemPrompt: PLANNER_SYSTEM_PROMPT,
    tools: ['web_search', 'read_file'],
  },
  coder: {
    role: 'coder',
    description: 'Writes complete, typed implementations',
    capabilities: ['Code generation', 'Error handling', 'Edge case coverage', 'Code execution'],
    systemPrompt: CODER_SYSTEM_PROMPT,
    tools: ['code_executor', 'web_search', 'read_file'],
    maxTemperature: 0.3,
  },
  reviewer: {
    role: 'reviewer',
    description: 'Reviews code for bugs, security issues and quality',
    capabilities: ['Bug detection', 'Security analysis', 'Code quality assessment', 'Performance evaluation'],
    systemPrompt: REVIEWER_SYSTEM_PROMPT,
    tools: ['read_file'],
  },
  debugger: {
    role: 'debugger',
    description: 'Finds the root cause of a failure and proposes a fix',
    capabilities: ['Error analysis', 'Root cause identification', 'Fix suggestions', 'Prevention recommendations'],
    systemPrompt: DEBUGGER_SYSTEM_PROMPT,
    tools: ['code_executor', 'read_file'],
  },
  optimizer: {
    role: 'optimizer',
    description: 'Improves performance and resource usage',
    capabilities: ['Performance analysis', 'Algorithm optimization', 'Memory efficiency', 'Complexity reduction'],
    systemPrompt: OPTIMIZER_SYSTEM_PROMPT,
    tools: ['code_executor'],
  },
};

export function listRoles(): RoleDefinition[] {
  return AGENT_ROLES.map(role => ROLE_DEFINITIONS[role]);
}

export function roleTemperature(role: AgentRole, requested: number): number {
  const cap = ROLE_DEFINITIONS[role].maxTemperature;
  return cap === undefined ? requested : Math.min(requested, cap);
}
