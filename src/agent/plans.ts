import type { AgentRole, PipelinePlan, PipelineStage, TaskCategory } from './state.js';
import type { PipelineConfig, StageConfig } from './schemas.js';

const CRITICAL_ROLES: ReadonlySet<AgentRole> = new Set<AgentRole>(['planner', 'coder']);

function toStage(stage: StageConfig): PipelineStage {
  return typeof stage === 'string'
    ? { kind: 'single', role: stage }
    : { kind: 'parallel', roles: [...stage] };
}

/**
 * Derives the immutable plan for every category from configuration.
 */
export function buildPlans(config: PipelineConfig['plans']): Record<TaskCategory, PipelinePlan> {
  const buildPlan = (category: TaskCategory): PipelinePlan =>
    Object.freeze({
      category,
      stages: Object.freeze(config[category].stages.map(toStage)),
      responseMode: config[category].responseMode,
    });

  return {
    code_generation: buildPlan('code_generation'),
    debugging: buildPlan('debugging'),
    optimization: buildPlan('optimization'),
    review: buildPlan('review'),
    general: buildPlan('general'),
  };
}

export function stageRoles(stage: PipelineStage): AgentRole[] {
  return stage.kind === 'single' ? [stage.role] : [...stage.roles];
}

/**
 * Planner and coder are always critical. So is the sole role of a plan made
 * of one single-role stage.
 */
export function isCriticalRole(plan: PipelinePlan, role: AgentRole): boolean {
  if (CRITICAL_ROLES.has(role)) return true;
  const [first] = plan.stages;
  return plan.stages.length === 1 && first.kind === 'single' && first.role === role;
}

export function describePlan(plan: PipelinePlan): string {
  return plan.stages
    .map(stage => (stage.kind === 'single' ? stage.role : `[${stage.roles.join(' | ')}]`))
    .join(' → ');
}
