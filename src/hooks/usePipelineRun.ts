import { useState, useCallback, useRef } from 'react';
import { RunCancelledError } from '../agent/errors.js';
import { describePlan } from '../agent/plans.js';
import type { Orchestrator, PipelineCallbacks } from '../agent/orchestrator.js';
import type { AgentRole, PipelineRunResult, TaskRequest } from '../agent/state.js';
import {
  createProgressState,
  type PipelineProgressState,
  type RoleProgress,
} from '../components/PipelineProgressView.js';

// ============================================================================
// Types
// ============================================================================

interface UsePipelineRunResult {
  progress: PipelineProgressState | null;
  currentQuery: string | null;
  isRunning: boolean;
  runQuery: (request: TaskRequest) => Promise<PipelineRunResult>;
  cancelRun: () => void;
}

function updateRole(
  roles: RoleProgress[],
  role: AgentRole,
  stageIndex: number,
  update: (progress: RoleProgress) => RoleProgress
): RoleProgress[] {
  return roles.map(progress =>
    progress.role === role && progress.stageIndex === stageIndex ? update(progress) : progress
  );
}

// ============================================================================
// Hook Implementation
// ============================================================================

/**
 * Hook that connects the orchestrator to React state.
 * Tracks run state, per-role progress and tool calls, and owns the
 * AbortController used to cancel the run.
 */
export function usePipelineRun(orchestrator: Orchestrator): UsePipelineRunResult {
  const [progress, setProgress] = useState<PipelineProgressState | null>(null);
  const [currentQuery, setCurrentQuery] = useState<string | null>(null);
  const [isRunning, setIsRunning] = useState(false);
  const controllerRef = useRef<AbortController | null>(null);

  const patch = useCallback((update: (state: PipelineProgressState) => PipelineProgressState) => {
    setProgress(prev => (prev ? update(prev) : prev));
  }, []);

  const runQuery = useCallback(
    async (request: TaskRequest): Promise<PipelineRunResult> => {
      const controller = new AbortController();
      controllerRef.current = controller;
      setCurrentQuery(request.message);
      setProgress(createProgressState());
      setIsRunning(true);

      // Tool calls are keyed by role; the stage is the role's latest one.
      const activeStage = new Map<AgentRole, number>();

      const callbacks: PipelineCallbacks = {
        onStateChange: state => patch(prev => ({ ...prev, runState: state })),
        onClassified: (_task, classification, plan) =>
          patch(prev => ({
            ...prev,
            category: classification.category,
            method: classification.method,
            planText: describePlan(plan),
          })),
        onRetrieved: snippets => patch(prev => ({ ...prev, sourceCount: snippets.length })),
        onStepStart: (role, stageIndex) => {
          activeStage.set(role, stageIndex);
          patch(prev => ({
            ...prev,
            roles: [...prev.roles, { role, stageIndex, status: 'running', toolCalls: [] }],
          }));
        },
        onToolCall: (role, record) => {
          const stageIndex = activeStage.get(role);
          if (stageIndex === undefined) return;
          patch(prev => ({
            ...prev,
            roles: updateRole(prev.roles, role, stageIndex, p => ({ ...p, toolCalls: [...p.toolCalls, record] })),
          }));
        },
        onStepComplete: step =>
          patch(prev => ({
            ...prev,
            roles: updateRole(prev.roles, step.agentRole, step.stageIndex, p => ({ ...p, status: step.status })),
          })),
      };

      try {
        return await orchestrator.run(request, { signal: controller.signal, callbacks });
      } finally {
        controllerRef.current = null;
        setIsRunning(false);
        setProgress(null);
        setCurrentQuery(null);
      }
    },
    [orchestrator, patch]
  );

  const cancelRun = useCallback(() => {
    controllerRef.current?.abort(new RunCancelledError());
  }, []);

  return { progress, currentQuery, isRunning, runQuery, cancelRun };
}
