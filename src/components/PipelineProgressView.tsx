import React from 'react';
import { Box, Text } from 'ink';
import InkSpinner from 'ink-spinner';
import { colors, roleColors } from '../theme.js';
import { getRoleTitle } from '../agent/prompts.js';
import { isToolCallError } from '../agent/state.js';
import type {
  AgentRole,
  ClassificationMethod,
  RunState,
  StepStatus,
  TaskCategory,
  ToolCallRecord,
} from '../agent/state.js';

// ============================================================================
// Types
// ============================================================================

export interface RoleProgress {
  role: AgentRole;
  stageIndex: number;
  status: StepStatus | 'running';
  toolCalls: ToolCallRecord[];
}

/**
 * State for the pipeline progress view.
 */
export interface PipelineProgressState {
  runState: RunState;
  category: TaskCategory | null;
  method: ClassificationMethod | null;
  planText: string | null;
  sourceCount: number | null;
  roles: RoleProgress[];
}

export function createProgressState(): PipelineProgressState {
  return {
    runState: 'PENDING',
    category: null,
    method: null,
    planText: null,
    sourceCount: null,
    roles: [],
  };
}

// ============================================================================
// Status Icon Component
// ============================================================================

function StatusIcon({ status }: { status: RoleProgress['status'] }) {
  switch (status) {
    case 'running':
      return (
        <Text color={colors.accent}>
          <InkSpinner type="dots" />
        </Text>
      );
    case 'ok':
      return <Text color={colors.success}>✓</Text>;
    case 'failed':
      return <Text color={colors.error}>✗</Text>;
    case 'skipped':
      return <Text color={colors.muted}>○</Text>;
  }
}

function formatArgs(args: Record<string, unknown>): string {
  const text = Object.entries(args)
    .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
    .join(', ');
  return text.length > 60 ? `${text.slice(0, 57)}...` : text;
}

function ToolCallLine({ record }: { record: ToolCallRecord }) {
  const failed = isToolCallError(record);
  return (
    <Box marginLeft={4}>
      <Text color={failed ? colors.error : colors.muted}>
        ⎿ {record.toolName}({formatArgs(record.arguments)}) {failed ? `failed: ${record.error.kind}` : `${record.durationMs}ms`}
      </Text>
    </Box>
  );
}

// ============================================================================
// Pipeline Progress View
// ============================================================================

const STATE_LABELS: Partial<Record<RunState, string>> = {
  PENDING: 'Classifying request...',
  CLASSIFIED: 'Retrieving reference material...',
  RETRIEVED: 'Starting agents...',
  AGGREGATED: 'Composing response...',
};

/**
 * Displays the run's state, the selected plan and each agent step with the
 * tool calls it has made so far.
 */
export const PipelineProgressView = React.memo(function PipelineProgressView({
  state,
}: {
  state: PipelineProgressState;
}) {
  const label = STATE_LABELS[state.runState];

  return (
    <Box flexDirection="column" marginTop={1}>
      {state.category && (
        <Text color={colors.muted}>
          Category: <Text color={colors.primary}>{state.category}</Text> ({state.method})
          {state.planText ? `  Plan: ${state.planText}` : ''}
        </Text>
      )}
      {state.sourceCount !== null && (
        <Text color={colors.muted}>Reference snippets: {state.sourceCount}</Text>
      )}

      {state.roles.map(progress => (
        <Box key={`${progress.stageIndex}-${progress.role}`} flexDirection="column">
          <Box>
            <StatusIcon status={progress.status} />
            <Text> </Text>
            <Text color={roleColors[progress.role]}>{getRoleTitle(progress.role)}</Text>
            <Text color={colors.muted}> (stage {progress.stageIndex + 1})</Text>
          </Box>
          {progress.toolCalls.map((record, index) => (
            <ToolCallLine key={index} record={record} />
          ))}
        </Box>
      ))}

      {label && (
        <Box marginTop={1}>
          <Text color={colors.accent}>
            <InkSpinner type="dots" />
          </Text>
          <Text> </Text>
          <Text color={colors.primary}>{label}</Text>
        </Box>
      )}
    </Box>
  );
});
