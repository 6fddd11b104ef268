import React from 'react';
import { Box, Text } from 'ink';
import { colors, roleColors } from '../theme.js';
import { getRoleTitle } from '../agent/prompts.js';
import { isToolCallError } from '../agent/state.js';
import type { PipelineRunResult } from '../agent/state.js';

/**
 * Step-by-step trace of the last run, opened with /trace.
 */
export function TraceView({ result }: { result: PipelineRunResult | null }) {
  if (!result) {
    return <Text color={colors.muted}>No run yet.</Text>;
  }

  return (
    <Box flexDirection="column" marginTop={1}>
      <Text color={colors.primary} bold>Last run</Text>
      <Text color={colors.muted}>
        {result.stateHistory.join(' → ')} in {(result.executionTimeMs / 1000).toFixed(1)}s
      </Text>
      {result.failure && (
        <Text color={colors.error}>
          {result.failure.reason}: {result.failure.message}
        </Text>
      )}
      {result.agentTrace.map((step, index) => (
        <Box key={index} flexDirection="column" marginTop={1}>
          <Text>
            <Text color={roleColors[step.agentRole]}>{getRoleTitle(step.agentRole)}</Text>
            <Text color={colors.muted}>
              {' '}stage {step.stageIndex + 1} · {step.status} · {step.durationMs}ms · prompt {step.inputPromptDigest}
            </Text>
          </Text>
          {step.error && <Text color={colors.error}>  {step.error.kind}: {step.error.message}</Text>}
          {step.toolCalls.map((record, callIndex) => (
            <Text key={callIndex} color={colors.muted}>
              {'  '}{record.toolName} {isToolCallError(record) ? `✗ ${record.error.kind}` : '✓'} ({record.durationMs}ms)
            </Text>
          ))}
        </Box>
      ))}
      {result.sources.length > 0 && (
        <Box flexDirection="column" marginTop={1}>
          <Text color={colors.primary}>Sources</Text>
          {result.sources.map(source => (
            <Text key={source.sourceId} color={colors.muted}>
              {'  '}{source.sourceId} ({source.score.toFixed(2)})
            </Text>
          ))}
        </Box>
      )}
    </Box>
  );
}
