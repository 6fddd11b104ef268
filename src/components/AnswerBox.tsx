import React from 'react';
import { Box, Text } from 'ink';
import { colors } from '../theme.js';
import type { PipelineRunResult } from '../agent/state.js';

interface AnswerBoxProps {
  result: PipelineRunResult;
}

export const AnswerBox = React.memo(function AnswerBox({ result }: AnswerBoxProps) {
  if (result.status === 'FAILED') {
    return (
      <Box flexDirection="column" marginTop={1}>
        <Text color={colors.error}>
          Run failed ({result.failure?.reason ?? 'unknown'}): {result.failure?.message ?? ''}
        </Text>
        <Text color={colors.muted}>Type /trace to see the steps that ran.</Text>
      </Box>
    );
  }

  return (
    <Box flexDirection="column" marginTop={1}>
      <Text>{result.response}</Text>
      <Text color={colors.muted}>
        {result.agentTrace.length} steps · {(result.executionTimeMs / 1000).toFixed(1)}s
      </Text>
    </Box>
  );
});

interface UserQueryProps {
  query: string;
}

export function UserQuery({ query }: UserQueryProps) {
  return (
    <Box marginTop={1} paddingRight={2}>
      <Text color={colors.white} backgroundColor={colors.mutedDark}>
        {'>'} {query}{' '}
      </Text>
    </Box>
  );
}
