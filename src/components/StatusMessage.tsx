import React from 'react';
import { Box, Text } from 'ink';
import { colors } from '../theme.js';

export type StatusTone = 'info' | 'warning' | 'error';

export interface Status {
  tone: StatusTone;
  text: string;
}

const TONE_COLORS: Record<StatusTone, string> = {
  info: colors.muted,
  warning: colors.warning,
  error: colors.error,
};

/**
 * One-line notice below the transcript: command feedback, cancellations and
 * errors.
 */
export function StatusMessage({ status }: { status: Status | null }) {
  if (!status) {
    return null;
  }

  return (
    <Box marginTop={1}>
      <Text color={TONE_COLORS[status.tone]} dimColor={status.tone === 'info'}>
        {status.text}
      </Text>
    </Box>
  );
}
