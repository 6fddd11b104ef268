import React from 'react';
import { existsSync, readFileSync } from 'fs';
import { Box, Text } from 'ink';
import { colors, dimensions } from '../theme.js';
import { getProviderDisplayName } from '../utils/env.js';

function readVersion(): string {
  const file = new URL('../../package.json', import.meta.url);
  if (!existsSync(file)) return '';
  const raw: unknown = JSON.parse(readFileSync(file, 'utf-8'));
  if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
    return raw.version;
  }
  return '';
}

interface IntroProps {
  provider: string;
  useRag: boolean;
}

export function Intro({ provider, useRag }: IntroProps) {
  const { introWidth } = dimensions;
  const version = readVersion();
  const welcomeText = 'Welcome to Codesmith';
  const versionText = version ? ` v${version}` : '';
  const fullText = welcomeText + versionText;
  const padding = Math.floor((introWidth - fullText.length - 2) / 2);

  return (
    <Box flexDirection="column" marginTop={2}>
      <Text color={colors.primary}>{'═'.repeat(introWidth)}</Text>
      <Text color={colors.primary}>
        ║{' '.repeat(padding)}
        <Text bold>{welcomeText}</Text>
        <Text color={colors.muted}>{versionText}</Text>
        {' '.repeat(introWidth - fullText.length - padding - 2)}║
      </Text>
      <Text color={colors.primary}>{'═'.repeat(introWidth)}</Text>

      <Box marginTop={1} flexDirection="column">
        <Text>Planner, coder, reviewer, debugger and optimizer agents working on your coding request.</Text>
        <Text color={colors.muted}>
          Provider: {getProviderDisplayName(provider)} · Reference material: {useRag ? 'on' : 'off'}
        </Text>
        <Text color={colors.muted}>Commands: /model /agents /tools /rag /trace · Ctrl+C cancels a run</Text>
      </Box>
    </Box>
  );
}
