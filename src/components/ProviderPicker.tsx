import React, { useMemo, useState } from 'react';
import { Box, Text, useInput } from 'ink';
import { listProviderChoices } from '../model/providers.js';
import { colors } from '../theme.js';

interface ProviderPickerProps {
  provider: string;
  /** `null` when the picker is dismissed. */
  onSelect: (providerId: string | null) => void;
}

/**
 * The /model panel. Arrows or a row number move the cursor; providers whose
 * key is missing are flagged but still selectable so the CLI can explain why.
 */
export function ProviderPicker({ provider, onSelect }: ProviderPickerProps) {
  const choices = useMemo(() => listProviderChoices(provider), [provider]);
  const [cursor, setCursor] = useState(() => Math.max(0, choices.findIndex(choice => choice.current)));

  useInput((input, key) => {
    const row = Number.parseInt(input, 10);
    if (row >= 1 && row <= choices.length) {
      setCursor(row - 1);
    } else if (key.upArrow) {
      setCursor(prev => (prev + choices.length - 1) % choices.length);
    } else if (key.downArrow) {
      setCursor(prev => (prev + 1) % choices.length);
    } else if (key.return) {
      onSelect(choices[cursor].providerId);
    } else if (key.escape) {
      onSelect(null);
    }
  });

  return (
    <Box flexDirection="column" marginTop={1} borderStyle="round" borderColor={colors.mutedDark} paddingX={1}>
      <Text color={colors.primary} bold>Model provider</Text>
      {choices.map((choice, index) => (
        <Box key={choice.providerId} flexDirection="column">
          <Text color={index === cursor ? colors.primaryLight : colors.white} bold={index === cursor}>
            {index === cursor ? '› ' : '  '}
            {index + 1}. {choice.displayName}
            <Text color={colors.accent}> {choice.modelId}</Text>
            {choice.current && <Text color={colors.success}> (current)</Text>}
          </Text>
          <Text color={colors.muted}>
            {'     '}{choice.description}
            {choice.missingKey && <Text color={colors.warning}> · needs {choice.missingKey}</Text>}
          </Text>
        </Box>
      ))}
      <Text color={colors.muted}>↑/↓ or 1-{choices.length} to move · enter to use · esc to close</Text>
    </Box>
  );
}
