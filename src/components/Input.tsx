import React, { useState } from 'react';
import { Box, Text } from 'ink';
import TextInput from 'ink-text-input';

import { colors } from '../theme.js';

interface InputProps {
  /** Slash commands offered as hints while the user types one. */
  commands: readonly string[];
  onSubmit: (value: string) => void;
}

export function Input({ commands, onSubmit }: InputProps) {
  // Input manages its own state - typing won't cause parent re-renders
  const [value, setValue] = useState('');

  const handleSubmit = (val: string) => {
    if (!val.trim()) return;
    onSubmit(val);
    setValue('');
  };

  const typed = value.trim().toLowerCase();
  const hints = typed.startsWith('/') ? commands.filter(command => command.startsWith(typed)) : [];

  return (
    <Box flexDirection="column" marginBottom={1}>
      <Box
        borderStyle="single"
        borderColor={colors.muted}
        borderLeft={false}
        borderRight={false}
        width="100%"
        paddingX={1}
      >
        <Text color={colors.primary} bold>
          {'> '}
        </Text>
        <TextInput
          value={value}
          onChange={setValue}
          onSubmit={handleSubmit}
          placeholder="Describe a coding task, or type / for commands"
          focus={true}
        />
      </Box>
      {hints.length > 0 && (
        <Box paddingX={1}>
          <Text color={colors.muted}>{hints.join('  ')}</Text>
        </Box>
      )}
    </Box>
  );
}
