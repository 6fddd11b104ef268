import React from 'react';
import { Box, Text } from 'ink';
import { colors, roleColors } from '../theme.js';
import { getRoleTitle } from '../agent/prompts.js';
import { listRoles } from '../agent/roles.js';
import type { ToolDeclaration } from '../tools/types.js';

/**
 * Agent roles with their capabilities, opened with /agents.
 */
export function AgentsView() {
  return (
    <Box flexDirection="column" marginTop={1}>
      <Text color={colors.primary} bold>Agents</Text>
      {listRoles().map(definition => (
        <Box key={definition.role} flexDirection="column" marginTop={1}>
          <Text>
            <Text color={roleColors[definition.role]} bold>{getRoleTitle(definition.role)}</Text>
            <Text color={colors.muted}> - {definition.description}</Text>
          </Text>
          <Text color={colors.muted}>  {definition.capabilities.join(' · ')}</Text>
          <Text color={colors.muted}>  tools: {definition.tools.join(', ')}</Text>
        </Box>
      ))}
    </Box>
  );
}

/**
 * Registered tools with their arguments, opened with /tools.
 */
export function ToolsView({ tools }: { tools: ToolDeclaration[] }) {
  return (
    <Box flexDirection="column" marginTop={1}>
      <Text color={colors.primary} bold>Tools</Text>
      {tools.map(tool => (
        <Box key={tool.name} flexDirection="column" marginTop={1}>
          <Text bold>{tool.name}</Text>
          <Text color={colors.muted}>  {tool.description}</Text>
          <Text color={colors.muted}>  arguments: {Object.keys(tool.argumentSchema.shape).join(', ')}</Text>
        </Box>
      ))}
    </Box>
  );
}
