import type { AgentRole } from './agent/state.js';

export const colors = {
  primary: '#58A6FF',
  primaryLight: '#a5cfff',
  success: 'green',
  error: 'red',
  warning: 'yellow',
  muted: '#808080',
  mutedDark: '#303030',
  accent: 'cyan',
  highlight: 'magenta',
  white: '#ffffff',
  info: '#6CB6FF',
} as const;

export const roleColors: Record<AgentRole, string> = {
  planner: '#C792EA',
  coder: '#82AAFF',
  reviewer: '#FFCB6B',
  debugger: '#F07178',
  optimizer: '#C3E88D',
};

export const dimensions = {
  boxWidth: 80,
  introWidth: 50,
} as const;
