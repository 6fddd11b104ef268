/**
 * CLI - Interactive terminal for the agent pipeline
 *
 * Each query runs through classification, retrieval and the agent stages;
 * progress is shown live and the finished turn moves to the scrollback.
 */
import React from 'react';
import { useState, useCallback, useMemo } from 'react';
import { Box, Static, useApp, useInput } from 'ink';

import { Intro } from './components/Intro.js';
import { Input } from './components/Input.js';
import { AnswerBox, UserQuery } from './components/AnswerBox.js';
import { ProviderPicker } from './components/ProviderPicker.js';
import { getModelIdForProvider } from './model/providers.js';
import { StatusMessage, type Status } from './components/StatusMessage.js';
import { PipelineProgressView } from './components/PipelineProgressView.js';
import { TraceView } from './components/TraceView.js';
import { AgentsView, ToolsView } from './components/CatalogView.js';

import { usePipelineRun } from './hooks/usePipelineRun.js';

import { createServices } from './services.js';
import { getSetting, setSetting, checkApiKeyExistsForProvider, getProviderDisplayName, getLogger } from './utils/index.js';
import { DEFAULT_MODEL, DEFAULT_PROVIDER } from './model/llm.js';

import { generateId, type AppState, type CompletedTurn, type InfoPanel } from './cli/types.js';

const DEFAULT_TEMPERATURE = 0.7;

const COMMANDS = ['/model', '/agents', '/tools', '/trace', '/rag'] as const;

const isString = (value: unknown): value is string => typeof value === 'string';
const isBoolean = (value: unknown): value is boolean => typeof value === 'boolean';

// ============================================================================
// Completed Turn View
// ============================================================================

const CompletedTurnView = React.memo(function CompletedTurnView({ turn }: { turn: CompletedTurn }) {
  return (
    <Box flexDirection="column" marginBottom={1}>
      <UserQuery query={turn.query} />
      <AnswerBox result={turn.result} />
    </Box>
  );
});

// ============================================================================
// Main CLI Component
// ============================================================================

export function CLI() {
  const { exit } = useApp();

  const [state, setState] = useState<AppState>('idle');
  const [provider, setProvider] = useState(() => getSetting<string>('provider', DEFAULT_PROVIDER, isString));
  const [useRag, setUseRag] = useState(() => getSetting<boolean>('useRag', true, isBoolean));
  const [history, setHistory] = useState<CompletedTurn[]>([]);
  const [panel, setPanel] = useState<InfoPanel>(null);
  const [status, setStatus] = useState<Status | null>(null);

  const model = getModelIdForProvider(provider) ?? DEFAULT_MODEL;

  // One set of services per model; every run shares them.
  const services = useMemo(() => createServices({ model }), [model]);

  const { progress, currentQuery, isRunning, runQuery, cancelRun } = usePipelineRun(services.orchestrator);

  const lastResult = history.length > 0 ? history[history.length - 1].result : null;

  const executeQuery = useCallback(
    async (query: string) => {
      setState('running');
      setPanel(null);
      setStatus(null);
      try {
        const result = await runQuery({ message: query, useRag, temperature: DEFAULT_TEMPERATURE });
        setHistory(h => [...h, { id: generateId(), query, result }]);
        if (result.failure?.reason === 'cancelled') {
          setStatus({ tone: 'warning', text: 'Run cancelled. Ask a new question or press Ctrl+C again to quit.' });
        }
      } catch (error) {
        getLogger().error('CLI run failed', error instanceof Error ? error : { error: String(error) });
        setStatus({ tone: 'error', text: `Error: ${error instanceof Error ? error.message : String(error)}` });
      } finally {
        setState('idle');
      }
    },
    [runQuery, useRag]
  );

  const handleSubmit = useCallback(
    (query: string) => {
      const command = query.trim().toLowerCase();

      if (command === 'exit' || command === 'quit') {
        exit();
        return;
      }

      switch (command) {
        case '/model':
          setState('model_select');
          return;
        case '/agents':
          setPanel('agents');
          return;
        case '/tools':
          setPanel('tools');
          return;
        case '/trace':
          setPanel('trace');
          return;
        case '/rag': {
          const next = !useRag;
          setUseRag(next);
          setSetting('useRag', next);
          setStatus({ tone: 'info', text: `Reference material ${next ? 'enabled' : 'disabled'}.` });
          return;
        }
      }

      if (isRunning) {
        setStatus({ tone: 'warning', text: 'A run is in progress. Press Ctrl+C to cancel it first.' });
        return;
      }

      void executeQuery(query);
    },
    [exit, useRag, isRunning, executeQuery]
  );

  /**
   * Called when user selects a provider from the selector
   */
  const handleProviderSelect = useCallback((providerId: string | null) => {
    if (providerId) {
      if (checkApiKeyExistsForProvider(providerId)) {
        setProvider(providerId);
        setSetting('provider', providerId);
      } else {
        setStatus({
          tone: 'error',
          text: `Cannot use ${getProviderDisplayName(providerId)} without its API key in .env.`,
        });
      }
    }
    setState('idle');
  }, []);

  useInput((input, key) => {
    if (key.ctrl && input === 'c') {
      if (state === 'running') {
        cancelRun();
      } else {
        exit();
      }
    }
  });

  if (state === 'model_select') {
    return (
      <Box flexDirection="column">
        <ProviderPicker provider={provider} onSelect={handleProviderSelect} />
      </Box>
    );
  }

  // Combine intro and history into a single static stream
  const staticItems: Array<{ type: 'intro' } | { type: 'turn'; turn: CompletedTurn }> = [
    { type: 'intro' },
    ...history.map(h => ({ type: 'turn' as const, turn: h })),
  ];

  return (
    <Box flexDirection="column">
      <Static items={staticItems}>
        {(item) =>
          item.type === 'intro' ? (
            <Intro key="intro" provider={provider} useRag={useRag} />
          ) : (
            <CompletedTurnView key={item.turn.id} turn={item.turn} />
          )
        }
      </Static>

      {currentQuery && progress && (
        <Box flexDirection="column" marginBottom={1}>
          <UserQuery query={currentQuery} />
          <PipelineProgressView state={progress} />
        </Box>
      )}

      {panel === 'agents' && <AgentsView />}
      {panel === 'tools' && <ToolsView tools={services.registry.list()} />}
      {panel === 'trace' && <TraceView result={lastResult} />}

      <StatusMessage status={status} />

      <Box marginTop={1}>
        <Input commands={COMMANDS} onSubmit={handleSubmit} />
      </Box>
    </Box>
  );
}
