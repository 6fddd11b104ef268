import { readFile } from 'fs/promises';
import { isAbsolute, relative, resolve } from 'path';
import { DynamicStructuredTool } from '@langchain/core/tools';
import { z } from 'zod';
import { declareTool, type ToolDeclaration } from '../types.js';

const MAX_FILE_CHARS = 50_000;

const ReadFileInputSchema = z.object({
  path: z.string().min(1).describe('Path of the file, relative to the working directory'),
  startLine: z.number().int().min(1).optional().describe('First line to return (1-based)'),
  endLine: z.number().int().min(1).optional().describe('Last line to return (inclusive)'),
});

const ReadFileResultSchema = z.object({
  path: z.string(),
  content: z.string(),
  truncated: z.boolean(),
});

/**
 * Resolves `filePath` inside `root`, rejecting anything that would escape it.
 */
export function resolveInsideRoot(root: string, filePath: string): string {
  const absolute = resolve(root, filePath);
  const rel = relative(root, absolute);
  if (rel.startsWith('..') || isAbsolute(rel)) {
    throw new Error(`Path is outside the working directory: ${filePath}`);
  }
  return absolute;
}

export function createReadFileTool(root: string = process.cwd()): ToolDeclaration {
  const tool = new DynamicStructuredTool({
    name: 'read_file',
    description: 'Read a text file from the project working directory, optionally limited to a line range.',
    schema: ReadFileInputSchema,
    func: async (input, _runManager, config) => {
      const absolute = resolveInsideRoot(root, input.path);
      const raw = await readFile(absolute, { encoding: 'utf-8', signal: config?.signal });

      let content = raw;
      if (input.startLine !== undefined || input.endLine !== undefined) {
        const lines = raw.split('\n');
        const from = input.startLine ?? 1;
        const to = Math.min(lines.length, input.endLine ?? lines.length);
        content = lines
          .slice(from - 1, to)
          .map((line, index) => `${from + index}: ${line}`)
          .join('\n');
      }

      const truncated = content.length > MAX_FILE_CHARS;
      return {
        path: relative(root, absolute),
        content: truncated ? content.slice(0, MAX_FILE_CHARS) : content,
        truncated,
      };
    },
  });
  return declareTool(tool, { resultSchema: ReadFileResultSchema });
}
