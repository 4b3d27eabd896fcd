import fs from 'node:fs';
import path from 'node:path';

import type { MatchedMacro } from './bindings.js';
import type { Keybinding, SnippetTable } from './types.js';

export const CONFIG_DIR = '.vscode';
export const KEYBINDINGS_FILE = 'keybindings.json';
export const SNIPPETS_FILE = 'latex.json';

export type OutputPaths = {
  keybindings: string;
  snippets: string;
};

export function outputPaths(outDir: string): OutputPaths {
  return {
    keybindings: path.join(outDir, CONFIG_DIR, KEYBINDINGS_FILE),
    snippets: path.join(outDir, CONFIG_DIR, SNIPPETS_FILE),
  };
}

export function serialize(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

export function writeOutputs(
  outDir: string,
  keybindings: Keybinding[],
  snippets: SnippetTable,
): OutputPaths {
  const paths = outputPaths(outDir);
  fs.mkdirSync(path.join(outDir, CONFIG_DIR), { recursive: true });
  fs.writeFileSync(paths.keybindings, serialize(keybindings), 'utf8');
  fs.writeFileSync(paths.snippets, serialize(snippets), 'utf8');
  return paths;
}

export function formatSummary(paths: OutputPaths, matched: MatchedMacro[]): string[] {
  return [
    'Generated files:',
    `  - ${paths.keybindings}`,
    `  - ${paths.snippets}`,
    '',
    'Included commands:',
    ...matched.map(({ assignment, argCount }) => `  \\${assignment.name} [${argCount} args]`),
    '',
    'Note:',
    '  If a primary key conflicts, use its ctrl+shift fallback.',
  ];
}
