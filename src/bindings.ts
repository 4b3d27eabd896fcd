import { buildSnippet, PLACEHOLDER_LABELS } from './snippets.js';
import type {
  KeyAssignment,
  Keybinding,
  KeyMap,
  MacroTable,
  PlaceholderLabels,
  SnippetTable,
} from './types.js';

export const INSERT_SNIPPET_COMMAND = 'editor.action.insertSnippet';
export const WHEN_CLAUSE = 'editorTextFocus && editorLangId == latex';

export type Chords = {
  primary: string;
  fallback: string;
};

export function chordsFor(assignment: KeyAssignment): Chords {
  if (assignment.alt) {
    return {
      primary: `ctrl+alt+${assignment.key}`,
      fallback: `ctrl+shift+alt+${assignment.key}`,
    };
  }
  return {
    primary: `ctrl+${assignment.key}`,
    fallback: `ctrl+shift+${assignment.key}`,
  };
}

export function makeBinding(key: string, snippet: string): Keybinding {
  return {
    key,
    command: INSERT_SNIPPET_COMMAND,
    when: WHEN_CLAUSE,
    args: { snippet },
  };
}

export type MatchedMacro = {
  assignment: KeyAssignment;
  argCount: number;
};

/** Key-map entries defined in the style file, in key-map order. */
export function matchMacros(keyMap: KeyMap, macros: MacroTable): MatchedMacro[] {
  const matched: MatchedMacro[] = [];
  for (const assignment of keyMap) {
    const argCount = macros.get(assignment.name);
    if (argCount === undefined) continue;
    matched.push({ assignment, argCount });
  }
  return matched;
}

export function generateKeybindings(
  keyMap: KeyMap,
  macros: MacroTable,
  labels: PlaceholderLabels = PLACEHOLDER_LABELS.ja,
): Keybinding[] {
  const bindings: Keybinding[] = [];
  for (const { assignment, argCount } of matchMacros(keyMap, macros)) {
    const snippet = buildSnippet(assignment.name, argCount, labels);
    const { primary, fallback } = chordsFor(assignment);
    bindings.push(makeBinding(primary, snippet), makeBinding(fallback, snippet));
  }
  return bindings;
}

export function generateSnippets(
  keyMap: KeyMap,
  macros: MacroTable,
  labels: PlaceholderLabels = PLACEHOLDER_LABELS.ja,
): SnippetTable {
  const snippets: SnippetTable = {};
  for (const { assignment, argCount } of matchMacros(keyMap, macros)) {
    const { name } = assignment;
    snippets[`muse: ${name}`] = {
      prefix: `muse-${name}`,
      body: [buildSnippet(name, argCount, labels)],
      description: `muselab-correction: \\${name} (auto-generated)`,
    };
  }
  return snippets;
}
