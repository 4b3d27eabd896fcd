import type { MacroTable } from '../types.js';
import { stripComments } from './comments.js';

// LaTeX accepts at most nine parameters.
const MAX_ARGUMENTS = 9;

/**
 * Matches the header of `\newcommand`, `\renewcommand` and `\providecommand`
 * (starred or not), with the name braced or bare, followed by an optional
 * `[N]` argument count. Bodies are never inspected.
 */
const DEFINITION =
  /\\(?:(?:re)?new|provide)command\*?\s*(?:\{\s*\\([A-Za-z@]+)\s*\}|\\([A-Za-z@]+))\s*(?:\[\s*(\d+)\s*\])?/g;

export function extractMacros(source: string): MacroTable {
  const cleaned = stripComments(source);
  const macros = new Map<string, number>();

  for (const match of cleaned.matchAll(DEFINITION)) {
    const name = match[1] ?? match[2];
    if (!name) continue;
    const count = match[3] ? Number.parseInt(match[3], 10) : 0;
    if (count > MAX_ARGUMENTS) continue;
    // Redefinitions overwrite earlier ones silently.
    macros.set(name, count);
  }

  return macros;
}
