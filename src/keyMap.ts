import fs from 'node:fs';
import { z } from 'zod';

import type { KeyMap } from './types.js';

export const DEFAULT_KEY_MAP: KeyMap = Object.freeze([
  { name: 'deleted', key: 'd', alt: false },
  { name: 'added', key: 'a', alt: false },
  { name: 'commented', key: 'c', alt: false },
  { name: 'highlight', key: 'h', alt: false },
  { name: 'needRef', key: 'r', alt: false },
  { name: 'modified', key: 'm', alt: false },
  // Shares `h` with \highlight.
  { name: 'highlightComment', key: 'h', alt: true },
]);

const KeyAssignmentSchema = z.object({
  name: z.string().regex(/^[A-Za-z@]+$/, 'must be a macro name without backslash'),
  key: z.string().length(1, 'must be a single character'),
  alt: z.boolean().optional().default(false),
});

const KeyMapSchema = z
  .array(KeyAssignmentSchema)
  .refine(
    (entries) => new Set(entries.map((entry) => entry.name)).size === entries.length,
    'macro names must be unique',
  );

export class KeyMapError extends Error {
  constructor(filePath: string, reason: string) {
    super(`invalid key map ${filePath}: ${reason}`);
    this.name = 'KeyMapError';
  }
}

export function parseKeyMap(value: unknown, filePath: string): KeyMap {
  const parsed = KeyMapSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new KeyMapError(filePath, `${where}${issue?.message ?? 'unrecognized shape'}`);
  }
  return parsed.data;
}

export function loadKeyMap(filePath: string): KeyMap {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new KeyMapError(filePath, error instanceof Error ? error.message : String(error));
  }

  let value: unknown;
  try {
    value = JSON.parse(raw) as unknown;
  } catch {
    throw new KeyMapError(filePath, 'not valid JSON');
  }
  return parseKeyMap(value, filePath);
}
