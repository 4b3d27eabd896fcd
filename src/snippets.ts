import type { PlaceholderLabels } from './types.js';

export type LabelSet = 'ja' | 'en';

export const PLACEHOLDER_LABELS: Record<LabelSet, PlaceholderLabels> = {
  ja: {
    corrected: '修正後',
    comment: 'コメント',
    argument: (index) => `引数${index}`,
  },
  en: {
    corrected: 'corrected text',
    comment: 'comment',
    argument: (index) => `argument ${index}`,
  },
};

export function isLabelSet(value: string): value is LabelSet {
  return Object.prototype.hasOwnProperty.call(PLACEHOLDER_LABELS, value);
}

const SELECTION = '${TM_SELECTED_TEXT:$1}';

// Two-argument macros whose second argument has a known meaning.
const SECOND_ARGUMENT_ROLE: Readonly<Record<string, 'corrected' | 'comment'>> = {
  modified: 'corrected',
  commented: 'comment',
  highlightComment: 'comment',
};

function placeholder(index: number, label: string): string {
  return `{\${${index}:${label}}}`;
}

/**
 * Builds the snippet inserted for `\name`. The current selection always
 * becomes the first tab stop; further arguments get numbered placeholders.
 */
export function buildSnippet(
  name: string,
  argCount: number,
  labels: PlaceholderLabels = PLACEHOLDER_LABELS.ja,
): string {
  if (argCount <= 0) return `\\${name} ${SELECTION}`;

  const head = `\\${name}{${SELECTION}}`;
  if (argCount === 1) return head;

  if (argCount === 2) {
    const role = Object.prototype.hasOwnProperty.call(SECOND_ARGUMENT_ROLE, name)
      ? SECOND_ARGUMENT_ROLE[name]
      : undefined;
    const label = role ? labels[role] : labels.argument(2);
    return head + placeholder(2, label);
  }

  const parts = [head];
  for (let index = 2; index <= argCount; index += 1) {
    parts.push(placeholder(index, labels.argument(index)));
  }
  return parts.join('');
}
