import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { parseArgs } from 'node:util';

import { generateKeybindings, generateSnippets, matchMacros } from './bindings.js';
import { DEFAULT_KEY_MAP, KeyMapError, loadKeyMap } from './keyMap.js';
import { extractMacros } from './latex/macros.js';
import { formatSummary, writeOutputs } from './output.js';
import { isLabelSet, PLACEHOLDER_LABELS } from './snippets.js';
import type { LabelSet } from './snippets.js';
import type { KeyMap } from './types.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const USAGE =
  'Usage: muse-bindings <path-to-sty> [--out-dir <dir>] [--key-map <file.json>] [--labels ja|en]';

export type CliIo = {
  log: (line: string) => void;
  error: (line: string) => void;
};

const consoleIo: CliIo = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

export function expandHome(filePath: string): string {
  if (filePath === '~') return os.homedir();
  if (filePath.startsWith('~/')) return path.join(os.homedir(), filePath.slice(2));
  return filePath;
}

const REPLACEMENT_CHARACTER = '\uFFFD';
const REPLACEMENT_BYTES = Buffer.from(REPLACEMENT_CHARACTER, 'utf8');

/**
 * Decodes UTF-8, dropping undecodable bytes. A U+FFFD written in the source
 * is kept: its byte sequence always decodes on its own, so the buffer is
 * split on it and only the decoder's substitutions are removed.
 */
export function decodeDroppingInvalid(bytes: Buffer): string {
  const parts: string[] = [];
  let start = 0;
  let at = bytes.indexOf(REPLACEMENT_BYTES);
  while (at !== -1) {
    parts.push(bytes.subarray(start, at).toString('utf8').replaceAll(REPLACEMENT_CHARACTER, ''));
    start = at + REPLACEMENT_BYTES.length;
    at = bytes.indexOf(REPLACEMENT_BYTES, start);
  }
  parts.push(bytes.subarray(start).toString('utf8').replaceAll(REPLACEMENT_CHARACTER, ''));
  return parts.join(REPLACEMENT_CHARACTER);
}

export function readStyleFile(filePath: string): string {
  return decodeDroppingInvalid(fs.readFileSync(filePath));
}

type CliOptions = {
  stylePath: string;
  outDir: string;
  keyMapPath: string | null;
  labels: LabelSet;
};

const CLI_OPTIONS = {
  'out-dir': { type: 'string', default: '.' },
  'key-map': { type: 'string' },
  labels: { type: 'string', default: 'ja' },
  help: { type: 'boolean', short: 'h', default: false },
} as const;

/** Returns `'help'` for `--help`, null for anything that is a usage error. */
function parseCliArgs(argv: string[]): CliOptions | 'help' | null {
  try {
    const { values, positionals } = parseArgs({
      args: argv,
      options: CLI_OPTIONS,
      allowPositionals: true,
      strict: true,
    });
    if (values.help) return 'help';

    const [stylePath] = positionals;
    const labels = values.labels ?? 'ja';
    if (positionals.length !== 1 || !stylePath || !isLabelSet(labels)) return null;

    return {
      stylePath,
      outDir: values['out-dir'] ?? '.',
      keyMapPath: values['key-map'] ?? null,
      labels,
    };
  } catch {
    // parseArgs rejects unknown options and missing option values.
    return null;
  }
}

export function runCli(argv: string[], io: CliIo = consoleIo): number {
  const options = parseCliArgs(argv);
  if (options === 'help') {
    io.log(USAGE);
    return EXIT_OK;
  }
  if (!options) {
    io.log(USAGE);
    return EXIT_USAGE;
  }

  const stylePath = path.resolve(expandHome(options.stylePath));
  if (!fs.existsSync(stylePath)) {
    io.log(`ERROR: file not found: ${stylePath}`);
    return EXIT_USAGE;
  }
  if (!fs.statSync(stylePath).isFile()) {
    io.log(`ERROR: not a file: ${stylePath}`);
    return EXIT_USAGE;
  }

  let keyMap: KeyMap = DEFAULT_KEY_MAP;
  if (options.keyMapPath) {
    try {
      keyMap = loadKeyMap(path.resolve(expandHome(options.keyMapPath)));
    } catch (error) {
      if (!(error instanceof KeyMapError)) throw error;
      io.log(`ERROR: ${error.message}`);
      return EXIT_USAGE;
    }
  }

  let source: string;
  try {
    source = readStyleFile(stylePath);
  } catch (error) {
    io.error(`ERROR: cannot read ${stylePath}: ${error instanceof Error ? error.message : String(error)}`);
    return EXIT_FAILURE;
  }

  const labels = PLACEHOLDER_LABELS[options.labels];
  const macros = extractMacros(source);
  const keybindings = generateKeybindings(keyMap, macros, labels);
  const snippets = generateSnippets(keyMap, macros, labels);

  try {
    const paths = writeOutputs(expandHome(options.outDir), keybindings, snippets);
    for (const line of formatSummary(paths, matchMacros(keyMap, macros))) {
      io.log(line);
    }
  } catch (error) {
    io.error(`Failed to write output: ${error instanceof Error ? error.message : String(error)}`);
    return EXIT_FAILURE;
  }
  return EXIT_OK;
}
