import { parse } from 'dotenv';
import { readFileIfExists, writeFileAtomicSync } from '@botkeeper/durable-file';
import { canonicalKey } from './proposal';

const ASSIGNMENT_RE = /^(\s*(?:export\s+)?)([A-Za-z_][A-Za-z0-9_]*)\s*=/;
const PLAIN_VALUE_RE = /^[A-Za-z0-9_.,:/@%+-]*$/;

export interface ConfigUpdate {
  key: string;
  old: string | null;
  new: string;
}

function quote(value: string): string {
  if (PLAIN_VALUE_RE.test(value)) return value;
  return value.includes("'") ? `"${value.replace(/"/g, '\\"')}"` : `'${value}'`;
}

function canonicalEntries(values: Readonly<Record<string, string>>): Map<string, string> {
  return new Map(Object.entries(values).map(([key, value]) => [canonicalKey(key), value]));
}

/**
 * Rewrites assignments for the given keys in `.env` text. Keys match in any
 * case and every matching line is rewritten under the upper-case name.
 * Comments, blank lines and other keys are kept as they are; keys not
 * present are appended.
 */
export function updateEnvText(text: string, updates: Readonly<Record<string, string>>): string {
  const wanted = canonicalEntries(updates);
  const pending = new Set(wanted.keys());
  const lines = text === '' ? [] : text.replace(/\r?\n$/, '').split(/\r?\n/);
  const out = lines.map((line) => {
    const match = ASSIGNMENT_RE.exec(line);
    const key = match ? canonicalKey(match[2]) : '';
    const value = wanted.get(key);
    if (!match || value === undefined) return line;
    pending.delete(key);
    return `${match[1]}${key}=${quote(value)}`;
  });
  for (const key of pending) out.push(`${key}=${quote(wanted.get(key) ?? '')}`);
  return out.join('\n') + '\n';
}

/** The monitored bot's `.env`, which it reads on start. */
export class BotConfigFile {
  constructor(readonly path: string) {}

  /** Parsed values keyed by upper-case name. */
  read(): Record<string, string> {
    return Object.fromEntries(canonicalEntries(parse(readFileIfExists(this.path) ?? '')));
  }

  /** Atomic rewrite; returns one entry per key with its previous value. */
  update(updates: Readonly<Record<string, string>>): ConfigUpdate[] {
    const text = readFileIfExists(this.path) ?? '';
    const before = canonicalEntries(parse(text));
    writeFileAtomicSync(this.path, updateEnvText(text, updates));
    return [...canonicalEntries(updates)].map(([key, value]) => ({ key, old: before.get(key) ?? null, new: value }));
  }
}
