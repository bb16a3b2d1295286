import { SCHEDULE_TAG_PREFIX } from '../constants';
import type { ScheduleEntry } from './schedule.types';

export const LABEL_RE = /^[A-Za-z0-9_.-]+$/;

const ENTRY_RE = /^(\S+\s+\S+\s+\S+\s+\S+\s+\S+)\s+(.*\S)\s+#\s*botkeeper:([A-Za-z0-9_.-]+)\s*$/;
const COMMENT_RE = /^#\s*botkeeper:([A-Za-z0-9_.-]+)(?:\s+(.*\S))?\s*$/;

function tagOf(line: string): string | null {
  const trimmed = line.trim();
  return ENTRY_RE.exec(trimmed)?.[3] ?? COMMENT_RE.exec(trimmed)?.[1] ?? null;
}

/** Drops every line tagged with `label`; untagged and foreign lines pass through unchanged. */
export function stripLabel(lines: readonly string[], label: string): string[] {
  return lines.filter((line) => tagOf(line) !== label);
}

export function renderEntry(entry: ScheduleEntry): string[] {
  const tag = `${SCHEDULE_TAG_PREFIX}${entry.label}`;
  const rendered = [`${entry.expression} ${entry.command} # ${tag}`];
  if (entry.description) rendered.unshift(`# ${tag} ${entry.description}`);
  return rendered;
}

/** Removes every label in `entries`, then appends the new block. */
export function applyEntries(lines: readonly string[], entries: readonly ScheduleEntry[]): string[] {
  let next = [...lines];
  for (const label of new Set(entries.map((e) => e.label))) {
    next = stripLabel(next, label);
  }
  while (next.length > 0 && next[next.length - 1].trim() === '') next.pop();
  return [...next, ...entries.flatMap(renderEntry)];
}

export function parseEntries(lines: readonly string[], label?: string): ScheduleEntry[] {
  const entries: ScheduleEntry[] = [];
  const descriptions = new Map<string, string>();
  for (const raw of lines) {
    const line = raw.trim();
    const comment = COMMENT_RE.exec(line);
    if (comment) {
      if (comment[2]) descriptions.set(comment[1], comment[2]);
      continue;
    }
    const match = ENTRY_RE.exec(line);
    if (!match || line.startsWith('#')) continue;
    const [, expression, command, entryLabel] = match;
    if (label !== undefined && entryLabel !== label) continue;
    const description = descriptions.get(entryLabel);
    entries.push({
      label: entryLabel,
      expression: expression.split(/\s+/).join(' '),
      command,
      ...(description ? { description } : {}),
    });
  }
  return entries;
}
