import { lstatSync, readFileSync, unlinkSync, type Stats } from 'fs';
import { dirname, isAbsolute, relative, resolve } from 'path';
import { isErrnoException, writeFileAtomicSync } from '@botkeeper/durable-file';
import { ChangeApplyError } from '../errors';
import type { BotConfigFile } from './bot-config-file';
import type { ChangeProposal, FileChange } from './proposal';

export interface AppliedChange {
  field: string;
  old: string | null;
  new: string | null;
}

/** Stats for `path`, or null when it or one of its parents does not exist as a directory. */
function lstatOrNull(path: string): Stats | null {
  try {
    return lstatSync(path);
  } catch (err: unknown) {
    if (isErrnoException(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) return null;
    throw err;
  }
}

function sizeOf(path: string): string | null {
  return lstatOrNull(path) ? `${readFileSync(path).length} bytes` : null;
}

/** Nearest path at or above `path` that exists, stopping at `root`. */
function nearestExisting(path: string, root: string): string {
  let current = path;
  while (current !== root && !lstatOrNull(current)) {
    current = dirname(current);
  }
  return current;
}

function checkTarget(change: FileChange, botDir: string): void {
  const path = resolve(botDir, change.path);
  const rel = relative(botDir, path);
  if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
    throw new ChangeApplyError(`${change.path} is outside the bot directory`);
  }
  const stat = lstatOrNull(path);
  if (stat && !stat.isFile()) {
    throw new ChangeApplyError(`${change.path} is not a regular file`);
  }
  if (change.action === 'write' && !stat) {
    const parent = nearestExisting(dirname(path), botDir);
    if (!lstatSync(parent).isDirectory()) {
      throw new ChangeApplyError(`cannot create ${change.path}: ${relative(botDir, parent)} is not a directory`);
    }
  }
}

/**
 * Applies changes that already passed the safety envelope. Every file target
 * is checked before anything is written, then config keys go in one atomic
 * rewrite of the bot's `.env` and files are replaced atomically or unlinked.
 *
 * Each change is pushed to `applied` as it lands, so after a failure the
 * array still lists what reached the disk.
 */
export function applyChanges(
  changes: readonly ChangeProposal[],
  target: { botDir: string; configFile: BotConfigFile },
  applied: AppliedChange[] = [],
): AppliedChange[] {
  for (const change of changes) {
    if (change.kind === 'file') checkTarget(change, target.botDir);
  }

  const updates: Record<string, string> = {};
  for (const change of changes) {
    if (change.kind === 'config') updates[change.key] = change.value;
  }
  if (Object.keys(updates).length > 0) {
    for (const u of target.configFile.update(updates)) {
      applied.push({ field: u.key, old: u.old, new: u.new });
    }
  }

  for (const change of changes) {
    if (change.kind !== 'file') continue;
    const path = resolve(target.botDir, change.path);
    const old = sizeOf(path);
    if (change.action === 'delete') {
      if (old === null) continue;
      unlinkSync(path);
      applied.push({ field: change.path, old, new: null });
    } else {
      const content = change.content ?? '';
      writeFileAtomicSync(path, content);
      applied.push({ field: change.path, old, new: `${Buffer.byteLength(content)} bytes` });
    }
  }
  return applied;
}
