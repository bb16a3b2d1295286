import { isAbsolute, relative, resolve } from 'path';
import type { SafetyEnvelope } from '../config/botkeeper-config';
import { canonicalKey, describeChange, type ChangeProposal, type FileChange } from './proposal';

export type EnvelopeRule =
  | 'persisted-state'
  | 'outside-workspace'
  | 'risk-control'
  | 'position-size-ceiling'
  | 'all-strategies-disabled';

export interface Refusal {
  change: ChangeProposal;
  rule: EnvelopeRule;
  reason: string;
  highImpact: boolean;
}

export interface EnvelopeContext {
  envelope: SafetyEnvelope;
  botDir: string;
  botEnvFile: string;
  heartbeatPath: string;
  /** The bot's configuration before any change. */
  currentConfig: Readonly<Record<string, string>>;
  /** Current content of a file in the bot directory, or null when it does not exist. */
  readSource: (absPath: string) => string | null;
}

export interface EnvelopeVerdict {
  /** True only when no change was refused; a single refusal blocks the whole proposal. */
  approved: boolean;
  refusals: Refusal[];
}

const HIGH_IMPACT_RULES: ReadonlySet<EnvelopeRule> = new Set(['persisted-state', 'risk-control', 'outside-workspace']);

const DATABASE_FILE_RE = /\.(db|sqlite\d?)(-journal|-wal|-shm)?$/i;

const FALSE_VALUES = new Set(['', 'false', '0', 'no', 'off', 'f', 'n']);

const TOP_LEVEL_NAME_RE = /^(?:async\s+)?(?:def|class)\s+([A-Za-z_]\w*)/gm;

/** Pydantic-style boolean: an unset flag takes its default, a set one is enabled unless explicitly false. */
export function isDisabledFlag(value: string | undefined, defaultEnabled = true): boolean {
  if (value === undefined) return !defaultEnabled;
  return FALSE_VALUES.has(value.trim().toLowerCase());
}

/** Names of the module-level classes and functions in a source file. */
export function topLevelNames(source: string): Set<string> {
  return new Set(Array.from(source.matchAll(TOP_LEVEL_NAME_RE), (m) => m[1]));
}

function within(parent: string, child: string): boolean {
  const rel = relative(parent, child);
  return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel));
}

type Violation = Pick<Refusal, 'rule' | 'reason'>;

function checkFile(change: FileChange, ctx: EnvelopeContext): Violation | null {
  const target = resolve(ctx.botDir, change.path);
  if (!within(ctx.botDir, target) || target === ctx.botDir) {
    return { rule: 'outside-workspace', reason: `${change.path} is outside the bot directory` };
  }

  const protectedDir = ctx.envelope.protectedPaths.find((p) => within(resolve(ctx.botDir, p), target));
  if (protectedDir !== undefined || DATABASE_FILE_RE.test(target) || target === ctx.heartbeatPath) {
    return {
      rule: 'persisted-state',
      reason: `${change.action === 'delete' ? 'deleting' : 'overwriting'} persisted state at ${change.path}`,
    };
  }

  const isRiskSource = ctx.envelope.riskControlPaths.some((p) => resolve(ctx.botDir, p) === target);
  if (isRiskSource) {
    if (change.action === 'delete' || (change.content ?? '').trim() === '') {
      return { rule: 'risk-control', reason: `removing risk-control source ${change.path}` };
    }
    const kept = topLevelNames(change.content ?? '');
    const dropped = [...topLevelNames(ctx.readSource(target) ?? '')].filter((name) => !kept.has(name));
    if (dropped.length > 0) {
      return {
        rule: 'risk-control',
        reason: `rewriting ${change.path} would remove ${dropped.join(', ')}`,
      };
    }
  }

  if (target === ctx.botEnvFile) {
    return {
      rule: 'risk-control',
      reason: 'the bot configuration file may only be changed key by key',
    };
  }
  return null;
}

function checkConfig(key: string, value: string, envelope: SafetyEnvelope): Violation | null {
  if (envelope.riskControlKeys.includes(key)) {
    const n = Number(value);
    if (value.trim() === '' || !Number.isFinite(n) || n <= 0) {
      return { rule: 'risk-control', reason: `${key}=${value} would disable a risk control` };
    }
  }
  if (key === envelope.positionSizeKey && Number(value) > envelope.maxPositionSizePct) {
    return {
      rule: 'position-size-ceiling',
      reason: `${key}=${value} exceeds the ${envelope.maxPositionSizePct}% ceiling`,
    };
  }
  return null;
}

/**
 * Checks every proposed change against the fixed envelope. Evaluation is
 * pure: nothing is applied here, and the caller applies nothing unless
 * `approved` is true.
 */
export function evaluateProposal(changes: readonly ChangeProposal[], ctx: EnvelopeContext): EnvelopeVerdict {
  const refusals: Refusal[] = [];
  const refuse = (change: ChangeProposal, v: Violation) =>
    refusals.push({ change, ...v, highImpact: change.impact === 'high' || HIGH_IMPACT_RULES.has(v.rule) });

  const merged: Record<string, string> = {};
  for (const [key, value] of Object.entries(ctx.currentConfig)) merged[canonicalKey(key)] = value;
  for (const change of changes) {
    const violation =
      change.kind === 'file'
        ? checkFile(change, ctx)
        : checkConfig(canonicalKey(change.key), change.value, ctx.envelope);
    if (violation) refuse(change, violation);
    if (change.kind === 'config') merged[canonicalKey(change.key)] = change.value;
  }

  const flags = ctx.envelope.strategyFlags;
  const flagKeys = flags.map((f) => f.key);
  const flagChanges = changes.filter((c) => c.kind === 'config' && flagKeys.includes(canonicalKey(c.key)));
  if (
    flags.length > 0 &&
    flagChanges.length > 0 &&
    flags.every((f) => isDisabledFlag(merged[f.key], f.defaultEnabled))
  ) {
    for (const change of flagChanges) {
      refuse(change, {
        rule: 'all-strategies-disabled',
        reason: `${describeChange(change)} would leave every strategy disabled`,
      });
    }
  }

  return { approved: refusals.length === 0, refusals };
}
