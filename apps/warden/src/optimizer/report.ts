import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { isErrnoException } from '@botkeeper/durable-file';
import { formatTimestamp } from '../alerts/alert-format';
import type { AppliedChange } from './change-applier';
import type { PerformanceComparison, PerformanceMetrics } from './performance';
import { describeChange } from './proposal';
import type { Refusal } from './safety-envelope';

export type RunOutcome = 'Success' | 'Failed' | 'Refused';

export type PhaseName = 'health' | 'analysis' | 'proposal' | 'apply';

export interface PhaseRecord {
  name: PhaseName;
  status: 'ok' | 'failed' | 'skipped';
  detail: string;
}

export interface OptimizationRun {
  id: string;
  startedAt: Date;
  finishedAt: Date | null;
  outcome: RunOutcome;
  agent: string;
  phases: PhaseRecord[];
  comparison: PerformanceComparison | null;
  summary: string | null;
  applied: AppliedChange[];
  refusals: Refusal[];
  restart: string | null;
  error: string | null;
  transcriptPath: string | null;
  reportPath: string | null;
}

/** `2026-03-02_16-30-00`, UTC. */
export function runStamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', '_').replace(/:/g, '-');
}

const PHASE_TITLES: Record<PhaseName, string> = {
  health: 'Health check',
  analysis: 'Performance analysis',
  proposal: 'Change proposal',
  apply: 'Apply',
};

function metricsRow(label: string, m: PerformanceMetrics): string {
  return `| ${label} | ${m.tradeCount} | ${m.wins} | ${m.losses} | ${m.winRatePct}% | ${m.realizedPnl} | ${m.maxDrawdown} |`;
}

function cell(value: string | null): string {
  if (value === null) return '_(none)_';
  const oneLine = value.replace(/\s*\n\s*/g, ' ').replace(/\|/g, '\\|');
  return `\`${oneLine}\``;
}

export function renderReport(run: OptimizationRun): string {
  const out: string[] = [
    `# Optimization run ${run.id}`,
    '',
    `- **Outcome:** ${run.outcome}`,
    `- **Started:** ${formatTimestamp(run.startedAt)}`,
    `- **Finished:** ${run.finishedAt ? formatTimestamp(run.finishedAt) : '-'}`,
    `- **Agent:** ${run.agent}`,
  ];
  if (run.transcriptPath) out.push(`- **Transcript:** ${run.transcriptPath}`);
  if (run.error) out.push(`- **Error:** ${run.error}`);

  out.push('', '## Phases', '');
  for (const phase of run.phases) {
    out.push(`- ${PHASE_TITLES[phase.name]}: **${phase.status}** ${phase.detail}`.trimEnd());
  }

  if (run.comparison) {
    const { current, prior, delta } = run.comparison;
    out.push(
      '',
      '## Performance',
      '',
      '| Window | Trades | Wins | Losses | Win rate | Realized P&L | Max drawdown |',
      '|---|---|---|---|---|---|---|',
      metricsRow('Current', current),
      metricsRow('Prior', prior),
      `| Change | ${delta.tradeCount} | | | ${delta.winRatePct} pts | ${delta.realizedPnl} | ${delta.maxDrawdown} |`,
    );
  }

  if (run.summary) out.push('', '## Agent summary', '', run.summary);

  out.push('', '## Applied changes', '');
  if (run.applied.length === 0) {
    out.push('None.');
  } else {
    out.push('| Field | Old | New |', '|---|---|---|');
    for (const c of run.applied) out.push(`| ${c.field} | ${cell(c.old)} | ${cell(c.new)} |`);
  }

  if (run.refusals.length > 0) {
    out.push('', '## Refused changes', '', 'Nothing from this proposal was applied.', '');
    for (const r of run.refusals) {
      out.push(`- \`${describeChange(r.change)}\`: ${r.rule}: ${r.reason}${r.highImpact ? ' (high impact)' : ''}`);
    }
  }

  if (run.restart) out.push('', '## Restart', '', run.restart);
  return out.join('\n') + '\n';
}

/**
 * Writes the report under a name derived from the run start. The file is
 * created exclusively; a name collision gets a numeric suffix instead of
 * overwriting an earlier report.
 */
export function writeReport(dir: string, run: OptimizationRun): string {
  mkdirSync(dir, { recursive: true });
  const content = renderReport(run);
  const base = `optimization-${runStamp(run.startedAt)}`;
  for (let attempt = 0; ; attempt++) {
    const path = join(dir, attempt === 0 ? `${base}.md` : `${base}-${attempt}.md`);
    try {
      writeFileSync(path, content, { flag: 'wx', encoding: 'utf8' });
      return path;
    } catch (err: unknown) {
      if (isErrnoException(err) && err.code === 'EEXIST') continue;
      throw err;
    }
  }
}
