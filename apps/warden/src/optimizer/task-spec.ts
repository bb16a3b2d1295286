import type { SafetyEnvelope } from '../config/botkeeper-config';
import type { PerformanceComparison, PerformanceMetrics } from './performance';

const SECRET_KEY_RE = /KEY|SECRET|TOKEN|PASSWORD|PASS$|WEBHOOK/i;

/** Configuration shown to the agent, secrets removed. */
export function tunableConfig(config: Readonly<Record<string, string>>): Record<string, string> {
  return Object.fromEntries(Object.entries(config).filter(([key]) => !SECRET_KEY_RE.test(key)));
}

function metricsLine(label: string, m: PerformanceMetrics): string {
  return (
    `- ${label} (${m.windowStart.toISOString()} to ${m.windowEnd.toISOString()}): ` +
    `${m.tradeCount} trades, ${m.wins} wins, ${m.losses} losses, win rate ${m.winRatePct}%, ` +
    `realized P&L ${m.realizedPnl}, max drawdown ${m.maxDrawdown}`
  );
}

export interface TaskSpecInput {
  envelope: SafetyEnvelope;
  comparison: PerformanceComparison;
  config: Readonly<Record<string, string>>;
}

/** The fixed instruction text handed verbatim to the agent. */
export function buildTaskSpec({ envelope, comparison, config }: TaskSpecInput): string {
  const { current, prior, delta } = comparison;
  const tunables = Object.entries(tunableConfig(config))
    .map(([k, v]) => `${k}=${v}`)
    .join('\n');

  return [
    '# Trading bot optimization task',
    '',
    'You are reviewing a running trading bot after market close. Analyse the performance',
    'figures and configuration below and propose parameter adjustments or code fixes that',
    'should improve results. Do not edit any file yourself: every change is applied by the',
    'supervisor after it has been checked.',
    '',
    '## Safety envelope (hard limits, enforced after you answer)',
    '',
    `- Never delete or overwrite persisted state: ${envelope.protectedPaths.join(', ')}, database files, the heartbeat file.`,
    `- Never remove or disable a risk control: ${envelope.riskControlKeys.join(', ')} must stay positive numbers; ${envelope.riskControlPaths.join(', ')} must not be deleted, and rewrites must keep every top-level class and function.`,
    `- ${envelope.positionSizeKey} must not exceed ${envelope.maxPositionSizePct}.`,
    `- At least one of ${envelope.strategyFlags.map((f) => (f.defaultEnabled ? f.key : `${f.key} (off when unset)`)).join(', ')} must stay enabled.`,
    '- Paths are relative to the bot directory and must stay inside it.',
    'If any proposed change breaks a limit, the whole proposal is rejected.',
    '',
    '## Performance',
    '',
    metricsLine('Current window', current),
    metricsLine('Prior window', prior),
    `- Change: trades ${delta.tradeCount}, win rate ${delta.winRatePct} points, realized P&L ${delta.realizedPnl}, max drawdown ${delta.maxDrawdown}`,
    '',
    '## Current configuration',
    '',
    '```',
    tunables,
    '```',
    '',
    '## Answer format',
    '',
    'End your answer with exactly one fenced json block:',
    '',
    '```json',
    '{',
    '  "summary": "one paragraph on what you found",',
    '  "changes": [',
    '    { "kind": "config", "key": "SOME_KEY", "value": "new value", "rationale": "why", "impact": "low" },',
    '    { "kind": "file", "action": "write", "path": "src/file.py", "content": "full new content", "rationale": "why", "impact": "high" }',
    '  ]',
    '}',
    '```',
    '',
    'Use "impact": "high" for anything that changes trading behaviour materially.',
    'If nothing should change, answer with an empty "changes" list.',
  ].join('\n');
}
