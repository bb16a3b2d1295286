import type { ClosedTrade } from './trade-store';

export interface PerformanceMetrics {
  tradeCount: number;
  wins: number;
  losses: number;
  winRatePct: number;
  realizedPnl: number;
  /** Largest peak-to-trough fall of cumulative realized P&L, as a positive amount. */
  maxDrawdown: number;
  windowStart: Date;
  windowEnd: Date;
}

export interface PerformanceDelta {
  tradeCount: number;
  winRatePct: number;
  realizedPnl: number;
  maxDrawdown: number;
}

export interface PerformanceComparison {
  current: PerformanceMetrics;
  prior: PerformanceMetrics;
  delta: PerformanceDelta;
}

export interface TimeWindow {
  start: Date;
  end: Date;
}

const DAY_MS = 86_400_000;

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

/** The trailing window ending at `now`, and the equally long one before it. */
export function analysisWindows(now: Date, days: number): { current: TimeWindow; prior: TimeWindow } {
  const span = days * DAY_MS;
  const currentStart = new Date(now.getTime() - span);
  return {
    current: { start: currentStart, end: now },
    prior: { start: new Date(currentStart.getTime() - span), end: currentStart },
  };
}

/** `trades` must be in exit order. */
export function computeMetrics(trades: readonly ClosedTrade[], window: TimeWindow): PerformanceMetrics {
  let wins = 0;
  let losses = 0;
  let cumulative = 0;
  let peak = 0;
  let maxDrawdown = 0;
  for (const trade of trades) {
    if (trade.realizedPnl > 0) wins++;
    else if (trade.realizedPnl < 0) losses++;
    cumulative += trade.realizedPnl;
    peak = Math.max(peak, cumulative);
    maxDrawdown = Math.max(maxDrawdown, peak - cumulative);
  }
  return {
    tradeCount: trades.length,
    wins,
    losses,
    winRatePct: trades.length === 0 ? 0 : round2((wins / trades.length) * 100),
    realizedPnl: round2(cumulative),
    maxDrawdown: round2(maxDrawdown),
    windowStart: window.start,
    windowEnd: window.end,
  };
}

export function comparePerformance(current: PerformanceMetrics, prior: PerformanceMetrics): PerformanceComparison {
  return {
    current,
    prior,
    delta: {
      tradeCount: current.tradeCount - prior.tradeCount,
      winRatePct: round2(current.winRatePct - prior.winRatePct),
      realizedPnl: round2(current.realizedPnl - prior.realizedPnl),
      maxDrawdown: round2(current.maxDrawdown - prior.maxDrawdown),
    },
  };
}
