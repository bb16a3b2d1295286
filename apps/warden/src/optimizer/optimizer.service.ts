import { appendFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { Inject, Injectable } from '@nestjs/common';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { readFileIfExists } from '@botkeeper/durable-file';
import { MetricsService } from '@botkeeper/worker-core';
import { AlertDispatcher } from '../alerts/alert-dispatcher.service';
import type { AlertInput } from '../alerts/alert.types';
import type { Clock } from '../clock';
import type { BotkeeperConfig } from '../config/botkeeper-config';
import {
  AGENT,
  BOTKEEPER_CONFIG,
  CLOCK,
  LOCK_FACTORY,
  OPTIMIZER_LOCK,
  OPTIMIZER_LOCK_MARGIN_SECONDS,
  REPORT_DIR_NAME,
  TRADE_STORE,
} from '../constants';
import {
  AgentInvocationError,
  DataStoreIntegrityError,
  OrchestratorTimeoutError,
  errorMessage,
} from '../errors';
import type { LockFactory } from '../providers/lock.provider';
import { SupervisorService } from '../supervisor/supervisor.service';
import type { Agent } from './agent';
import { BotConfigFile } from './bot-config-file';
import { applyChanges } from './change-applier';
import { analysisWindows, comparePerformance, computeMetrics } from './performance';
import { describeChange, parseProposal, type ChangeProposal } from './proposal';
import { type OptimizationRun, type PhaseName, runStamp, writeReport } from './report';
import { evaluateProposal } from './safety-envelope';
import { buildTaskSpec } from './task-spec';
import type { TradeStore } from './trade-store';

/**
 * Guarded self-optimization: health check, performance analysis, agent
 * proposal, envelope check, apply. Every run that gets the lock ends with
 * exactly one report and exactly one alert, whatever happened before.
 */
@Injectable()
export class OptimizerService {
  private readonly configFile: BotConfigFile;

  constructor(
    @Inject(BOTKEEPER_CONFIG) private readonly config: BotkeeperConfig,
    @Inject(SupervisorService) private readonly supervisor: SupervisorService,
    @Inject(AlertDispatcher) private readonly alerts: AlertDispatcher,
    @Inject(MetricsService) private readonly metrics: MetricsService,
    @Inject(AGENT) private readonly agent: Agent,
    @Inject(TRADE_STORE) private readonly store: TradeStore,
    @Inject(LOCK_FACTORY) private readonly locks: LockFactory,
    @Inject(CLOCK) private readonly clock: Clock,
    @InjectPinoLogger(OptimizerService.name) private readonly logger: PinoLogger,
  ) {
    this.configFile = new BotConfigFile(config.botEnvFile);
  }

  get reportDir(): string {
    return join(this.config.logDir, REPORT_DIR_NAME);
  }

  /** Returns null when another run holds the lock; a skipped tick is not a run. */
  async runCycle(): Promise<OptimizationRun | null> {
    const ttlSeconds = Math.ceil(this.config.optimizer.timeoutMs / 1000) + OPTIMIZER_LOCK_MARGIN_SECONDS;
    const lock = this.locks(OPTIMIZER_LOCK, ttlSeconds);
    if (!(await lock.acquire())) {
      this.logger.info('Optimizer lock held by another run, skipping');
      return null;
    }
    try {
      return await this.execute();
    } finally {
      await lock.release();
    }
  }

  private async execute(): Promise<OptimizationRun> {
    const startedAt = this.clock.now();
    const run: OptimizationRun = {
      id: runStamp(startedAt),
      startedAt,
      finishedAt: null,
      outcome: 'Success',
      agent: this.agent.name,
      phases: [],
      comparison: null,
      summary: null,
      applied: [],
      refusals: [],
      restart: null,
      error: null,
      transcriptPath: null,
      reportPath: null,
    };
    this.logger.info({ runId: run.id, agent: run.agent }, 'Optimization run started');
    const stopTimer = this.metrics.startTimer('optimizer.duration');

    const timeoutMs = this.config.optimizer.timeoutMs;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new OrchestratorTimeoutError(timeoutMs)), timeoutMs);
    const deadline = startedAt.getTime() + timeoutMs;

    let phase: PhaseName = 'health';
    try {
      await this.checkHealth(run, controller.signal);
      phase = 'analysis';
      await this.analyse(run, startedAt, controller.signal);
      phase = 'proposal';
      const changes = await this.propose(run, deadline, controller.signal);
      phase = 'apply';
      if (changes !== null) await this.apply(run, changes, controller.signal);
    } catch (err) {
      run.outcome = 'Failed';
      run.error = errorMessage(err);
      run.phases.push({ name: phase, status: 'failed', detail: run.error });
      this.logger.error({ err: run.error, phase, runId: run.id }, 'Optimization run failed');
    } finally {
      clearTimeout(timer);
    }

    run.finishedAt = this.clock.now();
    try {
      run.reportPath = writeReport(this.reportDir, run);
    } catch (err) {
      this.logger.error({ err, runId: run.id }, 'Failed to write optimization report');
    }
    await this.alerts.send(this.alertFor(run));
    stopTimer();
    this.metrics.increment('optimizer.runs', 1, { outcome: run.outcome });
    this.logger.info({ runId: run.id, outcome: run.outcome, report: run.reportPath }, 'Optimization run finished');
    return run;
  }

  private async checkHealth(run: OptimizationRun, signal: AbortSignal): Promise<void> {
    const state = await this.supervisor.state();
    let processDetail = `process ${state}`;
    if (state !== 'Running' && state !== 'Starting') {
      const started = await this.supervisor.ensureRunning('Bot found down during the optimization health check', {
        notify: false,
      });
      processDetail += started === 'started' ? ', started' : '';
    }
    signal.throwIfAborted();

    const integrity = this.store.checkIntegrity();
    if (!integrity.ok) throw new DataStoreIntegrityError(`Data store check failed: ${integrity.detail}`);
    run.phases.push({ name: 'health', status: 'ok', detail: `${processDetail}; data store ok` });
  }

  private async analyse(run: OptimizationRun, now: Date, signal: AbortSignal): Promise<void> {
    const windows = analysisWindows(now, this.config.optimizer.analysisWindowDays);
    const current = computeMetrics(await this.store.closedBetween(windows.current.start, windows.current.end), windows.current);
    const prior = computeMetrics(await this.store.closedBetween(windows.prior.start, windows.prior.end), windows.prior);
    signal.throwIfAborted();
    run.comparison = comparePerformance(current, prior);
    run.phases.push({
      name: 'analysis',
      status: 'ok',
      detail: `${current.tradeCount} trades in the last ${this.config.optimizer.analysisWindowDays} days (prior: ${prior.tradeCount})`,
    });
  }

  /** Returns the approved changes, or null when the proposal was refused. */
  private async propose(
    run: OptimizationRun,
    deadline: number,
    signal: AbortSignal,
  ): Promise<ChangeProposal[] | null> {
    const currentConfig = this.configFile.read();
    const comparison = run.comparison;
    if (!comparison) throw new Error('analysis phase did not produce metrics');
    const task = buildTaskSpec({ envelope: this.config.envelope, comparison, config: currentConfig });

    const remainingMs = Math.max(1, deadline - this.clock.now().getTime());
    const result = await this.agent.invoke(task, { timeoutMs: remainingMs, signal });
    run.transcriptPath = this.saveTranscript(run, result.transcript, result.exitCode);

    if (signal.aborted || result.timedOut) {
      throw new OrchestratorTimeoutError(this.config.optimizer.timeoutMs);
    }
    if (result.exitCode !== 0) {
      throw new AgentInvocationError(`${this.agent.name} exited with code ${result.exitCode}`);
    }

    const proposal = parseProposal(result.transcript);
    run.summary = proposal.summary || null;
    const verdict = evaluateProposal(proposal.changes, {
      envelope: this.config.envelope,
      botDir: this.config.botDir,
      botEnvFile: this.config.botEnvFile,
      heartbeatPath: this.config.heartbeatPath,
      currentConfig,
      readSource: readFileIfExists,
    });

    if (!verdict.approved) {
      run.outcome = 'Refused';
      run.refusals = verdict.refusals;
      run.phases.push({
        name: 'proposal',
        status: 'ok',
        detail: `${proposal.changes.length} change(s) proposed, refused by the safety envelope`,
      });
      run.phases.push({ name: 'apply', status: 'skipped', detail: 'proposal refused' });
      for (const r of verdict.refusals) {
        this.logger.warn({ change: describeChange(r.change), rule: r.rule, reason: r.reason }, 'Change refused');
      }
      return null;
    }

    run.phases.push({ name: 'proposal', status: 'ok', detail: `${proposal.changes.length} change(s) proposed` });
    return proposal.changes;
  }

  private async apply(
    run: OptimizationRun,
    changes: readonly ChangeProposal[],
    signal: AbortSignal,
  ): Promise<void> {
    if (changes.length === 0) {
      run.phases.push({ name: 'apply', status: 'skipped', detail: 'no changes needed' });
      return;
    }
    signal.throwIfAborted();
    try {
      applyChanges(changes, { botDir: this.config.botDir, configFile: this.configFile }, run.applied);
    } catch (err) {
      // whatever reached the disk must still be picked up by the bot
      if (run.applied.length > 0) await this.restartAfterPartialApply(run);
      throw err;
    }
    run.phases.push({ name: 'apply', status: 'ok', detail: `${run.applied.length} change(s) applied` });
    if (run.applied.length === 0) return;

    const reason = `Applied ${run.applied.length} optimization change(s)`;
    await this.supervisor.restart(reason, { notify: false, respectCooldown: false });
    run.restart = `Bot restarted: ${reason.toLowerCase()}.`;
  }

  private async restartAfterPartialApply(run: OptimizationRun): Promise<void> {
    const reason = `Applied ${run.applied.length} optimization change(s) before a failure`;
    try {
      await this.supervisor.restart(reason, { notify: false, respectCooldown: false });
      run.restart = `Bot restarted: ${reason.toLowerCase()}.`;
    } catch (err) {
      run.restart = `Restart after partial apply failed: ${errorMessage(err)}`;
      this.logger.error({ err: errorMessage(err), runId: run.id }, 'Restart after partial apply failed');
    }
  }

  private saveTranscript(run: OptimizationRun, transcript: string, exitCode: number | null): string | null {
    const path = join(this.config.logDir, `optimizer-${run.id.slice(0, 10)}.log`);
    try {
      mkdirSync(this.config.logDir, { recursive: true });
      appendFileSync(
        path,
        `===== run ${run.id} (${this.agent.name}, exit ${exitCode ?? 'none'}) =====\n${transcript}\n`,
        'utf8',
      );
      return path;
    } catch (err) {
      this.logger.warn({ err, path }, 'Failed to save agent transcript');
      return null;
    }
  }

  private alertFor(run: OptimizationRun): AlertInput {
    const report = run.reportPath ?? 'not written';
    if (run.outcome === 'Failed') {
      return {
        subject: 'Optimization Failed',
        body: [
          `*Error:* ${run.error ?? 'unknown'}`,
          ...(run.applied.length > 0
            ? [`*Applied before the failure:* ${run.applied.map((c) => c.field).join(', ')}`]
            : []),
          ...(run.restart ? [`*Restart:* ${run.restart}`] : []),
          `*Report:* ${report}`,
        ].join('\n'),
        severity: 'Urgent',
      };
    }
    if (run.outcome === 'Refused') {
      const highImpact = run.refusals.some((r) => r.highImpact);
      const rules = [...new Set(run.refusals.map((r) => r.rule))].join(', ');
      return {
        subject: 'Optimization Refused Changes',
        body: `${run.refusals.length} proposed change(s) broke the safety envelope (${rules}); nothing was applied.\n*Report:* ${report}`,
        severity: highImpact ? 'Urgent' : 'Informational',
      };
    }
    const m = run.comparison?.current;
    const perf = m ? `${m.tradeCount} trades, win rate ${m.winRatePct}%, P&L ${m.realizedPnl}` : 'no metrics';
    const changes = run.applied.length === 0 ? 'No changes needed.' : `${run.applied.length} change(s) applied, bot restarted.`;
    return {
      subject: 'Optimization Complete',
      body: `${changes}\n*Last ${this.config.optimizer.analysisWindowDays} days:* ${perf}\n*Report:* ${report}`,
      severity: 'Informational',
    };
  }
}
