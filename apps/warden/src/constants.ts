// ── Injection tokens ─────────────────────────────────────────────────────────
export const BOTKEEPER_CONFIG = Symbol('BOTKEEPER_CONFIG');
export const PROCESS_CONTROL = Symbol('PROCESS_CONTROL');
export const COMMAND_RUNNER = Symbol('COMMAND_RUNNER');
export const LOCK_FACTORY = Symbol('LOCK_FACTORY');
export const SCHEDULER = Symbol('SCHEDULER');
export const AGENT = Symbol('AGENT');
export const TRADE_STORE = Symbol('TRADE_STORE');
export const REDIS = Symbol('REDIS');
export const CLOCK = Symbol('CLOCK');

// ── Lock names ───────────────────────────────────────────────────────────────
export const WATCHDOG_LOCK = 'watchdog';
export const OPTIMIZER_LOCK = 'optimizer';

// ── Schedule labels ──────────────────────────────────────────────────────────
export const SCHEDULE_TAG_PREFIX = 'botkeeper:';
export const WATCHDOG_LABEL = 'watchdog';
export const OPTIMIZER_LABEL = 'optimizer';

// ── Supervisor ───────────────────────────────────────────────────────────────
// Process start/stop calls are bounded by this regardless of configuration.
export const MAX_PROCESS_CALL_MS = 30_000;
export const STATE_POLL_INTERVAL_MS = 1_000;
export const RESTART_RECORD_FILE = 'restart-state.json';

// ── Alerts ───────────────────────────────────────────────────────────────────
export const MAX_ALERT_TIMEOUT_MS = 10_000;
export const ALERT_FALLBACK_FILE = 'alerts.log';

// ── Optimizer ────────────────────────────────────────────────────────────────
export const REPORT_DIR_NAME = 'optimization-reports';
// Slack for the lock TTL past the cycle timeout, so a live run is never reclaimed.
export const OPTIMIZER_LOCK_MARGIN_SECONDS = 300;
