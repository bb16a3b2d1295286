/** Base class for failures that map to a known exit code or alert. */
export class BotkeeperError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The target process could not be started or stopped. */
export class ProcessControlError extends BotkeeperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PROCESS_CONTROL', message, options);
  }
}

export class OrchestratorTimeoutError extends BotkeeperError {
  constructor(readonly timeoutMs: number) {
    const limit = timeoutMs >= 60_000 ? `${Math.round(timeoutMs / 60_000)} minute` : `${timeoutMs}ms`;
    super('ORCHESTRATOR_TIMEOUT', `Optimization cycle exceeded its ${limit} timeout`);
  }
}

export class AgentInvocationError extends BotkeeperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('AGENT_INVOCATION', message, options);
  }
}

export class ProposalParseError extends BotkeeperError {
  constructor(message: string) {
    super('PROPOSAL_PARSE', message);
  }
}

export class DataStoreIntegrityError extends BotkeeperError {
  constructor(message: string) {
    super('DATA_STORE_INTEGRITY', message);
  }
}

/** An approved change could not be applied to the bot directory. */
export class ChangeApplyError extends BotkeeperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CHANGE_APPLY', message, options);
  }
}

export class ConfigError extends BotkeeperError {
  constructor(message: string) {
    super('CONFIG', message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
