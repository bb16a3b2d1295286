import type { CommandRunner } from '@botkeeper/command';
import OpenAI from 'openai';
import { AgentInvocationError, errorMessage } from '../errors';

export interface AgentRunResult {
  exitCode: number | null;
  transcript: string;
  durationMs: number;
  timedOut: boolean;
  /** The caller's signal ended the run. */
  aborted: boolean;
}

export interface AgentInvokeOptions {
  timeoutMs: number;
  signal: AbortSignal;
}

/** Opaque optimization agent: takes the task text, returns what it said. */
export interface Agent {
  readonly name: string;
  invoke(task: string, opts: AgentInvokeOptions): Promise<AgentRunResult>;
}

/** Splits a command line on whitespace, honouring single and double quotes. */
export function splitCommandLine(line: string): string[] {
  const parts: string[] = [];
  const re = /"([^"]*)"|'([^']*)'|(\S+)/g;
  for (const m of line.matchAll(re)) {
    parts.push(m[1] ?? m[2] ?? m[3]);
  }
  return parts;
}

/** Runs a local agent CLI with the task as its final argument, from the bot directory. */
export class CliAgent implements Agent {
  readonly name: string;
  private readonly argv: string[];

  constructor(
    command: string,
    private readonly botDir: string,
    private readonly run: CommandRunner,
  ) {
    this.argv = splitCommandLine(command);
    if (this.argv.length === 0) throw new AgentInvocationError('AGENT_COMMAND is empty');
    this.name = this.argv[0];
  }

  async invoke(task: string, opts: AgentInvokeOptions): Promise<AgentRunResult> {
    const [bin, ...args] = this.argv;
    const result = await this.run(bin, [...args, task], {
      cwd: this.botDir,
      timeoutMs: opts.timeoutMs,
      signal: opts.signal,
    });
    if (result.spawnError) {
      throw new AgentInvocationError(`Could not start ${bin}: ${result.spawnError}`);
    }
    const transcript = result.stderr.trim()
      ? `${result.stdout}\n--- stderr ---\n${result.stderr}`
      : result.stdout;
    return {
      exitCode: result.exitCode,
      transcript,
      durationMs: result.durationMs,
      timedOut: result.timedOut,
      aborted: result.aborted,
    };
  }
}

const SYSTEM_PROMPT =
  'You are a careful quantitative trading engineer. You never bypass risk controls and you answer in the requested format.';

/** Chat-completion agent; it can only propose, never touch files. */
export class OpenAiAgent implements Agent {
  readonly name: string;

  constructor(
    private readonly client: OpenAI,
    private readonly model: string,
  ) {
    this.name = `openai:${model}`;
  }

  async invoke(task: string, opts: AgentInvokeOptions): Promise<AgentRunResult> {
    const startedAt = Date.now();
    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: task },
          ],
        },
        { signal: opts.signal, timeout: opts.timeoutMs, maxRetries: 0 },
      );
      return {
        exitCode: 0,
        transcript: completion.choices[0]?.message?.content ?? '',
        durationMs: Date.now() - startedAt,
        timedOut: false,
        aborted: false,
      };
    } catch (err) {
      const durationMs = Date.now() - startedAt;
      if (opts.signal.aborted) {
        return { exitCode: null, transcript: '', durationMs, timedOut: false, aborted: true };
      }
      if (err instanceof OpenAI.APIConnectionTimeoutError) {
        return { exitCode: null, transcript: '', durationMs, timedOut: true, aborted: false };
      }
      throw new AgentInvocationError(`OpenAI request failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
