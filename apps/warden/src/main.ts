import 'reflect-metadata';
import 'dotenv/config';
import { bootstrapWorker } from '@botkeeper/worker-core';
import { AppModule } from './app.module';
import { createCliProgram, type CliRuntime } from './cli/program';
import { ExitCode } from './cli/exit-codes';
import type { CommandIo } from './cli/commands';
import { loadConfig, type BotkeeperConfig } from './config/botkeeper-config';
import { errorMessage } from './errors';
import { version } from '../package.json';

const io: CommandIo = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
};

function configOrNull(): BotkeeperConfig | null {
  try {
    return loadConfig();
  } catch (err) {
    io.err(errorMessage(err));
    process.exitCode = ExitCode.Error;
    return null;
  }
}

const runtime: CliRuntime = {
  io,
  async run(handler) {
    const config = configOrNull();
    if (!config) return;
    const app = await bootstrapWorker({ module: AppModule.register(config) });
    try {
      process.exitCode = await handler(app);
    } finally {
      await app.close();
    }
  },
  async serve(handler) {
    const config = configOrNull();
    if (!config) return;
    // shutdown hooks close the context (and stop the timers) on SIGTERM/SIGINT
    const app = await bootstrapWorker({ module: AppModule.register(config) });
    handler(app);
  },
};

createCliProgram({ version, runtime })
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    io.err(errorMessage(err));
    process.exitCode = ExitCode.Error;
  });
