import { Provider } from '@nestjs/common';
import { runCommand, type CommandRunner } from '@botkeeper/command';
import { COMMAND_RUNNER } from '../constants';

export const CommandRunnerProvider: Provider<CommandRunner> = {
  provide: COMMAND_RUNNER,
  useValue: runCommand,
};
