import { Inject, Module, OnApplicationShutdown, Provider } from '@nestjs/common';
import OpenAI from 'openai';
import type { CommandRunner } from '@botkeeper/command';
import { createDb } from '@botkeeper/db';
import { AlertsModule } from '../alerts/alerts.module';
import type { BotkeeperConfig } from '../config/botkeeper-config';
import { AGENT, BOTKEEPER_CONFIG, COMMAND_RUNNER, TRADE_STORE } from '../constants';
import { ConfigError } from '../errors';
import { SupervisorModule } from '../supervisor/supervisor.module';
import { CliAgent, OpenAiAgent, type Agent } from './agent';
import { OptimizerService } from './optimizer.service';
import { DrizzleTradeStore, type TradeStore } from './trade-store';

const AgentProvider: Provider<Agent> = {
  provide: AGENT,
  inject: [BOTKEEPER_CONFIG, COMMAND_RUNNER],
  useFactory: (config: BotkeeperConfig, run: CommandRunner): Agent => {
    const { optimizer } = config;
    if (optimizer.agent === 'openai') {
      if (!optimizer.openaiApiKey) throw new ConfigError('OPENAI_API_KEY must be set when AGENT=openai');
      const client = new OpenAI({ apiKey: optimizer.openaiApiKey, baseURL: optimizer.openaiBaseUrl });
      return new OpenAiAgent(client, optimizer.openaiModel);
    }
    return new CliAgent(optimizer.agentCommand, config.botDir, run);
  },
};

const TradeStoreProvider: Provider<TradeStore> = {
  provide: TRADE_STORE,
  inject: [BOTKEEPER_CONFIG],
  useFactory: (config: BotkeeperConfig) => new DrizzleTradeStore(() => createDb(config.databaseUrl)),
};

@Module({
  imports: [AlertsModule, SupervisorModule],
  providers: [AgentProvider, TradeStoreProvider, OptimizerService],
  exports: [OptimizerService],
})
export class OptimizerModule implements OnApplicationShutdown {
  constructor(@Inject(TRADE_STORE) private readonly store: TradeStore) {}

  onApplicationShutdown() {
    this.store.close();
  }
}
