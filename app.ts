import { createServer, Server } from 'http';
import express from 'express';
import { config } from 'dotenv';

// Load environment variables
config();

import logger from './src/utils/logger';
import { TradingConfigManager } from './src/config/settings';
import { createExpressApp } from './src/http/createExpressApp';
import { BotManager } from './src/services/trading/BotManager';
import { BacktestService } from './src/services/backtest/BacktestService';
import { BinanceFuturesMarketData } from './src/services/market/BinanceFuturesMarketData';
import { LedgerRepository } from './src/services/ledger/LedgerRepository';
import { InMemoryLedgerRepository } from './src/services/ledger/InMemoryLedgerRepository';
import { SupabaseLedgerRepository } from './src/services/database/SupabaseLedgerRepository';
import { InMemoryRunStateStore, RunStateStore, StateManager } from './src/services/trading/StateManager';

class App {
  private app: express.Application;
  private server: Server;
  private botManager: BotManager;
  private stateStore: RunStateStore;
  private stateManager: StateManager | null = null;

  constructor(private readonly configManager: TradingConfigManager) {
    const infrastructure = configManager.getInfrastructureSettings();

    const marketData = new BinanceFuturesMarketData({
      baseUrl: infrastructure.binanceBaseUrl,
      timeoutMs: infrastructure.requestTimeoutMs,
      retry: infrastructure.retry,
    });

    let repository: LedgerRepository;
    if (infrastructure.supabase) {
      repository = new SupabaseLedgerRepository(infrastructure.supabase);
    } else {
      logger.warn('Supabase not configured - ledger is kept in memory and lost on restart');
      repository = new InMemoryLedgerRepository();
    }

    if (infrastructure.redis) {
      this.stateManager = new StateManager(infrastructure.redis);
      this.stateStore = this.stateManager;
    } else {
      logger.warn('Redis not configured - run state is kept in memory');
      this.stateStore = new InMemoryRunStateStore();
    }

    this.botManager = new BotManager({
      repository,
      marketData,
      stateStore: this.stateStore,
      engineSettings: configManager.getEngineSettings(),
      botSettings: configManager.getBotSettings(),
    });

    this.app = createExpressApp({
      botManager: this.botManager,
      backtestService: new BacktestService(),
      historySource: marketData,
      services: {
        ledger: infrastructure.supabase ? 'supabase' : 'memory',
        runState: infrastructure.redis ? 'redis' : 'memory',
      },
    });
    this.server = createServer(this.app);
  }

  public async start(): Promise<void> {
    if (this.stateManager) {
      await this.stateManager.initialize();
    }

    const { port } = this.configManager.getInfrastructureSettings();
    return new Promise((resolve) => {
      this.server.listen(port, () => {
        logger.info(`Paper trading API listening on port ${port}`);
        logger.info(`API available at http://localhost:${port}/api/v1`);
        resolve();
      });
    });
  }

  public async stop(): Promise<void> {
    logger.info('Shutting down server...');

    // Runs end as STOPPED_BY_SIGNAL with their final summaries
    await this.botManager.stopAll('signal');
    await this.stateStore.close();

    return new Promise((resolve, reject) => {
      this.server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        logger.info('Server shutdown complete');
        resolve();
      });
    });
  }
}

// Start the application
const app = new App(TradingConfigManager.getInstance());

app.start().catch((error) => {
  logger.error('Failed to start server:', error);
  process.exit(1);
});

// Handle graceful shutdown
let shuttingDown = false;

const shutdown = (signal: string) => {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info(`Received ${signal}, shutting down gracefully...`);

  app
    .stop()
    .then(() => process.exit(0))
    .catch((error) => {
      logger.error('Shutdown failed:', error);
      process.exit(1);
    });
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
