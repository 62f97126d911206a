import express from 'express';
import { createExpressApp } from '../../http/createExpressApp';
import { BotManager } from '../../services/trading/BotManager';
import { BacktestService } from '../../services/backtest/BacktestService';
import { InMemoryLedgerRepository } from '../../services/ledger/InMemoryLedgerRepository';
import { InMemoryRunStateStore } from '../../services/trading/StateManager';
import { DEFAULT_BOT_SETTINGS, DEFAULT_ENGINE_SETTINGS } from '../../config/settings';
import { MarketDataSource } from '../../services/market/MarketDataSource';
import { HistoricalBarSource } from '../../controllers/BacktestController';
import { FakeMarketData } from './fakes';

export interface TestAppContext {
  app: express.Application;
  botManager: BotManager;
  repository: InMemoryLedgerRepository;
  stateStore: InMemoryRunStateStore;
  marketData: MarketDataSource;
}

export function createTestApp(
  options: { marketData?: MarketDataSource; historySource?: HistoricalBarSource } = {}
): TestAppContext {
  const repository = new InMemoryLedgerRepository();
  const stateStore = new InMemoryRunStateStore();
  const marketData = options.marketData ?? new FakeMarketData({ BTCUSDT: 100 });

  const botManager = new BotManager({
    repository,
    marketData,
    stateStore,
    engineSettings: { ...DEFAULT_ENGINE_SETTINGS, accountName: 'test-account' },
    botSettings: { ...DEFAULT_BOT_SETTINGS, pollIntervalMs: 1000 },
  });

  const app = createExpressApp({
    botManager,
    backtestService: new BacktestService(),
    historySource: options.historySource,
  });

  return { app, botManager, repository, stateStore, marketData };
}
