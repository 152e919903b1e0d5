#!/usr/bin/env node
import { config, assertLiveCredentials, parseModeArg, ConfigError, type AppConfig } from './config.js';
import { createChildLogger } from './logger.js';
import { getDb, closeDb } from './db/database.js';
import { CcxtVenue } from './exchange/okx/ccxt-venue.js';
import { PaperVenue } from './exchange/paper-venue.js';
import { systemClock, describeError } from './exchange/venue.js';
import type { Venue } from './exchange/venue.js';
import { IndicatorEngine } from './indicators/engine.js';
import { createStrategy } from './strategy/index.js';
import { DailyAccounting } from './risk/daily-accounting.js';
import { SqliteDailyStatStore } from './store/daily-stat-store.js';
import { TradeJournal } from './store/trade-journal.js';
import { AuditLog } from './safety/audit-log.js';
import { OrderExecutor } from './execution/order-executor.js';
import { EventBus } from './engine/event-bus.js';
import { TradingEngine } from './engine/trading-engine.js';
import { TickScheduler, startDailyReportSchedule } from './engine/scheduler.js';
import { runBacktest } from './engine/backtest-runner.js';
import { TelegramSink } from './notification/telegram.js';
import { Notifier } from './notification/notifier.js';
import { loadCsv } from './data/csv-loader.js';
import { formatReport } from './report/formatter.js';

const log = createChildLogger('main');

async function runBacktestMode(cfg: AppConfig): Promise<void> {
  const candles = loadCsv(cfg.backtest.csvPath);
  log.info({ file: cfg.backtest.csvPath, bars: candles.length }, 'Backtest candles loaded');
  const { report } = await runBacktest(candles, cfg);
  console.log(formatReport(report));
}

async function runTrading(mode: 'LIVE' | 'PAPER', cfg: AppConfig): Promise<void> {
  if (mode === 'LIVE') assertLiveCredentials(cfg);

  // ── 저장소 ──
  const db = getDb();
  const audit = new AuditLog(db, mode);
  const journal = new TradeJournal(db, mode);
  const statStore = new SqliteDailyStatStore(db);

  // ── 알림 ──
  const sink = cfg.telegram.enabled && cfg.telegram.botToken && cfg.telegram.chatId
    ? new TelegramSink(cfg.telegram.botToken, cfg.telegram.chatId, { timeoutMs: cfg.execution.ioTimeoutMs })
    : null;
  const notifier = new Notifier(sink, cfg.okx.symbol);

  // ── 거래소 (PAPER는 시세만 OKX, 주문은 모의) ──
  const okx = new CcxtVenue({
    apiKey: cfg.okx.apiKey,
    secret: cfg.okx.secret,
    password: cfg.okx.password,
    symbol: cfg.okx.symbol,
    timeframe: cfg.market.timeframe,
    leverage: cfg.okx.leverage,
    marginMode: cfg.okx.marginMode,
    sandbox: cfg.okx.sandbox,
    timeoutMs: cfg.execution.ioTimeoutMs,
  });
  const connected = await okx.connect();
  if (!connected.ok) {
    throw new ConfigError([`venue connect failed: ${describeError(connected.error)}`]);
  }
  const metaRes = okx.marketMeta();
  if (!metaRes.ok) {
    throw new ConfigError([`market metadata: ${metaRes.error.message}`]);
  }
  const meta = metaRes.value;

  const venue: Venue = mode === 'LIVE'
    ? okx
    : new PaperVenue(okx, {
        initialEquity: cfg.paper.initialEquity,
        feeRate: cfg.paper.feeRate,
        leverage: cfg.okx.leverage,
        meta,
      });

  // ── 엔진 ──
  const bus = new EventBus();
  audit.attach(bus);
  journal.attach(bus);
  notifier.attach(bus);

  const accounting = new DailyAccounting(cfg.risk, systemClock.now(), statStore);
  const engine = new TradingEngine(
    {
      historyBars: cfg.market.historyBars,
      leverage: cfg.okx.leverage,
      position: cfg.position,
      sizing: cfg.sizing,
      priceSource: 'ticker',
    },
    {
      venue,
      meta,
      indicators: new IndicatorEngine(cfg.indicators),
      strategy: createStrategy(cfg.strategy),
      accounting,
      executor: new OrderExecutor(venue, meta, cfg.execution, systemClock),
      bus,
      clock: systemClock,
    },
  );

  const reconciled = await engine.reconcile();
  if (reconciled) {
    log.warn({ reason: reconciled.reason }, 'Startup reconcile failed — will retry on first cycle');
  }

  const scheduler = new TickScheduler(engine, systemClock, cfg.execution.loopMs);
  const reportTask = startDailyReportSchedule(
    cfg.report.dailyHour,
    cfg.report.dailyMinute,
    cfg.risk.timeZone,
    () => notifier.notifyDailyReport(accounting.snapshot()),
  );

  // ── 종료: 다음 사이클 경계에서 반영 ──
  const requestStop = (signal: string): void => {
    log.info({ signal }, 'Shutdown signal');
    scheduler.requestStop();
  };
  process.once('SIGINT', () => requestStop('SIGINT'));
  process.once('SIGTERM', () => requestStop('SIGTERM'));

  audit.info('main', 'BOT_STARTED', `mode=${mode} symbol=${cfg.okx.symbol}`);
  notifier.notifyStartup(mode);
  log.info({ mode, symbol: cfg.okx.symbol, strategy: cfg.strategy.variant, sizing: cfg.sizing.policy }, 'Trading loop started');

  try {
    await scheduler.run();
  } finally {
    reportTask.stop();
    audit.info('main', 'BOT_STOPPED');
    notifier.notifyShutdown();
    await sink?.flush();
    closeDb();
  }
}

async function main(): Promise<void> {
  const mode = parseModeArg(process.argv, config.mode);
  log.info({ mode }, 'Starting');

  if (mode === 'BACKTEST') {
    await runBacktestMode(config);
    return;
  }
  await runTrading(mode, config);
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    log.fatal({ issues: err.issues }, 'Configuration error — aborting');
  } else {
    log.fatal({ err }, 'Fatal error');
  }
  process.exit(1);
});
