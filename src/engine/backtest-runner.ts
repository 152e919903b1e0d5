import { createChildLogger } from '../logger.js';
import type { AppConfig } from '../config.js';
import type { BacktestReport, Candle, EquityPoint, MarketMeta, TradeRecord } from '../types/index.js';
import { ManualClock } from '../exchange/venue.js';
import { PaperVenue } from '../exchange/paper-venue.js';
import { ReplayMarket } from '../data/replay-market.js';
import { IndicatorEngine } from '../indicators/engine.js';
import { createStrategy } from '../strategy/index.js';
import { DailyAccounting } from '../risk/daily-accounting.js';
import { MemoryDailyStatStore } from '../store/daily-stat-store.js';
import { OrderExecutor } from '../execution/order-executor.js';
import { buildReport } from '../report/metrics.js';
import { toTradeRecord } from '../report/trade-log.js';
import { EventBus } from './event-bus.js';
import { TradingEngine } from './trading-engine.js';
import type { CycleStatus } from './trading-engine.js';

const log = createChildLogger('backtest');

export type BacktestSettings = Pick<
  AppConfig,
  'okx' | 'market' | 'indicators' | 'strategy' | 'position' | 'sizing' | 'risk' | 'execution' | 'paper'
>;

export interface BacktestOptions {
  readonly meta: MarketMeta;
  readonly slippageBps: number;
}

/** BTC-USDT-SWAP 기본 계약 사양 */
export const DEFAULT_BACKTEST_META: MarketMeta = {
  tickSize: 0.1,
  qtyStep: 0.01,
  minQty: 0.01,
  contractSize: 0.01,
};

export interface BacktestResult {
  readonly report: BacktestReport;
  /** 사이클 상태별 횟수 */
  readonly statusCounts: Readonly<Partial<Record<CycleStatus, number>>>;
}

/**
 * 과거 캔들 리플레이: 라이브와 같은 TradingEngine + PaperVenue + 수동 시계
 * 봉 i 처리 시 마감봉 0..i-1로 시그널, 봉 i의 고가/저가로 스톱 판정, 종가로 진입
 */
export async function runBacktest(
  candles: readonly Candle[],
  settings: BacktestSettings,
  options?: Partial<BacktestOptions>,
): Promise<BacktestResult> {
  const meta = options?.meta ?? DEFAULT_BACKTEST_META;
  const first = candles[0];
  const clock = new ManualClock(first?.timestamp ?? 0);
  const market = new ReplayMarket(candles);
  const venue = new PaperVenue(
    market,
    {
      initialEquity: settings.paper.initialEquity,
      feeRate: settings.paper.feeRate,
      slippageBps: options?.slippageBps ?? 0,
      leverage: settings.okx.leverage,
      meta,
    },
    clock,
  );

  const bus = new EventBus();
  const trades: TradeRecord[] = [];
  bus.on('POSITION_CLOSED', (event) => {
    if (event.type === 'POSITION_CLOSED') trades.push(toTradeRecord(event.trade));
  });

  const executor = new OrderExecutor(venue, meta, settings.execution, clock);
  const engine = new TradingEngine(
    {
      historyBars: settings.market.historyBars,
      leverage: settings.okx.leverage,
      position: settings.position,
      sizing: settings.sizing,
      priceSource: 'forming_candle',
    },
    {
      venue,
      meta,
      indicators: new IndicatorEngine(settings.indicators),
      strategy: createStrategy(settings.strategy),
      accounting: new DailyAccounting(settings.risk, clock.now(), new MemoryDailyStatStore()),
      executor,
      bus,
      clock,
    },
  );

  const equityCurve: EquityPoint[] = [];
  const statusCounts: Partial<Record<CycleStatus, number>> = {};

  for (let i = 0; i < candles.length; i++) {
    const candle = candles[i];
    if (!candle) continue;
    market.seek(i);
    clock.set(candle.timestamp);
    venue.mark(candle.close);

    const result = await engine.runCycle();
    statusCounts[result.status] = (statusCounts[result.status] ?? 0) + 1;
    equityCurve.push({ timestamp: candle.timestamp, equity: venue.equity(candle.close).total });
  }

  // 미청산 포지션 마지막 봉 close로 강제 청산
  const last = candles[candles.length - 1];
  if (last && engine.state.machine.isOpen()) {
    await engine.closeOpenPosition(last.close, last.timestamp);
    equityCurve.push({ timestamp: last.timestamp, equity: venue.equity(last.close).total });
  }

  const endEquity = venue.equity().total;
  const report = buildReport(trades, equityCurve, settings.paper.initialEquity, endEquity);
  log.info(
    { bars: candles.length, trades: report.totalTrades, endEquity, fees: venue.totalFees },
    'Backtest finished',
  );
  return { report, statusCounts };
}
