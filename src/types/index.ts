export type { Candle, CandleFeed, PriceBar } from './candle.js';
export type {
  IndicatorFrame,
  IndicatorParams,
  IndicatorResult,
  EnvelopeParams,
} from './indicator.js';
export type { Side, SignalDirection, Trend, StrategyVariant, Signal } from './signal.js';
export type {
  Position,
  Basket,
  BasketLeg,
  PositionPhase,
  ExitTrigger,
  ExitClass,
  ExitDecision,
  ClosedTrade,
  TrailingStep,
} from './position.js';
export type {
  MarketMeta,
  PositionSizing,
  LadderTier,
  RiskCheck,
  DailyStats,
  DailyTradeRecord,
} from './risk.js';
export type {
  VenueErrorKind,
  VenueError,
  VenueResult,
  VenuePosition,
  Equity,
  OrderRequest,
  OrderFill,
} from './venue.js';
export type {
  EventType,
  TradingEvent,
  PositionOpenedEvent,
  PositionClosedEvent,
  StepAdvancedEvent,
  LegAddedEvent,
  LockEvent,
  HaltedEvent,
  StateCorrectedEvent,
  DayRolloverEvent,
} from './event.js';
export type { TradeRecord, BacktestReport, EquityPoint } from './report.js';
