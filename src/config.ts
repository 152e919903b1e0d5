import dotenv from 'dotenv';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { isValidTimeZone } from './utils/time.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// 프로젝트 루트 .env 먼저, cwd의 .env가 있으면 그걸로 덮어씀
dotenv.config({ path: path.join(__dirname, '..', '.env') });
dotenv.config();

function env(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function envNum(key: string, fallback: number): number {
  const v = process.env[key];
  return v !== undefined ? Number(v) : fallback;
}

function envBool(key: string, fallback: boolean): boolean {
  const v = process.env[key];
  return v !== undefined ? v === 'true' : fallback;
}

/** JSON 문자열 환경변수 (사다리 구간표, 트레일링 단계표) */
function envJson(key: string, fallback: unknown): unknown {
  const v = process.env[key];
  if (v === undefined) return fallback;
  try {
    return JSON.parse(v) as unknown;
  } catch {
    throw new ConfigError([`${key}: invalid JSON`]);
  }
}

/**
 * 기동 시 치명적 설정 오류: 틱 루프 진입 전에 중단
 */
export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

const positive = z.number().finite().positive();
const nonNegative = z.number().finite().min(0);
const fraction = z.number().finite().gt(0).max(1);
const period = z.number().int().min(1);

export const ladderTierSchema = z.object({
  /** 이 구간이 적용되는 최소 자본 (quote) */
  minEquity: nonNegative,
  /** 1레그당 명목가 (quote) */
  legNotional: positive,
  maxLegs: z.number().int().min(1),
});

export const ladderTiersSchema = z
  .array(ladderTierSchema)
  .min(1)
  .superRefine((tiers, ctx) => {
    for (let i = 1; i < tiers.length; i++) {
      const prev = tiers[i - 1];
      const cur = tiers[i];
      if (!prev || !cur) continue;
      if (cur.minEquity <= prev.minEquity) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, 'minEquity'], message: 'tiers must be ascending by minEquity' });
      }
      if (cur.legNotional < prev.legNotional || cur.maxLegs < prev.maxLegs) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i], message: 'legNotional/maxLegs must be non-decreasing' });
      }
    }
  });

export const trailingStepSchema = z.object({
  /** 진입가 대비 유리한 방향 이동 폭 (가격 포인트) */
  trigger: positive,
  /** 단계 도달 시 손절가 = 진입가 ± offset (양수 = 이익 방향) */
  offset: z.number().finite(),
});

export const trailingStepsSchema = z
  .array(trailingStepSchema)
  .superRefine((steps, ctx) => {
    for (let i = 1; i < steps.length; i++) {
      const prev = steps[i - 1];
      const cur = steps[i];
      if (prev && cur && cur.trigger <= prev.trigger) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, 'trigger'], message: 'triggers must be strictly increasing' });
      }
    }
  });

export const configSchema = z.object({
  mode: z.enum(['BACKTEST', 'PAPER', 'LIVE']),

  okx: z.object({
    apiKey: z.string(),
    secret: z.string(),
    password: z.string(),
    /** ccxt 통합 심볼 (OKX BTC-USDT-SWAP) */
    symbol: z.string().min(1),
    leverage: z.number().int().min(1).max(125),
    marginMode: z.enum(['isolated', 'cross']),
    sandbox: z.boolean(),
  }),

  market: z.object({
    timeframe: z.string().min(1),
    /** 한 번에 가져올 캔들 수 (envelope window + 여유) */
    historyBars: period,
  }),

  indicators: z.object({
    emaFast: period,
    emaSlow: period,
    /** 0이면 미사용 */
    emaTrend: z.number().int().min(0),
    atrPeriod: period,
    envelope: z.object({
      bandwidth: positive,
      multiplier: positive,
      /** 0이면 envelope 미사용 */
      window: z.number().int().min(0),
    }),
    /** envelope를 계산할 최근 봉 수 (non-repaint, 봉마다 window 전체 계산) */
    envelopeBars: period,
  }),

  strategy: z.object({
    variant: z.enum(['crossover', 'envelope_touch', 'extension_reversion']),
    trendMargin: nonNegative,
    crossThreshold: nonNegative,
    crossTrendFilter: z.boolean(),
    extensionFactor: positive,
    regime: z.object({
      enabled: z.boolean(),
      gapCap: positive,
      atrMinPct: nonNegative,
      atrMaxPct: positive,
      slopeCap: positive,
    }),
  }),

  position: z.object({
    /** 고정 손절 거리 (가격 포인트) */
    stopPoints: positive,
    trailingSteps: trailingStepsSchema,
    /** 청산 후 신규 진입까지 대기할 마감봉 수 */
    cooldownBars: z.number().int().min(0),
    lockAfterStopLoss: z.boolean(),
    closeOnTrendFlip: z.boolean(),
    envelopeTarget: z.boolean(),
  }),

  sizing: z.object({
    policy: z.enum(['risk_fraction', 'margin_fraction', 'ladder']),
    riskFraction: fraction,
    marginFraction: fraction,
    ladderTiers: ladderTiersSchema,
    basketTargetFraction: positive,
    basketStopFraction: positive,
  }),

  risk: z.object({
    lossStreakHalt: z.number().int().min(1),
    /** 일일 롤오버 기준 타임존 (IANA) */
    timeZone: z.string().min(1).refine(isValidTimeZone, 'unknown IANA time zone'),
  }),

  execution: z.object({
    loopMs: z.number().int().min(100),
    ioTimeoutMs: z.number().int().min(100),
    transientRetries: z.number().int().min(0),
    transientBackoffMs: z.number().int().min(0),
    closeConfirmRetries: z.number().int().min(1),
    closeConfirmIntervalMs: z.number().int().min(0),
  }),

  report: z.object({
    dailyHour: z.number().int().min(0).max(23),
    dailyMinute: z.number().int().min(0).max(59),
  }),

  paper: z.object({
    initialEquity: positive,
    feeRate: nonNegative,
  }),

  backtest: z.object({
    csvPath: z.string(),
  }),

  db: z.object({
    path: z.string().min(1),
  }),

  log: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
  }),

  telegram: z.object({
    enabled: z.boolean(),
    botToken: z.string(),
    chatId: z.string(),
  }),
});

export type AppConfig = z.infer<typeof configSchema>;
export type TradingMode = AppConfig['mode'];

const DEFAULT_LADDER = [
  { minEquity: 0, legNotional: 15, maxLegs: 2 },
  { minEquity: 200, legNotional: 30, maxLegs: 3 },
  { minEquity: 1000, legNotional: 100, maxLegs: 4 },
];

const DEFAULT_TRAILING_STEPS = [
  { trigger: 400, offset: 0 },
  { trigger: 800, offset: 400 },
];

/**
 * 환경변수 → 검증 전 설정 객체
 * 모드는 TRADING_MODE: MODE는 테스트 러너가 덮어씀
 */
export function readEnv(): Record<string, unknown> {
  return {
    mode: env('TRADING_MODE', 'PAPER').toUpperCase(),

    okx: {
      apiKey: env('OKX_API_KEY', ''),
      secret: env('OKX_SECRET', ''),
      password: env('OKX_PASSWORD', ''),
      symbol: env('SYMBOL', 'BTC/USDT:USDT'),
      leverage: envNum('LEVERAGE', 15),
      marginMode: env('MARGIN_MODE', 'isolated'),
      sandbox: envBool('OKX_SANDBOX', false),
    },

    market: {
      timeframe: env('TIMEFRAME', '15m'),
      historyBars: envNum('HISTORY_BARS', 505),
    },

    indicators: {
      emaFast: envNum('EMA_FAST', 50),
      emaSlow: envNum('EMA_SLOW', 100),
      emaTrend: envNum('EMA_TREND', 0),
      atrPeriod: envNum('ATR_PERIOD', 14),
      envelope: {
        bandwidth: envNum('NW_BANDWIDTH', 8),
        multiplier: envNum('NW_MULT', 3),
        window: envNum('NW_LOOKBACK', 500),
      },
      envelopeBars: envNum('NW_RECENT_BARS', 2),
    },

    strategy: {
      variant: env('STRATEGY_VARIANT', 'envelope_touch'),
      trendMargin: envNum('TREND_MARGIN', 0),
      crossThreshold: envNum('CROSS_THRESHOLD', 0),
      crossTrendFilter: envBool('CROSS_TREND_FILTER', false),
      extensionFactor: envNum('EXTENSION_FACTOR', 1.5),
      regime: {
        enabled: envBool('REGIME_FILTER', false),
        gapCap: envNum('REGIME_GAP_CAP', 0.003),
        atrMinPct: envNum('REGIME_ATR_MIN_PCT', 0.0005),
        atrMaxPct: envNum('REGIME_ATR_MAX_PCT', 0.02),
        slopeCap: envNum('REGIME_SLOPE_CAP', 0.001),
      },
    },

    position: {
      stopPoints: envNum('SL_POINTS', 300),
      trailingSteps: envJson('TRAILING_STEPS', DEFAULT_TRAILING_STEPS),
      cooldownBars: envNum('COOLDOWN_BARS', 0),
      lockAfterStopLoss: envBool('SL_LOCK', true),
      closeOnTrendFlip: envBool('TREND_FLIP_CLOSE', true),
      envelopeTarget: envBool('ENVELOPE_TARGET', true),
    },

    sizing: {
      policy: env('SIZING_POLICY', 'margin_fraction'),
      riskFraction: envNum('RISK_FRACTION', 0.01),
      marginFraction: envNum('POSITION_MARGIN_FRACTION', 0.8),
      ladderTiers: envJson('LADDER_TIERS', DEFAULT_LADDER),
      basketTargetFraction: envNum('BASKET_TARGET_FRACTION', 0.02),
      basketStopFraction: envNum('BASKET_STOP_FRACTION', 0.05),
    },

    risk: {
      lossStreakHalt: envNum('LOSS_STREAK_HALT', 3),
      timeZone: env('TRADING_TIME_ZONE', 'UTC'),
    },

    execution: {
      loopMs: envNum('LOOP_MS', 3000),
      ioTimeoutMs: envNum('IO_TIMEOUT_MS', 10_000),
      transientRetries: envNum('TRANSIENT_RETRIES', 2),
      transientBackoffMs: envNum('TRANSIENT_BACKOFF_MS', 1000),
      closeConfirmRetries: envNum('CLOSE_CONFIRM_RETRIES', 10),
      closeConfirmIntervalMs: envNum('CLOSE_CONFIRM_INTERVAL_MS', 300),
    },

    report: {
      dailyHour: envNum('DAILY_REPORT_HH', 23),
      dailyMinute: envNum('DAILY_REPORT_MM', 59),
    },

    paper: {
      initialEquity: envNum('PAPER_INITIAL_EQUITY', 1000),
      feeRate: envNum('PAPER_FEE_RATE', 0.0005),
    },

    backtest: {
      csvPath: env('BACKTEST_CSV', './data/candles.csv'),
    },

    db: {
      path: env('DB_PATH', './data/trading.db'),
    },

    log: {
      level: env('LOG_LEVEL', 'info'),
    },

    telegram: {
      enabled: envBool('TELEGRAM_ENABLED', false),
      botToken: env('TELEGRAM_BOT_TOKEN', ''),
      chatId: env('TELEGRAM_CHAT_ID', ''),
    },
  };
}

/**
 * zod 검증: 실패 시 경로별 사유를 모아 ConfigError
 */
export function parseConfig(raw: unknown): AppConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  const cfg = result.data;
  if (cfg.indicators.emaFast >= cfg.indicators.emaSlow) {
    throw new ConfigError(['indicators.emaFast: must be shorter than emaSlow']);
  }
  if ((cfg.strategy.regime.enabled || cfg.strategy.crossTrendFilter) && cfg.indicators.emaTrend === 0) {
    throw new ConfigError(['indicators.emaTrend: required by regime filter / cross trend filter']);
  }
  if (cfg.strategy.variant === 'envelope_touch' && cfg.indicators.envelope.window === 0) {
    throw new ConfigError(['indicators.envelope.window: required by envelope_touch']);
  }
  if (cfg.strategy.regime.atrMinPct > cfg.strategy.regime.atrMaxPct) {
    throw new ConfigError(['strategy.regime.atrMinPct: must not exceed atrMaxPct']);
  }
  return cfg;
}

/** LIVE 모드는 OKX 키 3종 필수 */
export function assertLiveCredentials(cfg: AppConfig): void {
  const missing: string[] = [];
  if (!cfg.okx.apiKey) missing.push('OKX_API_KEY');
  if (!cfg.okx.secret) missing.push('OKX_SECRET');
  if (!cfg.okx.password) missing.push('OKX_PASSWORD');
  if (missing.length > 0) {
    throw new ConfigError(missing.map((k) => `${k}: required in LIVE mode`));
  }
}

/** --mode 인자 (없으면 fallback) */
export function parseModeArg(argv: readonly string[], fallback: TradingMode): TradingMode {
  const idx = argv.indexOf('--mode');
  const raw = idx !== -1 ? argv[idx + 1] : undefined;
  if (raw === undefined) return fallback;
  const m = raw.toUpperCase();
  if (m === 'PAPER' || m === 'LIVE' || m === 'BACKTEST') return m;
  throw new ConfigError([`--mode: unknown mode ${raw}`]);
}

export const config: AppConfig = parseConfig(readEnv());
