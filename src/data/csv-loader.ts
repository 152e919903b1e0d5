import { readFileSync } from 'node:fs';
import type { Candle } from '../types/index.js';

/** 헤더 이름 후보 (소문자) */
const COLUMN_ALIASES = {
  timestamp: ['timestamp', 'ts', 'time', 'datetime', 'date', 'open_time'],
  open: ['open', 'o'],
  high: ['high', 'h'],
  low: ['low', 'l'],
  close: ['close', 'c'],
  volume: ['volume', 'vol', 'v'],
} as const;

type PriceColumn = Exclude<keyof typeof COLUMN_ALIASES, 'volume'>;

interface ColumnMap extends Record<PriceColumn, number> {
  readonly volume: number | undefined;
}

/** 헤더 없는 파일: ccxt fetchOHLCV 행 순서 [ts, o, h, l, c, v] */
const OHLCV_ORDER: ColumnMap = { timestamp: 0, open: 1, high: 2, low: 3, close: 4, volume: 5 };

/** 초/밀리초 epoch 또는 ISO 문자열 → ms. 해석 불가면 undefined */
function toEpochMs(value: string): number | undefined {
  if (value === '') return undefined;
  const num = Number(value);
  if (Number.isFinite(num)) {
    // 1e11 미만은 초 단위
    return num < 1e11 ? num * 1000 : num;
  }
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? undefined : ms;
}

function splitRow(line: string): string[] {
  return line.split(',').map((f) => f.trim().replace(/^"(.*)"$/, '$1'));
}

function resolveHeader(header: readonly string[]): ColumnMap {
  const lower = header.map((h) => h.toLowerCase());
  const find = (col: keyof typeof COLUMN_ALIASES): number | undefined => {
    for (const alias of COLUMN_ALIASES[col]) {
      const idx = lower.indexOf(alias);
      if (idx !== -1) return idx;
    }
    return undefined;
  };

  const need = (col: PriceColumn): number => {
    const idx = find(col);
    if (idx === undefined) {
      throw new Error(`Column "${col}" not found. Available: ${lower.join(', ')}`);
    }
    return idx;
  };
  return {
    timestamp: need('timestamp'),
    open: need('open'),
    high: need('high'),
    low: need('low'),
    close: need('close'),
    volume: find('volume'),
  };
}

/** 빈 칸은 NaN */
function numberAt(fields: readonly string[], idx: number): number {
  const v = fields[idx];
  return v === undefined || v === '' ? Number.NaN : Number(v);
}

function toCandle(fields: readonly string[], cols: ColumnMap, lineNum: number): Candle {
  const rawTs = fields[cols.timestamp] ?? '';
  const timestamp = toEpochMs(rawTs);
  if (timestamp === undefined) {
    throw new Error(`Line ${lineNum}: invalid timestamp "${rawTs}"`);
  }

  const open = numberAt(fields, cols.open);
  const high = numberAt(fields, cols.high);
  const low = numberAt(fields, cols.low);
  const close = numberAt(fields, cols.close);
  if (![open, high, low, close].every(Number.isFinite)) {
    throw new Error(`Line ${lineNum}: non-numeric price`);
  }
  if (high < low) {
    throw new Error(`Line ${lineNum}: high (${high}) < low (${low})`);
  }
  if (open < 0 || close < 0) {
    throw new Error(`Line ${lineNum}: negative price`);
  }

  const rawVolume = cols.volume !== undefined ? fields[cols.volume] : undefined;
  const volume = rawVolume ? Number(rawVolume) : undefined;
  if (volume !== undefined && !(volume >= 0)) {
    throw new Error(`Line ${lineNum}: invalid volume "${rawVolume}"`);
  }
  return { timestamp, open, high, low, close, volume };
}

/**
 * OHLCV CSV → 시간순 Candle[]
 * - 헤더가 있으면 이름(별칭 포함)으로 컬럼을 찾음
 * - 첫 행이 시각으로 시작하면 헤더 없는 ccxt OHLCV 덤프로 봄
 * - 같은 시각이 반복되면 파일에서 나중 행이 우선 (페이지 겹침)
 */
export function parseCandlesCsv(raw: string): Candle[] {
  const lines = raw.split(/\r?\n/).filter((l) => l.trim().length > 0);
  const first = lines[0];
  if (first === undefined) {
    throw new Error('CSV has no rows');
  }

  const firstRow = splitRow(first);
  const headerless = toEpochMs(firstRow[0] ?? '') !== undefined;
  const cols = headerless ? OHLCV_ORDER : resolveHeader(firstRow);
  const start = headerless ? 0 : 1;
  if (lines.length <= start) {
    throw new Error('CSV has a header but no data rows');
  }

  const byTs = new Map<number, Candle>();
  for (let i = start; i < lines.length; i++) {
    const candle = toCandle(splitRow(lines[i] ?? ''), cols, i + 1);
    byTs.set(candle.timestamp, candle);
  }
  return [...byTs.values()].sort((a, b) => a.timestamp - b.timestamp);
}

export function loadCsv(filePath: string): Candle[] {
  return parseCandlesCsv(readFileSync(filePath, 'utf-8'));
}
