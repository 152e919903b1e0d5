import { config } from './config.js';
import { loadCsv } from './data/csv-loader.js';
import { runBacktest, DEFAULT_BACKTEST_META } from './engine/backtest-runner.js';
import { formatReport, formatTrades } from './report/formatter.js';

function printUsage(): void {
  console.log(`
Usage:
  node dist/src/backtest.js [csv-file] [options]

  csv-file 생략 시 BACKTEST_CSV (.env)

Options:
  --capital <number>        Initial equity in USDT (default: PAPER_INITIAL_EQUITY)
  --fee <number>            Fee rate (default: PAPER_FEE_RATE)
  --slippage <number>       Slippage bps (default: 0)
  --contract-size <number>  Contract size (default: 0.01)
  --trades                  Show individual trades
  --help                    Show this message

전략/사이징/손절 파라미터는 .env 설정을 그대로 사용 (라이브와 동일 엔진).
`);
}

export function parseArgs(args: readonly string[]): Map<string, string> {
  const map = new Map<string, string>();
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (arg.startsWith('--')) {
      const next = args[i + 1];
      if (next !== undefined && !next.startsWith('--')) {
        map.set(arg, next);
        i++;
      } else {
        map.set(arg, 'true');
      }
    } else if (!map.has('_file')) {
      map.set('_file', arg);
    }
  }
  return map;
}

function getNum(args: Map<string, string>, key: string, def: number): number {
  const v = args.get(key);
  if (v === undefined) return def;
  const n = Number(v);
  if (!Number.isFinite(n)) throw new Error(`${key}: not a number (${v})`);
  return n;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.has('--help')) {
    printUsage();
    return;
  }

  const file = args.get('_file') ?? config.backtest.csvPath;
  const candles = loadCsv(file);
  console.log(`Loaded ${candles.length} candles from ${file}`);

  const { report } = await runBacktest(
    candles,
    {
      ...config,
      paper: {
        initialEquity: getNum(args, '--capital', config.paper.initialEquity),
        feeRate: getNum(args, '--fee', config.paper.feeRate),
      },
    },
    {
      slippageBps: getNum(args, '--slippage', 0),
      meta: { ...DEFAULT_BACKTEST_META, contractSize: getNum(args, '--contract-size', DEFAULT_BACKTEST_META.contractSize) },
    },
  );

  console.log(formatReport(report));
  if (args.has('--trades')) {
    console.log(formatTrades(report));
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
