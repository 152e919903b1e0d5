import type { AppConfig } from '../config.js';
import type { Strategy } from './strategy.js';
import { CrossoverStrategy } from './crossover.js';
import { EnvelopeTouchStrategy } from './envelope-touch.js';
import { ExtensionReversionStrategy } from './extension-reversion.js';

export type { Strategy, IndicatorHistory } from './strategy.js';
export { CrossoverStrategy } from './crossover.js';
export { EnvelopeTouchStrategy } from './envelope-touch.js';
export { ExtensionReversionStrategy } from './extension-reversion.js';

/**
 * 설정의 variant로 전략 구현체 선택
 */
export function createStrategy(cfg: AppConfig['strategy']): Strategy {
  const regime = cfg.regime.enabled
    ? {
        gapCap: cfg.regime.gapCap,
        atrMinPct: cfg.regime.atrMinPct,
        atrMaxPct: cfg.regime.atrMaxPct,
        slopeCap: cfg.regime.slopeCap,
      }
    : null;

  switch (cfg.variant) {
    case 'crossover':
      return new CrossoverStrategy({
        threshold: cfg.crossThreshold,
        trendMargin: cfg.trendMargin,
        trendFilter: cfg.crossTrendFilter,
      });
    case 'envelope_touch':
      return new EnvelopeTouchStrategy({ trendMargin: cfg.trendMargin, regime });
    case 'extension_reversion':
      return new ExtensionReversionStrategy({
        extensionFactor: cfg.extensionFactor,
        trendMargin: cfg.trendMargin,
        regime,
      });
  }
}
