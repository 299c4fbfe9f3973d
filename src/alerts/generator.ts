import { z } from 'zod';
import { breaksOut, trailingEnvelope } from '../analysis/indicators/breakout.js';
import type { EnrichedBar } from '../analysis/indicators/types.js';
import { listIssues, percentile, positiveInt } from '../config/schema-validator.js';
import { ConfigurationError } from '../utils/errors.js';
import { formatLargeNumber } from '../utils/helpers.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('alerts');

export type AlertType = 'price_breakout' | 'amplitude_alert' | 'fund_flow_alert';
export type AlertDirection = 'up' | 'down' | 'in' | 'out';
export type AlertLevel = 'info' | 'warning';

export interface Alert {
  type: AlertType;
  direction?: AlertDirection;
  date: string;
  message: string;
  level: AlertLevel;
}

export const alertOptionsSchema = z.object({
  window: positiveInt(500).default(5),
  amplitudeThresholdPercentile: percentile.default(90),
  priceChangeThreshold: z.number().min(0).max(1).default(0.02),
  fundFlowThreshold: z.number().min(0).default(1_000_000),
});

export type AlertOptions = z.input<typeof alertOptionsSchema>;

function resolveOptions(options: AlertOptions): z.infer<typeof alertOptionsSchema> {
  const parsed = alertOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid alert options', listIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Evaluate the latest bar of an enriched series and report breakout,
 * abnormal-amplitude and fund-flow conditions, in that order. A quiet market
 * (or too little history) produces an empty list.
 */
export function generateAlerts(
  bars: readonly EnrichedBar[],
  options: AlertOptions = {},
): Alert[] {
  const { window, amplitudeThresholdPercentile, priceChangeThreshold, fundFlowThreshold } =
    resolveOptions(options);

  if (bars.length === 0 || bars.length < window) return [];

  const alerts: Alert[] = [];
  const lastIndex = bars.length - 1;
  const latest = bars[lastIndex];

  const envelope = trailingEnvelope(bars, lastIndex, window);
  if (envelope) {
    const direction = breaksOut(latest.close, envelope, priceChangeThreshold);
    if (direction === 'up') {
      alerts.push({
        type: 'price_breakout',
        direction: 'up',
        date: latest.date,
        message: `Upside breakout: close ${latest.close.toFixed(2)} broke the ${window}-day high ${envelope.high.toFixed(2)}`,
        level: 'warning',
      });
    } else if (direction === 'down') {
      alerts.push({
        type: 'price_breakout',
        direction: 'down',
        date: latest.date,
        message: `Downside breakout: close ${latest.close.toFixed(2)} fell through the ${window}-day low ${envelope.low.toFixed(2)}`,
        level: 'warning',
      });
    }
  }

  if (
    latest.amplitudePercentile !== null &&
    latest.amplitudePercentile > amplitudeThresholdPercentile
  ) {
    const amplitude = latest.amplitude ?? 0;
    alerts.push({
      type: 'amplitude_alert',
      date: latest.date,
      message: `Abnormal amplitude: ${amplitude.toFixed(2)}% is above the ${amplitudeThresholdPercentile}th percentile of recent history`,
      level: 'warning',
    });
  }

  const inflow = latest.mainNetInflow;
  if (inflow !== undefined && Number.isFinite(inflow) && Math.abs(inflow) > fundFlowThreshold) {
    const inbound = inflow > 0;
    alerts.push({
      type: 'fund_flow_alert',
      direction: inbound ? 'in' : 'out',
      date: latest.date,
      message: `Fund flow spike: main net ${inbound ? 'inflow' : 'outflow'} ${formatLargeNumber(Math.abs(inflow))}`,
      level: inbound ? 'info' : 'warning',
    });
  }

  if (alerts.length > 0) {
    log.info({ date: latest.date, alerts: alerts.map((a) => a.type) }, 'Alerts raised');
  }
  return alerts;
}
