/**
 * @file    polling/backoff-scheduler.ts
 * @purpose Next poll interval as a pure function of the backoff counters.
 * @depends shared/types/frame.ts, shared/settings.ts
 *
 * Errors back off faster and further than idleness. Low-power mode imposes a
 * floor that is higher once the source has gone idle.
 */

import {
  BackoffConfig,
  BackoffState,
  DEFAULT_BACKOFF_CONFIG,
} from '../shared/types/frame';
import { clampSetting } from '../shared/settings';

/** Configured base seconds → base interval in ms, clamped to the valid range */
export function resolveBaseInterval(
  configuredSec: number,
  config: BackoffConfig = DEFAULT_BACKOFF_CONFIG,
): number {
  return clampSetting(configuredSec, config.minBaseSec, config.maxBaseSec, config.defaultBaseSec) * 1000;
}

export function isIdle(state: BackoffState, config: BackoffConfig = DEFAULT_BACKOFF_CONFIG): boolean {
  return state.consecutiveUnchanged > config.idleThreshold;
}

export function computeInterval(
  state: BackoffState,
  config: BackoffConfig = DEFAULT_BACKOFF_CONFIG,
): number {
  const base = resolveBaseInterval(config.baseIntervalSec, config);
  let interval = base;

  if (isIdle(state, config)) {
    const exponent = Math.min(state.consecutiveUnchanged - config.idleThreshold, config.maxIdleExponent);
    interval = Math.min(base * 2 ** exponent, Math.max(config.idleCapMs, base));
  }

  // Error backoff never undercuts an idle interval that was already longer
  if (state.consecutiveErrors > 0) {
    const exponent = Math.min(state.consecutiveErrors, config.maxErrorExponent);
    const errorInterval = Math.min(base * 2 ** exponent, Math.max(config.errorCapMs, base));
    interval = Math.max(interval, errorInterval);
  }

  if (state.lowPowerMode) {
    const floor = isIdle(state, config) ? config.lowPowerIdleFloorMs : config.lowPowerActiveFloorMs;
    interval = Math.max(interval, floor);
  }

  return interval;
}

/** True when moving from `current` to `next` is worth recreating the timer */
export function exceedsHysteresis(
  current: number,
  next: number,
  config: BackoffConfig = DEFAULT_BACKOFF_CONFIG,
): boolean {
  return Math.abs(next - current) > config.hysteresisMs;
}
