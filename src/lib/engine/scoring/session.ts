// ============================================================
// Session adjustment
// ============================================================

import { minuteOfDay, isWithinClockWindow, parseClock } from '../../utils/time';
import type { ClockWindow, SessionConfig } from './types';

export interface SessionAdjustment {
  label: 'avoid' | 'high-liquidity' | 'off-peak';
  delta: number;
}

function inAnyWindow(minute: number, windows: readonly ClockWindow[]): boolean {
  return windows.some((w) => {
    const start = parseClock(w.start);
    const end = parseClock(w.end);
    return start !== null && end !== null && isWithinClockWindow(minute, start, end);
  });
}

/**
 * Score adjustment for the time of day. The avoid window wins over the
 * others and is applied alone.
 */
export function sessionAdjustment(now: number, config: SessionConfig): SessionAdjustment | null {
  const minute = minuteOfDay(now, config.utcOffsetMinutes);

  if (inAnyWindow(minute, config.avoid)) {
    return { label: 'avoid', delta: -config.avoidPenalty };
  }
  if (inAnyWindow(minute, config.highLiquidity)) {
    return { label: 'high-liquidity', delta: config.highLiquidityBonus };
  }
  if (inAnyWindow(minute, config.offPeak)) {
    return { label: 'off-peak', delta: -config.offPeakPenalty };
  }
  return null;
}
