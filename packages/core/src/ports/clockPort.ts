export interface ClockPort {
  nowMs(): number;
}

/**
 * Create a system clock adapter that uses Date.now()
 *
 * Only composition roots should call this; services take an injected clock.
 */
export function createSystemClock(): ClockPort {
  return { nowMs: () => Date.now() };
}
