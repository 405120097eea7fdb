// Fixed-window rate limit — pure slot allocation.
//
// A window holds at most `limit` requests and lasts `intervalMs`. A request
// that doesn't fit is booked into the next window and told how long to
// wait, so requests over the ceiling queue up behind each other rather
// than burst.

export interface Window {
  readonly startedAt: number; // epoch ms, may lie in the future when booked ahead
  readonly used: number;
}

export const initialWindow: Window = { startedAt: Number.NEGATIVE_INFINITY, used: 0 };

/** Book one request at `now`. Returns how long the caller must wait before
 *  running, and the window state after the booking. */
export function reserve(
  window: Window,
  now: number,
  limit: number,
  intervalMs: number,
): [waitMs: number, next: Window] {
  const ceiling = Math.max(1, limit);

  if (now >= window.startedAt + intervalMs) {
    return [0, { startedAt: now, used: 1 }];
  }
  if (window.used < ceiling) {
    return [Math.max(0, window.startedAt - now), {
      startedAt: window.startedAt,
      used: window.used + 1,
    }];
  }
  const nextStart = window.startedAt + intervalMs;
  return [nextStart - now, { startedAt: nextStart, used: 1 }];
}
