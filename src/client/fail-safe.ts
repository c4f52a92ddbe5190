/**
 * Fail-safe timer: a ceiling on how long the UI may show "working…" for one
 * request, independent of transport timeouts. The host can suspend the
 * process mid-request and resume it with the original callback lost.
 */

export type FailSafeHandle = {
  disarm: () => void;
  readonly fired: boolean;
};

export function armFailSafe(params: { ceilingMs: number; onExpire: () => void }): FailSafeHandle {
  let fired = false;
  let armed = true;
  const timer = setTimeout(() => {
    if (!armed) return;
    armed = false;
    fired = true;
    params.onExpire();
  }, params.ceilingMs);
  timer.unref?.();

  return {
    disarm() {
      if (!armed) return;
      armed = false;
      clearTimeout(timer);
    },
    get fired() {
      return fired;
    },
  };
}
