export const FILTER_HIDE_DELAY_MS = 1000;

/** Run `fn` after `ms`; the returned function cancels it. */
export type Scheduler = (fn: () => void, ms: number) => () => void;

export type FilterOverlayOptions = Readonly<{
  show: () => void;
  hide: () => void;
  delayMs?: number;
  schedule?: Scheduler;
}>;

export type FilterOverlay = Readonly<{
  /** Show the filter line and restart the hide timer. */
  poke: () => void;
  visible: () => boolean;
  /** Hide immediately and cancel the timer. */
  dismiss: () => void;
}>;

export const scheduleWithTimeout: Scheduler = (fn, ms) => {
  const handle = setTimeout(fn, ms);
  return () => {
    clearTimeout(handle);
  };
};

/** Filter line shown while typing, hidden after a quiet period. */
export function createFilterOverlay(options: FilterOverlayOptions): FilterOverlay {
  const delayMs = options.delayMs ?? FILTER_HIDE_DELAY_MS;
  const schedule = options.schedule ?? scheduleWithTimeout;
  let cancelTimer: (() => void) | null = null;
  let shown = false;

  const cancel = (): void => {
    cancelTimer?.();
    cancelTimer = null;
  };

  const dismiss = (): void => {
    cancel();
    if (!shown) return;
    shown = false;
    options.hide();
  };

  return Object.freeze({
    poke: () => {
      cancel();
      if (!shown) {
        shown = true;
        options.show();
      }
      cancelTimer = schedule(() => {
        cancelTimer = null;
        dismiss();
      }, delayMs);
    },
    visible: () => shown,
    dismiss,
  });
}
