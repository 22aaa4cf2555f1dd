// Cosmetic only: the server reports no progress, so the bar eases toward a
// ceiling until the response arrives.

export const PROGRESS_CEILING = 90;
export const PROGRESS_TICK_MS = 50;
const MIN_STEP = 0.3;
const EASING_FACTOR = 0.02;

export function nextProgress(current: number): number {
  if (current >= PROGRESS_CEILING) {
    return current;
  }

  const remaining = PROGRESS_CEILING - current;
  const increment = Math.max(MIN_STEP, remaining * EASING_FACTOR);
  return Math.min(PROGRESS_CEILING, current + increment);
}

export type StopProgress = () => void;

export type ProgressSimulator = (onTick: (progress: number) => void, initial?: number) => StopProgress;

export const startSimulatedProgress: ProgressSimulator = (onTick, initial = 0) => {
  let progress = initial;

  const timer = setInterval(() => {
    if (progress >= PROGRESS_CEILING) {
      return;
    }

    progress = nextProgress(progress);
    onTick(progress);
  }, PROGRESS_TICK_MS);

  return () => clearInterval(timer);
};
