import type { Clock } from '../../types/download';

export interface StabilityReading<T> {
  value: T | null;
  streak: number;
  attempt: number;
}

export interface PollUntilStableOptions<T> {
  /** Returns the current observation, or `null` when it could not be taken. */
  read: () => Promise<T | null>;
  clock: Clock;
  intervalMs: number;
  requiredStreak: number;
  maxAttempts: number;
  /** Absolute epoch-ms limit; polling stops once the clock passes it. */
  deadline?: number;
  equals?: (previous: T, current: T) => boolean;
  /** Readings that can never count towards a stable streak (e.g. an empty file). */
  isEligible?: (value: T) => boolean;
  onReading?: (reading: StabilityReading<T>) => void;
}

export type PollUntilStableResult<T> =
  | { stable: true; value: T; attempts: number }
  | { stable: false; attempts: number; lastValue: T | null };

/**
 * Reads a value once per tick until the same eligible value has been seen
 * `requiredStreak` times in a row. A changed value restarts the streak at 1
 * (or 0 when ineligible); a failed read restarts it at 0.
 */
export const pollUntilStable = async <T>({
  read,
  clock,
  intervalMs,
  requiredStreak,
  maxAttempts,
  deadline,
  equals = Object.is,
  isEligible = () => true,
  onReading,
}: PollUntilStableOptions<T>): Promise<PollUntilStableResult<T>> => {
  let streak = 0;
  let hasPrevious = false;
  let previous: T | null = null;
  let attempts = 0;

  while (attempts < maxAttempts) {
    if (deadline !== undefined && clock.now() > deadline) {
      break;
    }
    attempts += 1;
    const current = await read();

    if (current === null) {
      streak = 0;
    } else if (hasPrevious && previous !== null && isEligible(current) && equals(previous, current)) {
      streak += 1;
    } else {
      streak = isEligible(current) ? 1 : 0;
      previous = current;
      hasPrevious = true;
    }

    onReading?.({ value: current, streak, attempt: attempts });

    if (current !== null && streak >= requiredStreak) {
      return { stable: true, value: current, attempts };
    }

    await clock.sleep(intervalMs);
  }

  return { stable: false, attempts, lastValue: previous };
};
