import { setTimeout as delay } from 'timers/promises';
import type { Clock } from '../../types/download';

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => delay(ms),
};
