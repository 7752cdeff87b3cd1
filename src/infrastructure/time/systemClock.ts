import { setTimeout as delay } from 'node:timers/promises';
import type { ClockPort } from '@/ports/ClockPort';

export const systemClock: ClockPort = {
  now: () => Date.now(),
  sleep: async (ms) => {
    if (ms > 0) {
      await delay(ms);
    }
  },
};
