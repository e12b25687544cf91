import { setTimeout as delay } from "node:timers/promises";
import type { ClockPort, SleepFn } from "../../core/ports/outboundPorts";

/**
 * Adapts wall-clock access so time-sensitive logic remains deterministic in tests.
 */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}

export const systemSleep: SleepFn = async (ms) => {
  await delay(ms);
};
