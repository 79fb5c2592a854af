import { setTimeout as sleep } from 'node:timers/promises';

export interface JobLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/** Delay, randomness and wall clock for a job run; tests replace all three. */
export interface JobEnvironment {
  delay(ms: number): Promise<void>;
  random(): number;
  now(): Date;
}

export const systemEnvironment: JobEnvironment = {
  delay: async ms => {
    await sleep(ms);
  },
  random: () => Math.random(),
  now: () => new Date()
};

export function uniformDelayMs(env: JobEnvironment, minSeconds: number, maxSeconds: number): number {
  return Math.round((minSeconds + env.random() * (maxSeconds - minSeconds)) * 1000);
}
