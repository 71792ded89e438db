/**
 * Source of the current time in milliseconds.
 * The reader takes one so tests can drive ticks without real delays.
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};
