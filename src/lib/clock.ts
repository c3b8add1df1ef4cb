/**
 * Injectable time source. The engine never reads Date.now() directly.
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};
