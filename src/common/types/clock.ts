/**
 * Source of the current time. Injected wherever a timestamp ends up in output.
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export const fixedClock = (at: Date): Clock => ({
  now: () => new Date(at.getTime()),
});
