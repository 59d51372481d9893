/** Seconds since the epoch, as a float. Frame timestamps use this unit. */
export type Clock = () => number;

export const now: Clock = () => Date.now() / 1000;
