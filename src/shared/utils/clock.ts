/**
 * Millisecond wall clock. Injected wherever elapsed time drives a decision.
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
