export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/** `now`, pushed forward so it lands strictly after `previous`. */
export function laterThan(now: Date, previous: Date): Date {
  return now.getTime() > previous.getTime() ? now : new Date(previous.getTime() + 1);
}
