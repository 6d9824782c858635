export type TimeSource = {
  /** Current time as a Date object. */
  now(): Date
}

export const systemTimeSource: TimeSource = {
  now: () => new Date(),
}
