/**
 * Severity codes used by the host persistence framework, ordered from most
 * verbose to most severe.
 */
export const SessionLogLevels = {
  All: 0,
  Finest: 1,
  Finer: 2,
  Fine: 3,
  Config: 4,
  Info: 5,
  Warning: 6,
  Severe: 7,
  /** Host-side "disable logging" value. Never a valid entry severity. */
  Off: 8,
} as const

export type SessionLogLevel = (typeof SessionLogLevels)[keyof typeof SessionLogLevels]
