export type SessionRef = Readonly<{
  /** Kind of session, e.g. "ServerSession" or "ClientSession". */
  type: string
  id: string | number
}>

export type ConnectionRef = Readonly<{
  id: string | number
}>

/**
 * A single log call from the host framework.
 *
 * Only `level`, `category` and `message` are needed to route the entry;
 * the remaining fields feed the message formatter.
 */
export type SessionLogEntry = Readonly<{
  /** Host severity code, see `SessionLogLevels`. Unknown codes are never emitted. */
  level: number

  /** Category name; blank or unknown names route to the default category. */
  category?: string | null

  /** Raw message, possibly with `{0}`, `{1}`… placeholders. */
  message: string

  /** Values for the message placeholders. */
  parameters?: readonly unknown[]

  /** Values bound to an SQL statement, shown or masked per configuration. */
  bindParameters?: readonly unknown[]

  date?: Date
  thread?: string
  session?: SessionRef
  connection?: ConnectionRef

  /** Error to attach to the emitted entry. */
  error?: unknown
}>
