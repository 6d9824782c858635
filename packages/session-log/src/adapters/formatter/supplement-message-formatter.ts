import { isMainThread, threadId } from "node:worker_threads"
import type { MessageFormatter } from "../../ports/message-formatter"
import type { SessionLogEntry } from "../../ports/session-log-entry"
import { systemTimeSource, type TimeSource } from "../../ports/time-source"
import { formatLogDate } from "./format-log-date"
import { renderValue, substituteParameters } from "./substitute-parameters"

export type SupplementFormatterOptions = {
  printDate: boolean
  printThread: boolean
  printSession: boolean
  printConnection: boolean

  /** Show bind values; otherwise only their count is printed. */
  printParameters: boolean
}

export const DEFAULT_FORMATTER_OPTIONS: Readonly<SupplementFormatterOptions> = Object.freeze({
  printDate: true,
  printThread: true,
  printSession: true,
  printConnection: true,
  printParameters: false,
})

export type SupplementFormatterDeps = {
  timeSource?: TimeSource

  /** Label for entries that carry no thread of their own. */
  threadLabel?: () => string
}

const SEPARATOR = "--"

function currentThreadLabel(): string {
  return isMainThread ? "main" : `worker-${threadId}`
}

/**
 * Prefixes the message with date, session, connection and thread, substitutes
 * `{n}` placeholders and appends SQL bind parameters.
 */
export class SupplementMessageFormatter implements MessageFormatter {
  private readonly opts: Readonly<SupplementFormatterOptions>
  private readonly timeSource: TimeSource
  private readonly threadLabel: () => string

  constructor(
    opts: Partial<SupplementFormatterOptions> = {},
    deps: SupplementFormatterDeps = {},
  ) {
    this.opts = { ...DEFAULT_FORMATTER_OPTIONS, ...opts }
    this.timeSource = deps.timeSource ?? systemTimeSource
    this.threadLabel = deps.threadLabel ?? currentThreadLabel
  }

  format(entry: SessionLogEntry): string {
    return (
      this.prefix(entry) +
      substituteParameters(entry.message, entry.parameters) +
      this.bindSuffix(entry.bindParameters)
    )
  }

  private prefix(entry: SessionLogEntry): string {
    const parts: string[] = []

    if (this.opts.printDate) {
      parts.push(formatLogDate(entry.date ?? this.timeSource.now()))
    }
    if (this.opts.printSession && entry.session) {
      parts.push(`${entry.session.type}(${entry.session.id})`)
    }
    if (this.opts.printConnection && entry.connection) {
      parts.push(`Connection(${entry.connection.id})`)
    }
    if (this.opts.printThread) {
      parts.push(`Thread(${entry.thread ?? this.threadLabel()})`)
    }

    return parts.map((part) => part + SEPARATOR).join("")
  }

  private bindSuffix(bindParameters?: readonly unknown[]): string {
    if (!bindParameters) return ""

    if (this.opts.printParameters) {
      return ` bind => [${bindParameters.map(renderValue).join(", ")}]`
    }

    const count = bindParameters.length
    return ` bind => [${count} ${count === 1 ? "parameter" : "parameters"} bound]`
  }
}
