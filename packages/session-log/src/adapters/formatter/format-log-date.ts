function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0")
}

/** `yyyy.MM.dd HH:mm:ss.SSS` in UTC. */
export function formatLogDate(date: Date): string {
  const day = `${date.getUTCFullYear()}.${pad(date.getUTCMonth() + 1)}.${pad(date.getUTCDate())}`
  const time = `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`

  return `${day} ${time}.${pad(date.getUTCMilliseconds(), 3)}`
}
