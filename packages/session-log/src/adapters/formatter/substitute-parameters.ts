const PLACEHOLDER = /\{(\d+)\}/g

/**
 * Text for a message or bind parameter. Values that cannot be converted to a
 * string (null-prototype objects, throwing `toString`) render as their
 * `[object Tag]`.
 */
export function renderValue(value: unknown): string {
  if (value === null) return "null"
  if (value instanceof Date && !Number.isNaN(value.getTime())) return value.toISOString()

  try {
    return String(value)
  } catch {
    return Object.prototype.toString.call(value)
  }
}

/**
 * Replace `{0}`, `{1}`… with the matching parameter.
 *
 * Messages without `{0` and empty parameter lists are returned untouched;
 * placeholders past the end of `parameters` stay as written.
 */
export function substituteParameters(message: string, parameters?: readonly unknown[]): string {
  if (!parameters || parameters.length === 0 || !message.includes("{0")) return message

  return message.replace(PLACEHOLDER, (placeholder, index: string) => {
    const i = Number(index)
    return i < parameters.length ? renderValue(parameters[i]) : placeholder
  })
}
