export const ROOT_NAMESPACE = "persistence.logging"

export const DEFAULT_CATEGORY = "default"

/** Categories the host framework tags its entries with. */
export const loggerCategories = [
  "cache",
  "connection",
  "dbws",
  "ddl",
  "dms",
  "ejb",
  "event",
  "jpa",
  "jpars",
  "metadata",
  "metamodel",
  "misc",
  "monitoring",
  "moxy",
  "propagation",
  "properties",
  "query",
  "sequencing",
  "server",
  "sql",
  "transaction",
  "weaver",
] as const

export type LoggerCategory = (typeof loggerCategories)[number]

export function namespaceFor(category: string): string {
  return `${ROOT_NAMESPACE}.${category}`
}
