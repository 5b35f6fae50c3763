function causeOf(v: unknown): unknown {
  if (typeof v !== "object" || v === null || !("cause" in v)) return undefined
  return v.cause
}

/**
 * Walk the error cause chain and return all values encountered, outermost first.
 *
 * Stops after `maxDepth` links (default 50) or when a link repeats.
 *
 * @example
 * ```ts
 * for (const link of errorChain(err)) {
 *   writer.writeString(link instanceof Error ? link.message : String(link))
 * }
 * ```
 */
export function errorChain(err: unknown, maxDepth: number = 50): unknown[] {
  const chain: unknown[] = []
  const seen = new WeakSet<object>()

  let current: unknown = err

  while (current != null && chain.length < maxDepth) {
    if (typeof current === "object") {
      if (seen.has(current)) break
      seen.add(current)
    }

    chain.push(current)

    const next = causeOf(current)

    if (next === undefined) break
    current = next
  }

  return chain
}
