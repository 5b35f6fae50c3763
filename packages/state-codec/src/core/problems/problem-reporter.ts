import type { Logger } from "@strata/logger"

export type PropertyProblem = Readonly<{
  /** State entry that was being written. */
  trace: string
  message: string
  error: unknown
}>

/**
 * Collects problems found while writing state. Writing continues after a
 * problem; only the first `maxProblems` are kept and logged, the rest are
 * counted.
 */
export class ProblemReporter {
  private readonly kept: PropertyProblem[] = []
  private count = 0

  constructor(
    private readonly logger: Logger,
    private readonly maxProblems: number,
  ) {}

  get total(): number {
    return this.count
  }

  get problems(): readonly PropertyProblem[] {
    return this.kept
  }

  report(problem: PropertyProblem): void {
    this.count++

    if (this.kept.length >= this.maxProblems) return

    this.kept.push(problem)
    this.logger.warn(problem.message, { entry: problem.trace, err: problem.error })

    if (this.kept.length === this.maxProblems) {
      this.logger.warn("Problem limit reached, further problems are only counted", {
        maxProblems: this.maxProblems,
      })
    }
  }
}
