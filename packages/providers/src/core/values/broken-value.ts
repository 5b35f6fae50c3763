/**
 * A failure captured while calculating a value.
 *
 * Capturing and replaying are separate steps: the failure is stored when state
 * is written and only raised again, through {@link BrokenValue.rethrow}, when
 * the restored value is evaluated.
 */
export class BrokenValue {
  constructor(readonly failure: unknown) {}

  rethrow(): never {
    throw this.failure
  }
}
