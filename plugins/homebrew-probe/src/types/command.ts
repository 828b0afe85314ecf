/** A structured command ready for execution. Never a shell string. */
export interface Command {
  readonly argv: readonly string[];
}
