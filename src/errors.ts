/**
 * Error taxonomy for graph loading and rank computation.
 *
 * The core algorithms only throw on malformed input; everything else
 * originates at the loading boundary or in configuration.
 */

export class RankError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The graph source could not be opened or read. */
export class LoadError extends RankError {}

/** The graph description is malformed. */
export class FormatError extends RankError {}

/** Edge counts and out-degrees disagree, or a node has nowhere to go. */
export class InvariantViolation extends RankError {
  readonly node: number | undefined;

  constructor(message: string, node?: number) {
    super(message);
    this.node = node;
  }
}

export class ConfigError extends RankError {}

export class UsageError extends RankError {}
