const atLine = (line: number | undefined) =>
  line === undefined ? '' : ` at line ${line}`;

/**
 * Raised when productions are malformed, reference undefined symbols,
 * or the start symbol has nothing to derive.
 */
export class InvalidGrammarError extends Error {
  readonly line?: number;
  constructor(message: string, line?: number) {
    super(`InvalidGrammarError${atLine(line)}: ${message}`);
    this.name = 'InvalidGrammarError';
    this.line = line;
  }
}

export type RejectReason = 'no-action' | 'no-goto' | 'step-limit';

/**
 * A normal parse outcome: the input is not in the language the table
 * recognizes, or the parser gave up after too many steps.
 */
export class ParseRejectedError extends Error {
  readonly reason: RejectReason;
  readonly state: number;
  readonly token: string;
  readonly position: number;
  readonly parseStack: readonly (number | string)[];

  constructor(
    reason: RejectReason,
    detail: {
      state: number;
      token: string;
      position: number;
      parseStack: readonly (number | string)[];
    },
    message: string
  ) {
    super(message);
    this.name = 'ParseRejectedError';
    this.reason = reason;
    this.state = detail.state;
    this.token = detail.token;
    this.position = detail.position;
    this.parseStack = detail.parseStack;
  }
}

export class TokenizeError extends Error {
  readonly token: string;
  readonly position: number;
  constructor(token: string, position: number, validTerminals: string[]) {
    super(
      `Unknown token '${token}' at position ${position}. Valid terminals: ${validTerminals.join(
        ', '
      )}`
    );
    this.name = 'TokenizeError';
    this.token = token;
    this.position = position;
  }
}

/**
 * A fixpoint loop ran past the bound its input allows. Never expected
 * on a correct build.
 */
export class FixpointError extends Error {
  constructor(computation: string, bound: number) {
    super(`FixpointError: ${computation} did not converge within ${bound} iterations`);
    this.name = 'FixpointError';
  }
}
