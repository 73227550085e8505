export class RulebenchError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A rule string that does not fit the rule grammar. `fragment` is the offending text. */
export class RuleParseError extends RulebenchError {
  readonly fragment: string;

  constructor(message: string, fragment: string) {
    super(message, 'RULE_PARSE_ERROR');
    this.fragment = fragment;
  }
}

export class StrategyValidationError extends RulebenchError {
  constructor(message: string) {
    super(message, 'STRATEGY_INVALID');
  }
}

export class DataLoadError extends RulebenchError {
  readonly ticker: string;

  constructor(message: string, ticker: string) {
    super(message, 'DATA_LOAD_ERROR');
    this.ticker = ticker;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
