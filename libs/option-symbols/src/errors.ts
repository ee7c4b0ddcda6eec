/**
 * Base class for every error raised while building, parsing or converting
 * option symbols. These always indicate caller misuse.
 */
export class OptionSymbolError extends Error {
  constructor(
    message: string,
    public readonly input?: string,
  ) {
    super(message);
    this.name = 'OptionSymbolError';
  }
}

export class MalformedExpiryError extends OptionSymbolError {
  constructor(message: string, input?: string) {
    super(message, input);
    this.name = 'MalformedExpiryError';
  }
}

export class MalformedStrikeError extends OptionSymbolError {
  constructor(message: string, input?: string) {
    super(message, input);
    this.name = 'MalformedStrikeError';
  }
}

export class MalformedSymbolError extends OptionSymbolError {
  constructor(message: string, input?: string) {
    super(message, input);
    this.name = 'MalformedSymbolError';
  }
}

export class SymbolTooShortError extends OptionSymbolError {
  constructor(
    input: string,
    public readonly minimumLength: number,
  ) {
    super(
      `Option symbol "${input}" is too short: expected at least ${minimumLength} characters`,
      input,
    );
    this.name = 'SymbolTooShortError';
  }
}

export class UnrecognizedFormatError extends OptionSymbolError {
  constructor(input: string) {
    super(`Could not detect the encoding of option symbol "${input}"`, input);
    this.name = 'UnrecognizedFormatError';
  }
}
