function createCustomError(code: string, defaultMessage: string) {
  return class extends Error {
    public readonly code: string;

    constructor(message?: string) {
      super(message ?? defaultMessage);
      this.name = this.constructor.name;
      this.code = code;
      if (Error.captureStackTrace) {
        Error.captureStackTrace(this, this.constructor);
      }
    }
  };
}

export class HeaderParseError extends createCustomError(
  'ERR_HEADER_PARSE',
  'Header Parse Error',
) {};

export class HeaderOperationError extends createCustomError(
  'ERR_HEADER_OPERATION',
  'Header Operation Error',
) {};
