const httpErrorCodeList = [
  'INVALID_WEIGHT',
  'INVALID_ENCODING',
  'NOT_ACCEPTABLE',
] as const;
export type HttpErrorCode = (typeof httpErrorCodeList)[number];

export type HttpErrorOptions = ErrorOptions & { status?: number | undefined };

export class HttpError extends ErrorWithCodes(httpErrorCodeList) {
  #status: number | undefined;

  constructor(
    message: string,
    code: HttpErrorCode,
    { status, ...options }: HttpErrorOptions = {},
  ) {
    super(message, code, options);
    this.name = 'HttpError';
    this.#status = status;
  }

  /**
   * The HTTP status attached to the error, if any. Parse errors are created
   * with 400 but callers may replace it.
   */
  get status() {
    return this.#status;
  }

  setStatus(status: number) {
    if (!Number.isInteger(status) || status < 100 || status > 599) {
      throw new RangeError(`Invalid HTTP status code: ${status}`);
    }
    this.#status = status;
  }
}

function ErrorWithCodes<const Code extends string>(codes: readonly Code[]) {
  class ErrorWithCodes extends Error {
    code: Code;
    constructor(message: string, code: Code, options?: ErrorOptions) {
      super(message, options);
      this.code = code;
    }
  }
  const errorCodeMap = Object.fromEntries(
    codes.map((code) => [code, code] as const),
  );
  Object.assign(ErrorWithCodes, errorCodeMap);
  return ErrorWithCodes as typeof ErrorWithCodes & { [K in Code]: K };
}
