export class MattermostError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "MattermostError";
  }
}

export class ConfigError extends MattermostError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_ERROR", cause);
    this.name = "ConfigError";
  }
}

/** `not_found` is the 404 variant; every other request failure is `request`. */
export type RequestErrorKind = "request" | "not_found";

export interface RequestErrorOptions {
  kind?: RequestErrorKind;
  status?: number;
  cause?: unknown;
}

export class RequestError extends MattermostError {
  readonly kind: RequestErrorKind;
  readonly status?: number;

  constructor(message: string, options: RequestErrorOptions = {}) {
    const kind = options.kind ?? "request";
    super(message, kind === "not_found" ? "NOT_FOUND" : "REQUEST_ERROR", options.cause);
    this.name = "RequestError";
    this.kind = kind;
    this.status = options.status;
  }
}

export type NotFoundError = RequestError & { readonly kind: "not_found" };

export function isRequestError(err: unknown): err is RequestError {
  return err instanceof RequestError;
}

export function isNotFoundError(err: unknown): err is NotFoundError {
  return isRequestError(err) && err.kind === "not_found";
}
