export type FaucetErrorCode =
  | "NODE_UNAVAILABLE"
  | "NODE_TIMEOUT"
  | "NODE_RESPONSE_INVALID"
  | "SUBMISSION_FAILED"
  | "SUBMISSION_TIMEOUT"
  | "SIGNING_FAILED"
  | "SDK_UNAVAILABLE"
  | "CONFIG_INVALID";

export class FaucetError extends Error {
  code: FaucetErrorCode;
  retryable: boolean;
  status?: number;

  constructor(params: {
    message: string;
    code: FaucetErrorCode;
    retryable?: boolean;
    status?: number;
    cause?: unknown;
  }) {
    super(params.message, { cause: params.cause });
    this.name = "FaucetError";
    this.code = params.code;
    this.retryable = Boolean(params.retryable);
    this.status = params.status;
  }
}

export function isFaucetError(err: unknown): err is FaucetError {
  return err instanceof FaucetError;
}

export function isTimeoutError(err: unknown): boolean {
  if (isFaucetError(err)) return err.code === "NODE_TIMEOUT" || err.code === "SUBMISSION_TIMEOUT";
  return err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
}
