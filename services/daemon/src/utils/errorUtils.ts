export function toError(maybeError: unknown): Error {
  if (maybeError instanceof Error) {
    return maybeError;
  }

  if (typeof maybeError === "object" && maybeError !== null && "message" in maybeError) {
    return new Error(String(maybeError.message));
  }

  return new Error(String(maybeError));
}

/** Node system errors carry a string `code` such as `ENOENT`. */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
