/**
 * Flatten an error and its chain of causes into one line for the console.
 * @param error Anything that was thrown
 * @returns "message: cause message: ..."
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }

  return error.cause === undefined
    ? error.message
    : `${error.message}: ${describeError(error.cause)}`;
}
