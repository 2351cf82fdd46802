/**
 * Tuple-based result returned by every API call, `[error, data]`.
 */
export type SafeWrap<ErrorType = Error, DataType = unknown> =
  | [error: ErrorType, data: null]
  | [error: null, data: DataType];

/**
 * Async variant of {@link SafeWrap}.
 */
export type SafeWrapAsync<ErrorType = Error, DataType = unknown> = Promise<SafeWrap<ErrorType, DataType>>;

/**
 * Runs a Promise factory and turns a rejection into the error slot.
 * @example
 * const [error, response] = await safeWrapAsync(() => fetch(url));
 */
export async function safeWrapAsync<ErrorType = Error, DataType = unknown>(
  promise: () => Promise<DataType>,
): SafeWrapAsync<ErrorType, DataType> {
  try {
    const data = await promise();
    return [null, data];
  } catch (error) {
    return [error as ErrorType, null];
  }
}

/**
 * Wrap a synchronous function in a tuple-style result.
 * @example
 * const [error, json] = safeWrap(() => JSON.parse(text));
 */
export function safeWrap<ErrorType = Error, DataType = unknown>(fn: () => DataType): SafeWrap<ErrorType, DataType> {
  try {
    const data = fn();
    return [null, data];
  } catch (error) {
    return [error as ErrorType, null];
  }
}
