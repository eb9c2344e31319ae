export type DefaultErrorType = Record<string, unknown>;

export interface IErrorDefinition<
  TData extends DefaultErrorType = DefaultErrorType,
> {
  id: string;
  format?: (data: TData) => string;
  /**
   * Advice on how to fix the problem, appended after the formatted message.
   */
  remediation?: string | ((data: TData) => string);
}

/**
 * Every error raised by the mapper. `data` is the payload the error was thrown
 * with; `cause` keeps the underlying failure when one exists.
 */
export interface IMapperError<TData extends DefaultErrorType = DefaultErrorType>
  extends Error {
  readonly id: string;
  readonly data: TData;
}

/**
 * Runtime helper returned by `error(id)...build()`.
 * Contains helpers to throw typed errors and perform type-safe checks.
 */
export interface IErrorHelper<
  TData extends DefaultErrorType = DefaultErrorType,
> {
  /** Unique id, also used as the thrown error's `name` */
  id: string;
  /** Build the error without throwing it */
  create(data: TData, cause?: unknown): IMapperError<TData>;
  /** Throw a typed error with the given data */
  throw(data: TData, cause?: unknown): never;
  /** Type guard for checking if an unknown error is this error */
  is(error: unknown): error is IMapperError<TData>;
}
