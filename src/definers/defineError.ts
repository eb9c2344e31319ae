import type {
  DefaultErrorType,
  IErrorDefinition,
  IErrorHelper,
  IMapperError,
} from "../types/error";

export class MapperError<TData extends DefaultErrorType = DefaultErrorType>
  extends Error
  implements IMapperError<TData>
{
  constructor(
    public readonly id: string,
    public readonly data: TData,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = id;
  }
}

export class ErrorHelper<TData extends DefaultErrorType = DefaultErrorType>
  implements IErrorHelper<TData>
{
  constructor(private readonly definition: IErrorDefinition<TData>) {}
  get id(): string {
    return this.definition.id;
  }
  create(data: TData, cause?: unknown): MapperError<TData> {
    return new MapperError(this.definition.id, data, this.message(data), cause);
  }
  throw(data: TData, cause?: unknown): never {
    throw this.create(data, cause);
  }
  is(error: unknown): error is MapperError<TData> {
    return error instanceof MapperError && error.id === this.definition.id;
  }
  private message(data: TData): string {
    const base = this.definition.format
      ? this.definition.format(data)
      : this.definition.id;
    const { remediation } = this.definition;
    if (remediation === undefined) {
      return base;
    }
    const advice =
      typeof remediation === "function" ? remediation(data) : remediation;
    return `${base}\n\nRemediation: ${advice}`;
  }
}

/**
 * Create a new error helper
 * @param definition
 * @returns
 */
export function defineError<TData extends DefaultErrorType = DefaultErrorType>(
  definition: IErrorDefinition<TData>,
) {
  return new ErrorHelper<TData>(definition);
}

/**
 * True for any error thrown by the object mapper, whatever its id.
 */
export function isObjectMappingError(error: unknown): error is MapperError {
  return error instanceof MapperError;
}
