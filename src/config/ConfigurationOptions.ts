import { invalidOptionsError } from "../errors";
import { defaultLogger, Logger } from "../models/Logger";
import {
  DefaultObjectMapperFactory,
  type ObjectMapperFactory,
} from "../objectmapping/ObjectMapperFactory";
import { TypeSerializerCollection } from "../serialize/TypeSerializerCollection";
import { TypeSerializers } from "../serialize/TypeSerializers";
import { formatIssues, optionsInputSchema, type OptionsInput } from "./schema";

interface OptionsState {
  readonly serializers: TypeSerializerCollection;
  readonly mapperFactory: ObjectMapperFactory;
  readonly shouldCopyDefaults: boolean;
  readonly header: string | undefined;
  readonly logger: Logger;
}

/**
 * Settings shared by every node of a tree. Immutable: each `with*` call
 * returns a new instance.
 */
export class ConfigurationOptions implements OptionsState {
  readonly serializers: TypeSerializerCollection;
  readonly mapperFactory: ObjectMapperFactory;
  /** Write in-memory defaults back into the tree when a value is absent */
  readonly shouldCopyDefaults: boolean;
  /** Comment given to commented roots created with these options */
  readonly header: string | undefined;
  readonly logger: Logger;

  private constructor(state: OptionsState) {
    this.serializers = state.serializers;
    this.mapperFactory = state.mapperFactory;
    this.shouldCopyDefaults = state.shouldCopyDefaults;
    this.header = state.header;
    this.logger = state.logger;
    Object.freeze(this);
  }

  static defaults(input: OptionsInput = {}): ConfigurationOptions {
    return ConfigurationOptions.fromInput(input);
  }

  /**
   * Like `defaults()`, for input that has not been type-checked, such as a
   * parsed settings file.
   */
  static fromInput(input: unknown): ConfigurationOptions {
    const parsed = optionsInputSchema.safeParse(input);
    if (!parsed.success) {
      throw invalidOptionsError.create(
        { issues: formatIssues(parsed.error) },
        parsed.error,
      );
    }
    const { copyDefaults, header, logLevel, logStrategy } = parsed.data;
    const shared = logLevel === undefined && logStrategy === undefined;
    const logger = shared
      ? defaultLogger
      : new Logger({
          printThreshold: logLevel === undefined ? "info" : logLevel,
          printStrategy: logStrategy ?? "pretty",
        });
    return new ConfigurationOptions({
      serializers: TypeSerializers.getDefaultSerializers(),
      mapperFactory: shared
        ? DefaultObjectMapperFactory.getInstance()
        : new DefaultObjectMapperFactory(logger),
      shouldCopyDefaults: copyDefaults ?? false,
      header,
      logger,
    });
  }

  /**
   * Accepts a ready collection, or a callback that registers serializers on a
   * child of the current collection.
   */
  withSerializers(
    serializers:
      | TypeSerializerCollection
      | ((child: TypeSerializerCollection) => void),
  ): ConfigurationOptions {
    if (serializers instanceof TypeSerializerCollection) {
      return this.copy({ serializers });
    }
    const child = this.serializers.newChild();
    serializers(child);
    return this.copy({ serializers: child });
  }

  withShouldCopyDefaults(shouldCopyDefaults: boolean): ConfigurationOptions {
    return this.copy({ shouldCopyDefaults });
  }

  withHeader(header: string | undefined): ConfigurationOptions {
    return this.copy({ header });
  }

  withMapperFactory(mapperFactory: ObjectMapperFactory): ConfigurationOptions {
    return this.copy({ mapperFactory });
  }

  /** The mapper factory keeps the logger it was built with. */
  withLogger(logger: Logger): ConfigurationOptions {
    return this.copy({ logger });
  }

  private copy(patch: Partial<OptionsState>): ConfigurationOptions {
    return new ConfigurationOptions({
      serializers: this.serializers,
      mapperFactory: this.mapperFactory,
      shouldCopyDefaults: this.shouldCopyDefaults,
      header: this.header,
      logger: this.logger,
      ...patch,
    });
  }
}
