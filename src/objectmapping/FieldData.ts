import { fieldAccessError, noSerializerError } from "../errors";
import type { TypeSerializer } from "../serialize/TypeSerializer";
import type { TypeToken } from "../tokens/TypeToken";
import { describePath, isCommentedNode, type ConfigNode } from "../tree/types";

/**
 * A field of a mapped record, with its type resolved for the record type the
 * mapper was built for.
 */
export class FieldData {
  constructor(
    readonly field: string,
    readonly type: TypeToken,
    readonly path: string,
    readonly comment?: string,
  ) {}

  /**
   * Reads `node` into the field. When nothing is read and the node's options
   * copy defaults, the field keeps its value and writes it into the node.
   */
  deserializeFrom(instance: object, node: ConfigNode): void {
    const serializer = this.serializerFor(node);
    const value = node.isVirtual()
      ? undefined
      : serializer.deserialize(this.type, node);
    const options = node.getOptions();
    if (value === undefined && options.shouldCopyDefaults) {
      options.logger.trace(`Copying default for ${this.field} into ${describePath(node)}`, {
        source: "object-mapper",
        data: { field: this.field, type: this.type.toString() },
      });
      this.serializeTo(instance, node);
      return;
    }
    this.write(instance, value);
  }

  serializeTo(instance: object, node: ConfigNode): void {
    const value = this.read(instance);
    if (value === undefined || value === null) {
      node.setValue(null);
    } else {
      this.serializerFor(node).serialize(this.type, value, node);
    }
    if (this.comment && isCommentedNode(node)) {
      node.setCommentIfAbsent(this.comment);
    }
  }

  toString(): string {
    return `${this.field}: ${this.type.toString()} @ ${this.path}`;
  }

  private serializerFor(node: ConfigNode): TypeSerializer<unknown> {
    const serializer = node.getOptions().serializers.get(this.type);
    if (!serializer) {
      throw noSerializerError.create({
        type: this.type.toString(),
        field: this.field,
      });
    }
    return serializer;
  }

  private read(instance: object): unknown {
    try {
      return Reflect.get(instance, this.field);
    } catch (error) {
      throw fieldAccessError.create(
        { field: this.field, operation: "serialize" },
        error,
      );
    }
  }

  private write(instance: object, value: unknown): void {
    let written: boolean;
    try {
      written = Reflect.set(instance, this.field, value);
    } catch (error) {
      throw fieldAccessError.create(
        { field: this.field, operation: "deserialize" },
        error,
      );
    }
    if (!written) {
      throw fieldAccessError.create({
        field: this.field,
        operation: "deserialize",
      });
    }
  }
}
