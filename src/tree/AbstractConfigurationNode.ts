import type { ConfigurationOptions } from "../config/ConfigurationOptions";
import { invalidNodeValueError } from "../errors";
import {
  asBoolean,
  asDouble,
  asFloat,
  asInt,
  asLong,
  asString,
  isScalar,
  type Scalar,
} from "./coerce";
import { describePath, type ConfigNode, type NodeKey } from "./types";

type NodeValue<N> =
  | { kind: "null" }
  | { kind: "scalar"; value: Scalar }
  | { kind: "list"; children: N[] }
  | { kind: "map"; children: Map<string, N> };

const NULL_VALUE = Object.freeze({ kind: "null" as const });

/** Key of a node created by getAppendedNode() until it is attached */
const APPEND_KEY = -1;

const isPlainRecord = (value: object): value is Record<string, unknown> => {
  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
};

const describeKind = (value: unknown): string => {
  if (typeof value !== "object" || value === null) {
    return typeof value;
  }
  return value.constructor?.name ?? "object";
};

/**
 * Shared implementation of the node tree. `N` is the concrete node class, so
 * navigation on a commented tree keeps returning commented nodes.
 *
 * A node is attached once it (or anything under it) has been written. Nodes
 * handed out for absent keys stay virtual and invisible to their parent until
 * then; writing to one attaches every virtual ancestor on the way up.
 */
export abstract class AbstractConfigurationNode<
  N extends AbstractConfigurationNode<N>,
> implements ConfigNode
{
  private value: NodeValue<N> = NULL_VALUE;
  private attached: boolean;

  protected constructor(
    private key: NodeKey | null,
    private parent: N | null,
    private readonly options: ConfigurationOptions,
  ) {
    this.attached = parent === null;
  }

  protected abstract self(): N;

  protected abstract createNode(key: NodeKey | null, parent: N | null): N;

  getKey(): NodeKey | null {
    return this.key;
  }

  getParent(): N | null {
    return this.parent;
  }

  getPath(): NodeKey[] {
    const path: NodeKey[] = [];
    let current: N | null = this.self();
    while (current !== null && current.key !== null) {
      path.unshift(current.key);
      current = current.parent;
    }
    return path;
  }

  getOptions(): ConfigurationOptions {
    return this.options;
  }

  isVirtual(): boolean {
    return !this.attached;
  }

  getNode(...path: NodeKey[]): N {
    let node = this.self();
    for (const segment of path) {
      node = node.getChild(segment);
    }
    return node;
  }

  getValue(defaultValue?: unknown): unknown {
    switch (this.value.kind) {
      case "null":
        return defaultValue;
      case "scalar":
        return this.value.value;
      case "list":
        return this.value.children.map((child) => child.getValue());
      case "map":
        return Object.fromEntries(
          Array.from(this.value.children, ([key, child]) => [
            key,
            child.getValue(),
          ]),
        );
    }
  }

  setValue(value: unknown): this {
    if (value === null || value === undefined) {
      this.clearValue();
      this.detach();
      return this;
    }
    this.assignValue(value);
    this.attachIfNecessary();
    return this;
  }

  getString(defaultValue?: string): string | undefined {
    return asString(this.scalarValue()) ?? defaultValue;
  }

  getInt(defaultValue?: number): number | undefined {
    return asInt(this.scalarValue()) ?? defaultValue;
  }

  getLong(defaultValue?: number): number | undefined {
    return asLong(this.scalarValue()) ?? defaultValue;
  }

  getFloat(defaultValue?: number): number | undefined {
    return asFloat(this.scalarValue()) ?? defaultValue;
  }

  getDouble(defaultValue?: number): number | undefined {
    return asDouble(this.scalarValue()) ?? defaultValue;
  }

  getBoolean(defaultValue?: boolean): boolean | undefined {
    return asBoolean(this.scalarValue()) ?? defaultValue;
  }

  hasListChildren(): boolean {
    return this.value.kind === "list";
  }

  hasMapChildren(): boolean {
    return this.value.kind === "map";
  }

  getChildrenList(): readonly N[] {
    return this.value.kind === "list" ? [...this.value.children] : [];
  }

  getChildrenMap(): ReadonlyMap<string, N> {
    return this.value.kind === "map"
      ? new Map(this.value.children)
      : new Map<string, N>();
  }

  getAppendedNode(): N {
    return this.createNode(APPEND_KEY, this.self());
  }

  removeChild(key: NodeKey): boolean {
    const child = this.findChild(key);
    if (!child) {
      return false;
    }
    this.removeChildNode(child);
    return true;
  }

  createRoot(): N {
    return this.createNode(null, null);
  }

  /**
   * Copies values from `other` wherever this tree has none. Existing values
   * win; maps present on both sides are merged recursively.
   */
  mergeValuesFrom(other: ConfigNode): this {
    if (other.hasMapChildren()) {
      for (const [key, otherChild] of other.getChildrenMap()) {
        const child = this.getNode(key);
        if (child.value.kind === "null") {
          child.setValue(otherChild.getValue());
        } else if (child.hasMapChildren() && otherChild.hasMapChildren()) {
          child.mergeValuesFrom(otherChild);
        }
      }
      return this;
    }
    const otherValue = other.getValue();
    if (this.value.kind === "null" && otherValue !== undefined) {
      this.setValue(otherValue);
    }
    return this;
  }

  toString(): string {
    return `${this.constructor.name}{path=${describePath(this)}, value=${JSON.stringify(this.getValue() ?? null)}}`;
  }

  private scalarValue(): Scalar | undefined {
    return this.value.kind === "scalar" ? this.value.value : undefined;
  }

  private getChild(key: NodeKey): N {
    return this.findChild(key) ?? this.createNode(key, this.self());
  }

  private findChild(key: NodeKey): N | undefined {
    if (this.value.kind === "list") {
      return typeof key === "number" ? this.value.children[key] : undefined;
    }
    if (this.value.kind === "map") {
      return this.value.children.get(String(key));
    }
    return undefined;
  }

  private assignValue(value: unknown): void {
    if (value instanceof AbstractConfigurationNode) {
      this.assignValue(value.getValue());
      return;
    }
    this.clearValue();
    if (isScalar(value)) {
      this.value = { kind: "scalar", value };
      return;
    }
    if (Array.isArray(value)) {
      this.value = {
        kind: "list",
        children: value.map((element, index) =>
          this.createAttachedChild(index, element),
        ),
      };
      return;
    }
    if (value instanceof Map) {
      const children = new Map<string, N>();
      for (const [key, entry] of value) {
        children.set(String(key), this.createAttachedChild(String(key), entry));
      }
      this.value = { kind: "map", children };
      return;
    }
    if (typeof value === "object" && value !== null && isPlainRecord(value)) {
      const children = new Map<string, N>();
      for (const [key, entry] of Object.entries(value)) {
        children.set(key, this.createAttachedChild(key, entry));
      }
      this.value = { kind: "map", children };
      return;
    }
    invalidNodeValueError.throw({
      path: describePath(this),
      value: describeKind(value),
    });
  }

  private createAttachedChild(key: NodeKey, value: unknown): N {
    const child = this.createNode(key, this.self());
    child.attached = true;
    if (value !== null && value !== undefined) {
      child.assignValue(value);
    }
    return child;
  }

  // Children of the previous value no longer belong to this node
  private clearValue(): void {
    if (this.value.kind === "list" || this.value.kind === "map") {
      for (const child of this.value.children.values()) {
        child.attached = false;
      }
    }
    this.value = NULL_VALUE;
  }

  private detach(): void {
    if (this.parent === null) {
      return;
    }
    this.parent.removeChildNode(this.self());
    this.attached = false;
  }

  private attachIfNecessary(): void {
    if (this.attached) {
      return;
    }
    if (this.parent === null) {
      this.attached = true;
      return;
    }
    this.parent.attachIfNecessary();
    this.parent.insertChild(this.self());
    this.attached = true;
  }

  private insertChild(child: N): void {
    const key = child.key;
    if (typeof key === "number" && this.value.kind !== "map") {
      if (this.value.kind !== "list") {
        this.clearValue();
        this.value = { kind: "list", children: [] };
      }
      const children = this.value.children;
      if (key === APPEND_KEY || key >= children.length) {
        child.key = children.length;
        children.push(child);
      } else {
        children[key].attached = false;
        children[key] = child;
      }
      return;
    }

    const mapKey = String(key);
    if (this.value.kind !== "map") {
      this.clearValue();
      this.value = { kind: "map", children: new Map<string, N>() };
    }
    const previous = this.value.children.get(mapKey);
    if (previous && previous !== child) {
      previous.attached = false;
    }
    this.value.children.set(mapKey, child);
  }

  private removeChildNode(child: N): void {
    if (this.value.kind === "list") {
      const children = this.value.children;
      const index = children.indexOf(child);
      if (index < 0) {
        return;
      }
      children.splice(index, 1);
      for (let i = index; i < children.length; i += 1) {
        children[i].key = i;
      }
      child.attached = false;
      return;
    }
    if (this.value.kind === "map") {
      const mapKey = String(child.key);
      if (this.value.children.get(mapKey) === child) {
        this.value.children.delete(mapKey);
        child.attached = false;
      }
    }
  }
}
