import type { ConfigurationOptions } from "../config/ConfigurationOptions";

export type NodeKey = string | number;

/**
 * The node contract serializers and the object mapper work against.
 */
export interface ConfigNode {
  getKey(): NodeKey | null;
  /** Keys from the root down to this node; empty for a root */
  getPath(): NodeKey[];
  getOptions(): ConfigurationOptions;
  /** True until something is written to or under the node */
  isVirtual(): boolean;
  getNode(...path: NodeKey[]): ConfigNode;
  getValue(defaultValue?: unknown): unknown;
  /** `null`/`undefined` empties the node and detaches it from its parent */
  setValue(value: unknown): ConfigNode;
  getString(defaultValue?: string): string | undefined;
  getInt(defaultValue?: number): number | undefined;
  getLong(defaultValue?: number): number | undefined;
  getFloat(defaultValue?: number): number | undefined;
  getDouble(defaultValue?: number): number | undefined;
  getBoolean(defaultValue?: boolean): boolean | undefined;
  hasListChildren(): boolean;
  hasMapChildren(): boolean;
  getChildrenList(): readonly ConfigNode[];
  getChildrenMap(): ReadonlyMap<string, ConfigNode>;
  /** A virtual node that becomes the list's last entry when written */
  getAppendedNode(): ConfigNode;
  removeChild(key: NodeKey): boolean;
  /** A detached root sharing this node's options */
  createRoot(): ConfigNode;
}

export interface CommentedNode extends ConfigNode {
  getComment(): string | undefined;
  setComment(comment: string | undefined): CommentedNode;
  setCommentIfAbsent(comment: string): CommentedNode;
}

export function isCommentedNode(node: ConfigNode): node is CommentedNode {
  return "setCommentIfAbsent" in node && "getComment" in node;
}

/** Dotted path for messages; `<root>` for a root */
export function describePath(node: ConfigNode): string {
  const path = node.getPath();
  return path.length === 0 ? "<root>" : path.join(".");
}
