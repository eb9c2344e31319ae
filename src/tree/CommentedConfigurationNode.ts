import { ConfigurationOptions } from "../config/ConfigurationOptions";
import { AbstractConfigurationNode } from "./AbstractConfigurationNode";
import { isCommentedNode, type CommentedNode, type NodeKey } from "./types";

export class CommentedConfigurationNode
  extends AbstractConfigurationNode<CommentedConfigurationNode>
  implements CommentedNode
{
  private comment: string | undefined;

  private constructor(
    key: NodeKey | null,
    parent: CommentedConfigurationNode | null,
    options: ConfigurationOptions,
  ) {
    super(key, parent, options);
  }

  static root(
    options: ConfigurationOptions = ConfigurationOptions.defaults(),
  ): CommentedConfigurationNode {
    const root = new CommentedConfigurationNode(null, null, options);
    root.comment = options.header;
    return root;
  }

  getComment(): string | undefined {
    return this.comment;
  }

  setComment(comment: string | undefined): this {
    this.comment = comment;
    return this;
  }

  setCommentIfAbsent(comment: string): this {
    if (this.comment === undefined) {
      this.comment = comment;
    }
    return this;
  }

  // Copying from another commented node also carries its comment over
  setValue(value: unknown): this {
    if (
      value instanceof AbstractConfigurationNode &&
      isCommentedNode(value)
    ) {
      const comment = value.getComment();
      if (comment !== undefined) {
        this.setCommentIfAbsent(comment);
      }
    }
    return super.setValue(value);
  }

  protected self(): CommentedConfigurationNode {
    return this;
  }

  protected createNode(
    key: NodeKey | null,
    parent: CommentedConfigurationNode | null,
  ): CommentedConfigurationNode {
    return new CommentedConfigurationNode(key, parent, this.getOptions());
  }
}
