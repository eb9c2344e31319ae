import { ConfigurationOptions } from "../config/ConfigurationOptions";
import { AbstractConfigurationNode } from "./AbstractConfigurationNode";
import type { NodeKey } from "./types";

/**
 * An in-memory configuration tree without comments.
 */
export class ConfigurationNode extends AbstractConfigurationNode<ConfigurationNode> {
  private constructor(
    key: NodeKey | null,
    parent: ConfigurationNode | null,
    options: ConfigurationOptions,
  ) {
    super(key, parent, options);
  }

  static root(
    options: ConfigurationOptions = ConfigurationOptions.defaults(),
  ): ConfigurationNode {
    return new ConfigurationNode(null, null, options);
  }

  protected self(): ConfigurationNode {
    return this;
  }

  protected createNode(
    key: NodeKey | null,
    parent: ConfigurationNode | null,
  ): ConfigurationNode {
    return new ConfigurationNode(key, parent, this.getOptions());
  }
}
