import {
  CommentedConfigurationNode,
  ConfigurationOptions,
  ObjectMapper,
  TypeTokens,
  serializable,
} from "../src/index";

// A read-mostly configuration: load it from a tree, change it, write it back.

class Section {
  name?: string;
  id?: string;
}

const SectionType = serializable(Section)
  .factory(() => new Section())
  .setting("name", TypeTokens.string)
  .setting("id", TypeTokens.uuid)
  .build();

class MyConfiguration {
  // Keys normally come from the field name but can be overridden
  itemName?: string;
  // Defaults are whatever the factory leaves in the field
  filter: RegExp = /cars?/;
  sections: Section[] = [];

  static loadFrom(node: CommentedConfigurationNode): MyConfiguration {
    return MAPPER.bindToNew().populate(node);
  }

  saveTo(node: CommentedConfigurationNode): void {
    MAPPER.bind(this).serialize(node);
  }
}

const MyConfigurationType = serializable(MyConfiguration)
  .factory(() => new MyConfiguration())
  .setting("itemName", TypeTokens.string, { path: "item-name" })
  .setting("filter", TypeTokens.pattern, {
    comment: "Here is a comment to describe the purpose of this field",
  })
  .setting("sections", TypeTokens.listOf(SectionType.type))
  .build();

// Held on to: mappers are built once per type
const MAPPER = ObjectMapper.forClass(MyConfigurationType);

/**
 * Loads `source` (plain data as a parser would produce it), renames the item
 * and returns the updated tree.
 */
export function runExample(source: Record<string, unknown>) {
  const node = CommentedConfigurationNode.root(
    ConfigurationOptions.defaults({ copyDefaults: true }),
  ).setValue(source);

  const config = MyConfiguration.loadFrom(node);
  config.itemName = "Steve";
  config.saveTo(node);

  return { config, node };
}

export { MyConfiguration, Section };

if (require.main === module) {
  const { node } = runExample({
    sections: [
      { name: "north", id: "00000000-0000-4000-8000-000000000001" },
    ],
  });
  console.log(JSON.stringify(node.getValue(), null, 2));
}
