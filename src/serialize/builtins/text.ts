/**
 * Serializers for values stored as text with a grammar of their own:
 * UUIDs, URI references, URLs and regular expressions.
 */

import { z } from "zod";
import { malformedLiteralError, valueAbsentError } from "../../errors";
import { describePath, type ConfigNode } from "../../tree/types";
import type { TypeSerializer } from "../TypeSerializer";

type LiteralKind = "UUID" | "URI" | "URL" | "Pattern";

const requireText = (node: ConfigNode): string => {
  const text = node.getString();
  if (text === undefined) {
    throw valueAbsentError.create({ path: describePath(node) });
  }
  return text;
};

const malformed = (
  kind: LiteralKind,
  node: ConfigNode,
  value: string,
  cause: unknown,
) =>
  malformedLiteralError.create(
    { kind, path: describePath(node), value },
    cause,
  );

const uuidSchema = z.string().uuid();

/** Stored and returned in canonical lower-case form */
export const uuidSerializer: TypeSerializer<string> = {
  deserialize: (_type, node) => {
    const text = requireText(node);
    const parsed = uuidSchema.safeParse(text);
    if (!parsed.success) {
      throw malformed("UUID", node, text, parsed.error);
    }
    return parsed.data.toLowerCase();
  },
  serialize: (_type, value, node) => {
    node.setValue(value.toLowerCase());
  },
};

// RFC 3986 characters, with percent signs only as %HH escapes
const URI_CHARACTERS = /^(?:[A-Za-z0-9\-._~:/?#[\]@!$&'()*+,;=]|%[0-9A-Fa-f]{2})*$/;
const URI_SCHEME = /^[A-Za-z][A-Za-z0-9+.-]*$/;

/**
 * Returns why `text` is not a URI reference, or undefined when it is one.
 */
export function checkUriReference(text: string): string | undefined {
  if (!URI_CHARACTERS.test(text)) {
    return "illegal character or malformed escape";
  }
  if (text.indexOf("#") !== text.lastIndexOf("#")) {
    return "more than one fragment";
  }
  const colon = text.indexOf(":");
  const delimiter = text.search(/[/?#]/);
  if (colon >= 0 && (delimiter < 0 || colon < delimiter)) {
    const scheme = text.slice(0, colon);
    if (!URI_SCHEME.test(scheme)) {
      return `illegal scheme "${scheme}"`;
    }
    if (colon === text.length - 1) {
      return "expected scheme-specific part";
    }
  }
  return undefined;
}

/** URI references (absolute or relative), kept as validated strings */
export const uriSerializer: TypeSerializer<string> = {
  deserialize: (_type, node) => {
    const text = requireText(node);
    const problem = checkUriReference(text);
    if (problem !== undefined) {
      throw malformed("URI", node, text, new SyntaxError(problem));
    }
    return text;
  },
  serialize: (_type, value, node) => {
    node.setValue(value);
  },
};

export const urlSerializer: TypeSerializer<URL> = {
  deserialize: (_type, node) => {
    const text = requireText(node);
    try {
      return new URL(text);
    } catch (error) {
      throw malformed("URL", node, text, error);
    }
  },
  serialize: (_type, value, node) => {
    node.setValue(value.href);
  },
};

export const patternSerializer: TypeSerializer<RegExp> = {
  deserialize: (_type, node) => {
    const text = requireText(node);
    try {
      return new RegExp(text);
    } catch (error) {
      throw malformed("Pattern", node, text, error);
    }
  },
  serialize: (_type, value, node) => {
    node.setValue(value.source);
  },
};
