import sax from "sax";
import type { QualifiedAttribute, QualifiedName, QualifiedTag, Tag } from "sax";
import { XmlSyntaxError } from "./errors.js";
import type { XmlElement } from "./types.js";

const XMLNS_URI = "http://www.w3.org/2000/xmlns/";

function clarkName(name: QualifiedName): string {
  return name.uri ? `{${name.uri}}${name.local}` : name.local;
}

function readAttributes(tag: Tag | QualifiedTag): Record<string, string> {
  const attrs: Record<string, string> = {};
  const entries: [string, string | QualifiedAttribute][] = Object.entries(tag.attributes);
  for (const [key, attr] of entries) {
    if (typeof attr === "string") {
      attrs[key] = attr;
      continue;
    }
    // Namespace declarations are bindings, not attributes
    if (attr.uri === XMLNS_URI || attr.name === "xmlns") continue;
    attrs[clarkName(attr)] = attr.value;
  }
  return attrs;
}

/**
 * Builds the complete element tree of an XML document. Uses sax in strict,
 * namespace-aware mode; the whole document is read before anything is
 * returned.
 */
export function buildTree(text: string): XmlElement {
  const parser = sax.parser(true, { xmlns: true });
  const stack: XmlElement[] = [];
  let root: XmlElement | undefined;

  parser.onerror = (err: Error) => {
    // sax appends "\nLine: ..\nColumn: ..\nChar: .." to its messages
    const reason = err.message.split("\n")[0] ?? err.message;
    throw new XmlSyntaxError(parser.line + 1, parser.column + 1, reason);
  };

  parser.onopentag = (tag: Tag | QualifiedTag) => {
    const element: XmlElement = {
      tag: "uri" in tag ? clarkName(tag) : tag.name,
      attributes: readAttributes(tag),
      text: "",
      children: [],
    };
    const parent = stack[stack.length - 1];
    if (parent) {
      parent.children.push(element);
    } else if (root) {
      throw new XmlSyntaxError(parser.line + 1, parser.column + 1, "Junk after document element");
    } else {
      root = element;
    }
    stack.push(element);
  };

  parser.onclosetag = () => {
    stack.pop();
  };

  // Only character data before the first child belongs to an element
  const appendText = (t: string) => {
    const current = stack[stack.length - 1];
    if (current && current.children.length === 0) current.text += t;
  };
  parser.ontext = appendText;
  parser.oncdata = appendText;

  parser.write(text).close();

  if (!root) {
    throw new XmlSyntaxError(parser.line + 1, parser.column + 1, "Document has no root element");
  }
  return root;
}
