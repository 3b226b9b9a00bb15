import type { XmlElement } from "./types.js";

/**
 * Drops a `{namespace-uri}` qualifier from a tag so that `{http://...}place`
 * and `place` compare equal. Unqualified tags pass through unchanged.
 */
export function localName(tag: string): string {
  const end = tag.indexOf("}");
  return end >= 0 ? tag.slice(end + 1) : tag;
}

export function hasLocalName(element: XmlElement, name: string): boolean {
  return localName(element.tag) === name;
}
