import { z } from "zod";
import {
  InvalidMarkingError,
  MarkingOutOfRangeError,
  MissingAttributeError,
} from "./errors.js";
import { PetriNetModel } from "./model.js";
import { hasLocalName, localName } from "./tag.js";
import type { Arc, Place, Transition, XmlElement } from "./types.js";

const nodeAttributes = z.object({ id: z.string() });

const arcAttributes = z.object({
  id: z.string(),
  source: z.string(),
  target: z.string(),
});

const markingText = z.string().trim().regex(/^[+-]?\d+$/);

function* preOrder(pending: XmlElement[]): Generator<XmlElement> {
  let element: XmlElement | undefined;
  while ((element = pending.pop())) {
    yield element;
    for (let i = element.children.length - 1; i >= 0; i--) {
      const child = element.children[i];
      if (child) pending.push(child);
    }
  }
}

/** Yields `element` and every element below it, in document order. */
export function walk(element: XmlElement): Generator<XmlElement> {
  return preOrder([element]);
}

function descendants(element: XmlElement): Generator<XmlElement> {
  return preOrder([...element.children].reverse());
}

/** First element below `element` whose local name is `name`. */
export function findDescendant(
  element: XmlElement,
  name: string,
): XmlElement | undefined {
  for (const el of descendants(element)) {
    if (hasLocalName(el, name)) return el;
  }
  return undefined;
}

/** Last element below `element` (in document order) whose local name is `name`. */
export function findLastDescendant(
  element: XmlElement,
  name: string,
): XmlElement | undefined {
  let found: XmlElement | undefined;
  for (const el of descendants(element)) {
    if (hasLocalName(el, name)) found = el;
  }
  return found;
}

function readAttributes<T extends z.ZodRawShape>(
  element: XmlElement,
  schema: z.ZodObject<T>,
): z.infer<z.ZodObject<T>> {
  const result = schema.safeParse(element.attributes);
  if (!result.success) {
    const attribute = result.error.issues[0]?.path[0];
    throw new MissingAttributeError(localName(element.tag), String(attribute));
  }
  return result.data;
}

function readInitialMarking(place: XmlElement, placeId: string): number {
  const marking = place.children.find((child) =>
    localName(child.tag).toLowerCase().includes("initialmarking"),
  );
  if (!marking) return 0;

  const text = findDescendant(marking, "text");
  if (!text) return 0;

  const parsed = markingText.safeParse(text.text);
  if (!parsed.success) {
    throw new InvalidMarkingError(placeId, text.text.trim());
  }
  const value = Number(parsed.data);
  if (!Number.isSafeInteger(value)) {
    throw new MarkingOutOfRangeError(placeId, parsed.data);
  }
  return value;
}

function readPlace(element: XmlElement): Place {
  const { id } = readAttributes(element, nodeAttributes);
  const label = findDescendant(element, "name");
  const text = label && findDescendant(label, "text");
  const place: Place = { id, initialMarking: readInitialMarking(element, id) };
  if (text) place.name = text.text.trim();
  return place;
}

function readTransition(element: XmlElement): Transition {
  const { id } = readAttributes(element, nodeAttributes);
  // Any text below the transition counts, not only the one inside <name>
  const text = findLastDescendant(element, "text");
  const transition: Transition = { id };
  if (text) transition.name = text.text.trim();
  return transition;
}

function readArc(element: XmlElement): Arc {
  return readAttributes(element, arcAttributes);
}

/**
 * Builds a model from an XML tree in one pass over every element,
 * regardless of nesting depth or namespace. Fatal input errors
 * (missing attributes, duplicate ids, non-integer markings) are thrown
 * and no model is returned.
 */
export function parseModel(root: XmlElement): PetriNetModel {
  const model = new PetriNetModel();

  for (const element of walk(root)) {
    switch (localName(element.tag)) {
      case "place":
        model.addPlace(readPlace(element));
        break;
      case "transition":
        model.addTransition(readTransition(element));
        break;
      case "arc":
        model.addArc(readArc(element));
        break;
    }
  }

  return model;
}
