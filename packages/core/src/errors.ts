/** Base class for every fatal error raised while reading a PNML document. */
export class PnmlError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PnmlError";
  }
}

/** Thrown when the document is not well-formed XML. */
export class XmlSyntaxError extends PnmlError {
  readonly line: number;
  readonly column: number;
  readonly reason: string;

  constructor(line: number, column: number, reason: string) {
    super(`Malformed XML at line ${line}, column ${column}: ${reason}`);
    this.name = "XmlSyntaxError";
    this.line = line;
    this.column = column;
    this.reason = reason;
  }
}

export class MissingAttributeError extends PnmlError {
  readonly element: string;
  readonly attribute: string;

  constructor(element: string, attribute: string) {
    super(`<${element}> element is missing required attribute "${attribute}"`);
    this.name = "MissingAttributeError";
    this.element = element;
    this.attribute = attribute;
  }
}

export type NodeKind = "place" | "transition";

/** Thrown when a place or transition id is declared twice. */
export class DuplicateIdError extends PnmlError {
  readonly kind: NodeKind;
  readonly id: string;

  constructor(kind: NodeKind, id: string) {
    super(`Duplicate ${kind} id: ${id}`);
    this.name = "DuplicateIdError";
    this.kind = kind;
    this.id = id;
  }
}

export class InvalidMarkingError extends PnmlError {
  readonly placeId: string;
  readonly text: string;

  constructor(placeId: string, text: string) {
    super(`Place ${placeId} has non-integer initial marking "${text}"`);
    this.name = "InvalidMarkingError";
    this.placeId = placeId;
    this.text = text;
  }
}

/** Thrown when an integer marking cannot be held exactly as a number. */
export class MarkingOutOfRangeError extends PnmlError {
  readonly placeId: string;
  readonly text: string;

  constructor(placeId: string, text: string) {
    super(`Place ${placeId} has initial marking ${text} outside the safe integer range`);
    this.name = "MarkingOutOfRangeError";
    this.placeId = placeId;
    this.text = text;
  }
}
