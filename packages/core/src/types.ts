/**
 * An element of a fully materialized XML tree. `tag` is in Clark notation
 * (`{uri}local`) when the element belongs to a namespace.
 */
export type XmlElement = {
  tag: string;
  attributes: Record<string, string>;
  /** Character data directly inside the element, children excluded. */
  text: string;
  children: XmlElement[];
};

export type Place = {
  id: string;
  name?: string;
  initialMarking: number;
};

export type Transition = {
  id: string;
  name?: string;
};

/** Source and target are free-text ids; they are resolved by the validator. */
export type Arc = {
  id: string;
  source: string;
  target: string;
};

export type FindingCode =
  | "unknown-arc-source"
  | "unknown-arc-target"
  | "non-binary-marking";

export type Finding = {
  severity: "error" | "warning";
  code: FindingCode;
  entity: { kind: "arc" | "place"; id: string };
  message: string;
};

export type ConsistencyResult = {
  errors: Finding[];
  warnings: Finding[];
};

export type ModelReport = ConsistencyResult & {
  counts: { places: number; transitions: number; arcs: number };
  markedPlaces: Pick<Place, "id" | "name">[];
};
