// Types
export type {
  XmlElement,
  Place,
  Transition,
  Arc,
  Finding,
  FindingCode,
  ConsistencyResult,
  ModelReport,
} from "./types.js";

// Errors
export {
  PnmlError,
  XmlSyntaxError,
  MissingAttributeError,
  DuplicateIdError,
  InvalidMarkingError,
  MarkingOutOfRangeError,
} from "./errors.js";
export type { NodeKind } from "./errors.js";

// Tag resolution and tree building
export { localName, hasLocalName } from "./tag.js";
export { buildTree } from "./xml.js";

// Model, parsing and validation
export { PetriNetModel } from "./model.js";
export { parseModel, walk, findDescendant, findLastDescendant } from "./parser.js";
export { checkConsistency } from "./validate.js";
export { summarize, hasFindings } from "./report.js";
export { parsePnml, loadPnmlFile } from "./load.js";
