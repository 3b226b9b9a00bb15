import type { PetriNetModel } from "./model.js";
import type { ConsistencyResult, Finding } from "./types.js";

/**
 * Checks a parsed model without modifying it.
 *
 * Errors: arc endpoints that name neither a place nor a transition, one
 * finding per missing endpoint (source before target, arcs in document
 * order). Warnings: places whose initial marking is not 0 or 1.
 */
export function checkConsistency(model: PetriNetModel): ConsistencyResult {
  const errors: Finding[] = [];
  const warnings: Finding[] = [];

  for (const arc of model.arcs) {
    if (!model.hasNode(arc.source)) {
      errors.push({
        severity: "error",
        code: "unknown-arc-source",
        entity: { kind: "arc", id: arc.id },
        message: `Arc ${arc.id} has unknown source ${arc.source}`,
      });
    }
    if (!model.hasNode(arc.target)) {
      errors.push({
        severity: "error",
        code: "unknown-arc-target",
        entity: { kind: "arc", id: arc.id },
        message: `Arc ${arc.id} has unknown target ${arc.target}`,
      });
    }
  }

  for (const place of model.places.values()) {
    if (place.initialMarking !== 0 && place.initialMarking !== 1) {
      warnings.push({
        severity: "warning",
        code: "non-binary-marking",
        entity: { kind: "place", id: place.id },
        message: `Place ${place.id} has marking ${place.initialMarking} (not 0/1)`,
      });
    }
  }

  return { errors, warnings };
}
