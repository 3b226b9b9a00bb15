import type { PetriNetModel } from "./model.js";
import type { ModelReport } from "./types.js";
import { checkConsistency } from "./validate.js";

/** Everything a renderer needs: counts, places marked 1, and the findings. */
export function summarize(model: PetriNetModel): ModelReport {
  const markedPlaces: ModelReport["markedPlaces"] = [];
  for (const place of model.places.values()) {
    if (place.initialMarking === 1) {
      markedPlaces.push(
        place.name === undefined ? { id: place.id } : { id: place.id, name: place.name },
      );
    }
  }

  return {
    counts: {
      places: model.places.size,
      transitions: model.transitions.size,
      arcs: model.arcs.length,
    },
    markedPlaces,
    ...checkConsistency(model),
  };
}

export function hasFindings(report: ModelReport): boolean {
  return report.errors.length > 0 || report.warnings.length > 0;
}
