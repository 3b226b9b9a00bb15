import { DuplicateIdError } from "./errors.js";
import type { Arc, Place, Transition } from "./types.js";

/**
 * In-memory Petri net built from one PNML document. Places and transitions
 * are keyed by id (separate namespaces); arcs keep document order.
 */
export class PetriNetModel {
  readonly places = new Map<string, Place>();
  readonly transitions = new Map<string, Transition>();
  readonly arcs: Arc[] = [];

  addPlace(place: Place): void {
    if (this.places.has(place.id)) {
      throw new DuplicateIdError("place", place.id);
    }
    this.places.set(place.id, place);
  }

  addTransition(transition: Transition): void {
    if (this.transitions.has(transition.id)) {
      throw new DuplicateIdError("transition", transition.id);
    }
    this.transitions.set(transition.id, transition);
  }

  addArc(arc: Arc): void {
    this.arcs.push(arc);
  }

  /** True when `id` names a place or a transition. */
  hasNode(id: string): boolean {
    return this.places.has(id) || this.transitions.has(id);
  }
}
