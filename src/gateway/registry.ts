import type { ParticipantActor } from "../participant/actor.js";
import type { ParticipantSnapshot } from "../participant/types.js";

/** Shared by every registry in the process so ids never repeat. */
let idCounter = 0;

export function nextParticipantId(): string {
  return `p-${++idCounter}`;
}

export type RegistryEntry =
  | { kind: "live"; actor: ParticipantActor }
  | { kind: "tombstone"; snapshot: ParticipantSnapshot };

/**
 * Live actors by id. A terminal actor is swapped for a tombstone holding its
 * final snapshot, so late commands still resolve against it.
 */
export class ParticipantRegistry {
  private live = new Map<string, ParticipantActor>();
  private tombstones = new Map<string, ParticipantSnapshot>();

  add(actor: ParticipantActor): void {
    this.live.set(actor.id, actor);
  }

  lookup(id: string): RegistryEntry | undefined {
    const actor = this.live.get(id);
    if (actor) return { kind: "live", actor };
    const snapshot = this.tombstones.get(id);
    if (snapshot) return { kind: "tombstone", snapshot };
    return undefined;
  }

  retire(id: string): void {
    const actor = this.live.get(id);
    if (!actor) return;
    this.live.delete(id);
    this.tombstones.set(id, actor.snapshot());
  }

  liveActors(): ParticipantActor[] {
    return [...this.live.values()];
  }

  /** Live and retired participants, in spawn order. */
  snapshots(): ParticipantSnapshot[] {
    const all = [...this.live.values()].map((actor) => actor.snapshot()).concat([...this.tombstones.values()]);
    return all.sort((a, b) => idNumber(a.id) - idNumber(b.id));
  }

  liveCount(): number {
    return this.live.size;
  }
}

function idNumber(id: string): number {
  return Number(id.slice(2));
}
