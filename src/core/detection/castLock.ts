import { SlotRefineInput, SlotRefinement, SlotStateExtension } from "./detectionTypes";

export interface CastSignal {
  active: boolean;
  endsAt: number | null;
}

/**
 * Holds READY slots as LOCKED while an external cast signal is raised, so
 * nothing is dispatched into an ongoing cast.
 */
export class CastLockExtension implements SlotStateExtension {
  readonly name = "cast-lock";

  constructor(
    private readonly readCast: (now: number) => CastSignal,
    private enabled = true
  ) {}

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  refine(input: SlotRefineInput): SlotRefinement | null {
    if (!this.enabled || input.state !== "ready") {
      return null;
    }
    const cast = this.readCast(input.now);
    if (!cast.active) {
      return null;
    }
    return { state: "locked", castEndsAt: cast.endsAt };
  }
}
