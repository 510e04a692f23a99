import { BoundingBox, SlotLayoutParams, SlotRegion } from "../../shared/types";

/**
 * Splits the bounding box into `slotCount` equal columns separated by
 * `gapPixels`. Widths use floor division, so the last slot can stop a few
 * pixels short of the right edge.
 */
export function computeSlotLayout(
  box: Pick<BoundingBox, "width" | "height">,
  params: SlotLayoutParams
): SlotRegion[] {
  const count = Math.max(0, Math.floor(params.slotCount));
  if (count === 0) {
    return [];
  }
  const gap = Math.max(0, Math.floor(params.gapPixels));
  const slotWidth = Math.max(1, Math.floor((box.width - (count - 1) * gap) / count));
  const slotHeight = Math.max(1, box.height);

  const regions: SlotRegion[] = [];
  for (let index = 0; index < count; index += 1) {
    regions.push({
      index,
      x: index * (slotWidth + gap),
      y: 0,
      width: slotWidth,
      height: slotHeight
    });
  }
  return regions;
}

/** Region actually sampled for a slot: the slot inset by `padding` on every side. */
export function applySlotPadding(region: SlotRegion, padding: number): SlotRegion {
  const pad = Math.max(0, Math.floor(padding));
  return {
    index: region.index,
    x: region.x + pad,
    y: region.y + pad,
    width: Math.max(1, region.width - 2 * pad),
    height: Math.max(1, region.height - 2 * pad)
  };
}

export function layoutParamsChanged(previous: SlotLayoutParams, next: SlotLayoutParams): boolean {
  return (
    previous.slotCount !== next.slotCount ||
    previous.gapPixels !== next.gapPixels ||
    previous.padding !== next.padding
  );
}
