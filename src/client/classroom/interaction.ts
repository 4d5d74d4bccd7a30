/**
 * Proximity rule for the "press E" interaction: the nearest element whose
 * centre lies strictly within the radius of the player's position.
 */
export const INTERACTION_RADIUS = 50;

export type InteractableKind = "seat" | "blackboard" | "teacher_desk" | "door";

export interface Interactable {
  /** Seat id for seats, an element id otherwise */
  id: string;
  kind: InteractableKind;
  label: string;
  centerX: number;
  centerY: number;
}

export function findNearestInteractable(
  x: number,
  y: number,
  items: readonly Interactable[],
  radius: number = INTERACTION_RADIUS,
): Interactable | null {
  let nearest: Interactable | null = null;
  let nearestDistance = radius;

  for (const item of items) {
    const distance = Math.hypot(item.centerX - x, item.centerY - y);
    if (distance < nearestDistance) {
      nearest = item;
      nearestDistance = distance;
    }
  }

  return nearest;
}
