/**
 * GPIO Module - Pure Transformations
 */
import type { Edge } from "./schema.js";

/**
 * Whether a level change from `previous` to `next` fires a handler
 * registered for `edge`.
 */
export function matchesEdge(edge: Edge, previous: boolean, next: boolean): boolean {
  if (previous === next) return false;

  switch (edge) {
    case "rising":
      return next;
    case "falling":
      return !next;
    case "both":
      return true;
  }
}

/**
 * Debounce window check. A change within `debounceMs` of the last accepted
 * edge is treated as bounce.
 */
export function isBounce(
  lastAcceptedAt: number | null,
  now: number,
  debounceMs: number,
): boolean {
  return lastAcceptedAt !== null && now - lastAcceptedAt < debounceMs;
}
