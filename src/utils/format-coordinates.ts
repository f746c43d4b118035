import type { SkyPosition } from "../types/request";

/**
 * Coordinate text as typed into the form: "<lon> <lat>" in decimal degrees
 *
 * @example
 * formatCoordinates({ frame: "galactic", lon: 35.39, lat: -0.33 })
 * // "35.3900 -0.3300"
 */
export function formatCoordinates(position: SkyPosition): string {
  const lon = ((position.lon % 360) + 360) % 360;
  return `${lon.toFixed(4)} ${position.lat.toFixed(4)}`;
}
