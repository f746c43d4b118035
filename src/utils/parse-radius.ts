import { InvalidRequestError } from "./errors";
import type {
  AngularQuantity,
  AngularUnit,
  RadiusInput,
} from "../types/request";

export interface ParsedRadius {
  radius: AngularQuantity; // Always in arc-minutes
  warning?: string;
}

export const MISSING_UNIT_WARNING =
  "radius doesn't have units, assuming arcminutes";

const UNIT_ALIASES: Record<string, AngularUnit> = {
  arcsec: "arcsec",
  '"': "arcsec",
  arcmin: "arcmin",
  "'": "arcmin",
  deg: "deg",
  d: "deg",
  "°": "deg",
};

const RADIUS_PATTERN =
  /^\s*([+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?)\s*(arcsec|arcmin|deg|d|°|"|')?\s*$/i;

function toArcmin(value: number, unit: AngularUnit): number {
  switch (unit) {
    case "arcsec":
      return value / 60;
    case "arcmin":
      return value;
    case "deg":
      return value * 60;
  }
}

/**
 * Normalize a search radius to arc-minutes
 *
 * @example
 * parseRadius(30)            // 30 arcmin, with a missing-unit warning
 * parseRadius("0.5deg")      // 30 arcmin
 * parseRadius({ value: 1800, unit: "arcsec" }) // 30 arcmin
 */
export function parseRadius(input: RadiusInput): ParsedRadius {
  let value: number;
  let unit: AngularUnit | undefined;

  if (typeof input === "number") {
    value = input;
  } else if (typeof input === "string") {
    const match = input.match(RADIUS_PATTERN);
    if (!match) {
      throw new InvalidRequestError(`Cannot parse radius "${input}"`);
    }
    value = Number(match[1]);
    unit = match[2] ? UNIT_ALIASES[match[2].toLowerCase()] : undefined;
  } else {
    value = input.value;
    unit = input.unit;
  }

  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidRequestError(
      `Search radius must be a positive angle, got ${String(value)}`,
    );
  }

  return {
    radius: { value: toArcmin(value, unit ?? "arcmin"), unit: "arcmin" },
    warning: unit ? undefined : MISSING_UNIT_WARNING,
  };
}

/**
 * Radius text as typed into the form (arc-minutes, no unit)
 */
export function formatRadius(radius: AngularQuantity): string {
  return String(toArcmin(radius.value, radius.unit));
}
