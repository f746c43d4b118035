/**
 * Search request type definitions
 */

export const FRAMES = ["fk5", "galactic"] as const;

export type Frame = (typeof FRAMES)[number];

export type AngularUnit = "arcsec" | "arcmin" | "deg";

export interface AngularQuantity {
  value: number;
  unit: AngularUnit;
}

/**
 * Search radius as callers hand it over
 * Bare numbers (and unit-less strings) are read as arc-minutes
 */
export type RadiusInput = number | string | AngularQuantity;

export interface SkyPosition {
  frame: Frame;
  lon: number; // Decimal degrees (RA for fk5, l for galactic)
  lat: number; // Decimal degrees (Dec for fk5, b for galactic)
}

export type BandName = string;

export interface SearchRequestInput {
  center: { frame: string; lon: number; lat: number };
  radius: RadiusInput;
  bands?: readonly BandName[];
}

export type SearchRequest = Readonly<{
  center: Readonly<SkyPosition>;
  radius: Readonly<AngularQuantity>; // Always in arc-minutes
  bands: readonly BandName[];
  warnings: readonly string[];
}>;
