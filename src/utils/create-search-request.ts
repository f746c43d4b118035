import { FRAMES, type Frame } from "../types/request";
import type { BandCatalog } from "../types/config";
import type { SearchRequest, SearchRequestInput } from "../types/request";
import { InvalidRequestError, UnsupportedFrameError } from "./errors";
import { parseRadius } from "./parse-radius";

export function isFrame(name: string): name is Frame {
  return FRAMES.some((frame) => frame === name);
}

/**
 * Validate and freeze a search request against the band catalog
 * Bands default to every band the catalog knows
 */
export function createSearchRequest(
  input: SearchRequestInput,
  catalog: BandCatalog,
): SearchRequest {
  const { frame, lon, lat } = input.center;

  if (!isFrame(frame)) {
    throw new UnsupportedFrameError(frame);
  }
  if (!Number.isFinite(lon) || !Number.isFinite(lat) || Math.abs(lat) > 90) {
    throw new InvalidRequestError(
      `Invalid ${frame} position (${String(lon)}, ${String(lat)})`,
    );
  }

  const { radius, warning } = parseRadius(input.radius);

  const bands = [...new Set(input.bands ?? Object.keys(catalog))];
  const unknown = bands.filter((band) => !Object.hasOwn(catalog, band));
  if (unknown.length > 0) {
    throw new InvalidRequestError(
      `Unknown band(s): ${unknown.join(", ")} (known: ${Object.keys(catalog).join(", ")})`,
    );
  }
  if (bands.length === 0) {
    throw new InvalidRequestError("At least one band must be requested");
  }

  return Object.freeze({
    center: Object.freeze({ frame, lon, lat }),
    radius: Object.freeze(radius),
    bands: Object.freeze(bands),
    warnings: Object.freeze(warning ? [warning] : []),
  });
}
