// Crisis Relay - Location Store
//
// Last-write-wins by device timestamp. Never-set is an explicit unknown
// reading, not a zero coordinate.

import type { LocationFix, LocationReading } from "./types.js";
import { InputError } from "./errors.js";

const UNKNOWN: LocationReading = Object.freeze({ known: false });

export class LocationStore {
  private latest: LocationFix | null = null;

  /**
   * Applies an update. Returns false when an equal-or-newer fix is already
   * held, so a late-arriving older fix never overwrites a newer one.
   * @throws InputError for coordinates outside the WGS84 range.
   */
  update(fix: LocationFix): boolean {
    validateFix(fix);
    if (this.latest && this.latest.timestamp >= fix.timestamp) {
      return false;
    }
    this.latest = Object.freeze({ lat: fix.lat, lon: fix.lon, timestamp: fix.timestamp });
    return true;
  }

  read(): LocationReading {
    return this.latest ? { known: true, fix: this.latest } : UNKNOWN;
  }
}

function validateFix(fix: LocationFix): void {
  if (!Number.isFinite(fix.lat) || fix.lat < -90 || fix.lat > 90) {
    throw new InputError(`Latitude out of range: ${fix.lat}`);
  }
  if (!Number.isFinite(fix.lon) || fix.lon < -180 || fix.lon > 180) {
    throw new InputError(`Longitude out of range: ${fix.lon}`);
  }
  if (!Number.isFinite(fix.timestamp)) {
    throw new InputError("Location timestamp must be a finite number");
  }
}

export function formatMapsLink(fix: LocationFix): string {
  return `https://maps.google.com/maps?q=${fix.lat},${fix.lon}`;
}
