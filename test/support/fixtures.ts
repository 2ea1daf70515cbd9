import { pino } from "pino";
import { ZipGeocoder } from "../../services/geo/geocoder.js";
import type { Candidate, CandidateRow } from "../../services/search/types.js";

export const silentLog = pino({ level: "silent" });

export const DRG_470 = "470 - MAJOR JOINT REPLACEMENT OR REATTACHMENT OF LOWER EXTREMITY W/O MCC";
export const DRG_291 = "291 - HEART FAILURE AND SHOCK W MCC";

/** Origin used throughout: ZIP 10001. */
export const ORIGIN = { postalCode: "10001", lat: 40.7506, lon: -73.9972 };

export const testGeocoder = new ZipGeocoder([
  { zip: "10001", lat: 40.7506, lon: -73.9972, city: "New York", state: "NY" },
  { zip: "11201", lat: 40.6947, lon: -73.9904, city: "Brooklyn", state: "NY" },
]);

function row(
  providerId: string,
  name: string,
  lat: number,
  lon: number,
  procedureText: string,
  averageCost: number | null,
  rating: number | null
): CandidateRow {
  return {
    providerId,
    name,
    city: "New York",
    state: "NY",
    postalCode: "10001",
    lat,
    lon,
    procedureText,
    totalDischarges: 25,
    averageCost,
    averageTotalPayments: averageCost === null ? null : Math.round(averageCost / 4),
    averageMedicarePayments: null,
    rating,
  };
}

/**
 * Distances from ORIGIN:
 * 330001 2.30 km · 330002 10.10 km · 330003 50.00 km (outside the 40 km box)
 * 330004 47.36 km (inside the box, outside 40 km) · 330005 6.24 km
 * 330006 5.56 km · 330007 6.50 km
 */
export const ROWS: CandidateRow[] = [
  row("330001", "Chelsea General Hospital", 40.7713, -73.9972, DRG_470, 84621, 7),
  row("330002", "Harlem Medical Center", 40.8414, -73.9972, DRG_470, 70000, 9),
  row("330002", "Harlem Medical Center", 40.8414, -73.9972, DRG_291, 52000, 9),
  row("330003", "Westchester Regional", 41.2003, -73.9972, DRG_470, 60000, 10),
  row("330004", "Queens Corner Hospital", 41.0506, -73.5972, DRG_470, 55000, 8),
  row("330005", "Brooklyn Heart Center", 40.6947, -73.9904, DRG_291, 45000, null),
  row("330006", "Lower Manhattan Hospital", 40.7006, -73.9972, DRG_470, 70000, null),
  row("330007", "East River Clinic", 40.7506, -73.92, DRG_470, null, 9),
];

/** Three providers at 2.3, 10.1 and 50.0 km costing 84621, 70000 and 60000. */
export const THREE_PROVIDERS: CandidateRow[] = ROWS.filter(
  (r) => r.procedureText === DRG_470 && ["330001", "330002", "330003"].includes(r.providerId)
);

export function candidate(overrides: Partial<Candidate> & { providerId: string }): Candidate {
  return {
    name: `Provider ${overrides.providerId}`,
    city: null,
    state: null,
    postalCode: null,
    lat: ORIGIN.lat,
    lon: ORIGIN.lon,
    procedureText: DRG_470,
    totalDischarges: null,
    averageCost: null,
    averageTotalPayments: null,
    averageMedicarePayments: null,
    rating: null,
    distanceKm: 0,
    ...overrides,
  };
}
