/**
 * Offline US ZIP geocoders.
 *
 * The default resolves against the US ZIP dataset bundled with the
 * `zipcodes` package. A custom JSON table (`[{ zip, lat, lon, city, state }]`)
 * can replace it; that table is read once at start-up and never refreshed.
 * Lookups are synchronous and do no I/O.
 */

import { readFileSync } from "node:fs";
import zipcodes from "zipcodes";
import { z } from "zod";
import type { GeoPoint } from "../search/types.js";

const ZIP5 = /^\d{5}$/;
const ZIP_PLUS4 = /^(\d{5})-\d{4}$/;

const ZipEntrySchema = z.object({
  zip: z.string().regex(ZIP5, "zip must be 5 digits"),
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
  city: z.string().optional(),
  state: z.string().optional(),
});

const ZipTableSchema = z.array(ZipEntrySchema);

export type ZipEntry = z.infer<typeof ZipEntrySchema>;

export interface Geocoder {
  /** Centroid of the postal code, or null when it is not in the table. */
  resolve(postalCode: string): GeoPoint | null;
}

/** Reduce `12345` / `12345-6789` to the 5-digit key; null when malformed. */
export function normalizeZip(postalCode: string): string | null {
  const s = postalCode.trim();
  if (ZIP5.test(s)) return s;
  const plus4 = ZIP_PLUS4.exec(s);
  return plus4?.[1] ?? null;
}

export class ZipGeocoder implements Geocoder {
  private readonly table: ReadonlyMap<string, Readonly<ZipEntry>>;

  constructor(entries: readonly ZipEntry[]) {
    const table = new Map<string, Readonly<ZipEntry>>();
    for (const entry of entries) {
      table.set(entry.zip, Object.freeze({ ...entry }));
    }
    this.table = table;
  }

  /** Load and validate the table; throws with the zod issues when the file is malformed. */
  static fromFile(path: string): ZipGeocoder {
    const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
    const parsed = ZipTableSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((i) => `${i.path.join(".") || "value"}: ${i.message}`)
        .join("; ");
      throw new Error(`Invalid geocoder table at ${path}: ${issues}`);
    }
    return new ZipGeocoder(parsed.data);
  }

  get size(): number {
    return this.table.size;
  }

  resolve(postalCode: string): GeoPoint | null {
    const zip = normalizeZip(postalCode);
    if (!zip) return null;
    const entry = this.table.get(zip);
    return entry ? { lat: entry.lat, lon: entry.lon } : null;
  }
}

/** Every US ZIP in the `zipcodes` dataset. */
export class BundledZipGeocoder implements Geocoder {
  resolve(postalCode: string): GeoPoint | null {
    const zip = normalizeZip(postalCode);
    if (!zip) return null;
    const entry = zipcodes.lookup(zip);
    if (!entry || !Number.isFinite(entry.latitude) || !Number.isFinite(entry.longitude)) return null;
    return { lat: entry.latitude, lon: entry.longitude };
  }
}

/** The custom table at `dataPath` when one is configured, the bundled dataset otherwise. */
export function createGeocoder(dataPath?: string): Geocoder {
  return dataPath ? ZipGeocoder.fromFile(dataPath) : new BundledZipGeocoder();
}
