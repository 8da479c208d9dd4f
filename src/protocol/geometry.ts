import type { Geometry } from "./types";

/** Disk formats the FDC+ serial modes transfer; 137-byte sectors, 32 or 16 per track. */
export const GEOMETRIES: readonly Geometry[] = [
  {
    id: "8inch",
    label: "8 Inch",
    trackLength: 137 * 32,
    trackCount: 77
  },
  {
    id: "minidisk",
    label: "Minidisk",
    trackLength: 137 * 16,
    trackCount: 35
  }
];

export const DEFAULT_GEOMETRY = GEOMETRIES[0];

/** Looks up a preset by id, falling back to 8-inch for unknown ids. */
export function findGeometry(id: string): Geometry {
  return GEOMETRIES.find((geometry) => geometry.id === id) ?? DEFAULT_GEOMETRY;
}
