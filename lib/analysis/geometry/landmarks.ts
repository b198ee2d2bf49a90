/*
  facetier — Face mesh topology

  Indices into the 468-point face mesh (478 with refined irises; the extra
  iris points sit at the end, so every index below is shared).
*/

import type { Point3D } from "../types";

export const MESH_POINT_COUNT = 468;

export const MeshIndex = {
  LEFT_EYE_OUTER: 33,
  LEFT_EYE_INNER: 133,
  RIGHT_EYE_OUTER: 263,
  RIGHT_EYE_INNER: 362,
  NOSE_TIP: 4,
  LEFT_MOUTH: 61,
  RIGHT_MOUTH: 291,
  CHIN: 152,
  LEFT_JAW: 172,
  RIGHT_JAW: 397,
  LEFT_CHEEKBONE: 116,
  RIGHT_CHEEKBONE: 345,
  FOREHEAD: 10
} as const;

/** Left/right pairs compared by the symmetry score */
export const SYMMETRY_PAIRS: ReadonlyArray<readonly [number, number]> = [
  [MeshIndex.LEFT_EYE_OUTER, MeshIndex.RIGHT_EYE_OUTER],
  [MeshIndex.LEFT_JAW, MeshIndex.RIGHT_JAW],
  [MeshIndex.LEFT_MOUTH, MeshIndex.RIGHT_MOUTH],
  [MeshIndex.LEFT_CHEEKBONE, MeshIndex.RIGHT_CHEEKBONE]
];

export type Mesh = ReadonlyArray<Point3D>;

export function isUsableMesh(mesh: Mesh | null | undefined): mesh is Mesh {
  return Array.isArray(mesh) && mesh.length >= MESH_POINT_COUNT;
}

export function dist2d(a: Point3D, b: Point3D): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}
