/*
  facetier — Landmark geometry

  Pose angles, jaw angle and facial proportions from the dense face mesh,
  plus the 0..100 pose and jawline scores built on them.

  Notes
  - Only x/y are used; z is carried for completeness.
  - Missing or short meshes give neutral defaults, never an exception.
*/

import type { Occlusions, Pose, Proportions } from "../types";
import { MeshIndex, SYMMETRY_PAIRS, dist2d, isUsableMesh, type Mesh } from "./landmarks";

const RAD_TO_DEG = 180 / Math.PI;

export const DEFAULT_POSE: Pose = { yaw: 0, pitch: 0, roll: 0 };

export const DEFAULT_JAW_ANGLE = 90;

export const DEFAULT_PROPORTIONS: Proportions = {
  jaw_angle: DEFAULT_JAW_ANGLE,
  eye_distance: 0,
  face_width: 0,
  face_height: 0,
  symmetry_score: 0,
  cheekbone_prominence: 0
};

/** Ideal jaw angle at the chin, degrees */
export const IDEAL_JAW_ANGLE = 70;

export function calculatePose(mesh: Mesh | null): Pose {
  if (!isUsableMesh(mesh)) return DEFAULT_POSE;

  const leftEye = mesh[MeshIndex.LEFT_EYE_OUTER];
  const rightEye = mesh[MeshIndex.RIGHT_EYE_OUTER];
  const nose = mesh[MeshIndex.NOSE_TIP];
  const chin = mesh[MeshIndex.CHIN];

  // roll: eye line vs horizontal
  const ex = rightEye.x - leftEye.x;
  const ey = rightEye.y - leftEye.y;
  const roll = Math.atan2(ey, ex) * RAD_TO_DEG;

  // pitch: vertical part of nose->chin vs its own length
  const vx = chin.x - nose.x;
  const vy = chin.y - nose.y;
  const pitch = Math.atan2(vy, Math.hypot(vx, vy)) * RAD_TO_DEG;

  // yaw: nose offset from eye center vs half the eye span
  const eyeCenterX = (leftEye.x + rightEye.x) / 2;
  const eyeWidth = Math.hypot(ex, ey);
  const yaw = Math.atan2(nose.x - eyeCenterX, eyeWidth / 2) * RAD_TO_DEG;

  return { yaw, pitch, roll };
}

/**
 * Angle at the chin between the two jaw corners. A zero-length arm has no
 * defined angle and falls back to DEFAULT_JAW_ANGLE.
 */
export function calculateJawAngle(mesh: Mesh | null): number {
  if (!isUsableMesh(mesh)) return DEFAULT_JAW_ANGLE;

  const chin = mesh[MeshIndex.CHIN];
  const l = mesh[MeshIndex.LEFT_JAW];
  const r = mesh[MeshIndex.RIGHT_JAW];

  const ax = l.x - chin.x;
  const ay = l.y - chin.y;
  const bx = r.x - chin.x;
  const by = r.y - chin.y;

  const denom = Math.hypot(ax, ay) * Math.hypot(bx, by);
  if (denom === 0) return DEFAULT_JAW_ANGLE;

  const cos = Math.max(-1, Math.min(1, (ax * bx + ay * by) / denom));
  return Math.acos(cos) * RAD_TO_DEG;
}

export function calculateProportions(mesh: Mesh | null): Proportions {
  if (!isUsableMesh(mesh)) return DEFAULT_PROPORTIONS;

  const leftJaw = mesh[MeshIndex.LEFT_JAW];
  const rightJaw = mesh[MeshIndex.RIGHT_JAW];

  const eye_distance = dist2d(mesh[MeshIndex.LEFT_EYE_OUTER], mesh[MeshIndex.RIGHT_EYE_OUTER]);
  const face_width = dist2d(leftJaw, rightJaw);
  const face_height = dist2d(mesh[MeshIndex.FOREHEAD], mesh[MeshIndex.CHIN]);

  // Mirror each right-side point across the jaw midline and compare with its left twin
  const centerX = (leftJaw.x + rightJaw.x) / 2;
  let distSum = 0;
  for (const [li, ri] of SYMMETRY_PAIRS) {
    const left = mesh[li];
    const right = mesh[ri];
    distSum += Math.hypot(left.x - (2 * centerX - right.x), left.y - right.y);
  }
  const avgDistance = distSum / SYMMETRY_PAIRS.length;
  const symmetry_score = face_width > 0 ? Math.max(0, 100 - (avgDistance / face_width) * 100) : 0;

  const cheekWidth = dist2d(mesh[MeshIndex.LEFT_CHEEKBONE], mesh[MeshIndex.RIGHT_CHEEKBONE]);
  const cheekbone_prominence = face_width > 0 ? (cheekWidth / face_width) * 100 : 0;

  return {
    jaw_angle: calculateJawAngle(mesh),
    eye_distance,
    face_width,
    face_height,
    symmetry_score,
    cheekbone_prominence
  };
}

// TODO: glasses via eye/eyebrow spacing, mask via mouth-region texture
export function detectOcclusions(_mesh: Mesh | null): Occlusions {
  return { glasses: false, mask: false, hand: false };
}

function anglePenalty(deg: number): number {
  return Math.max(0, 100 - Math.abs(deg) * 2);
}

/** 0..100, 100 for a frontal, level face */
export function poseScore(pose: Pose): number {
  return anglePenalty(pose.yaw) * 0.4 + anglePenalty(pose.pitch) * 0.4 + anglePenalty(pose.roll) * 0.2;
}

/** 0..100 */
export function jawlineScore(proportions: Proportions): number {
  return anglePenalty(proportions.jaw_angle - IDEAL_JAW_ANGLE) * 0.6 + proportions.symmetry_score * 0.4;
}
