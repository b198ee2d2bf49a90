/*
  facetier — Human-readable reason text

  Every user-facing string goes through a catalog so the same analysis can be
  rendered per locale. Keys are stable; wording may change.
*/

import type { Locale } from "./config";

export type MessageKey =
  | "sharpness_high"
  | "lighting_good"
  | "pose_good"
  | "jawline_strong"
  | "contrast_good"
  | "sharpness_low"
  | "lighting_low"
  | "pose_bad"
  | "jawline_weak"
  | "contrast_low"
  | "symmetry_low"
  | "no_face"
  | "empty_crop"
  | "decode_failed";

export interface MessageCatalog {
  readonly text: Readonly<Record<MessageKey, string>>;
  yaw(deg: number): string;
  pitch(deg: number): string;
  exposure(diff: number): string;
}

/** Ties go to the even neighbour: 10.5 -> 10, 11.5 -> 12 */
export function roundHalfEven(n: number): number {
  const lo = Math.floor(n);
  const frac = n - lo;
  if (frac > 0.5) return lo + 1;
  if (frac < 0.5) return lo;
  return lo % 2 === 0 ? lo : lo + 1;
}

function signed(n: number): string {
  const r = roundHalfEven(n);
  return r > 0 ? `+${r}` : `${r}`;
}

const EN: MessageCatalog = {
  text: {
    sharpness_high: "very high sharpness",
    lighting_good: "good lighting",
    pose_good: "good angle/pose",
    jawline_strong: "strong jawline",
    contrast_good: "sufficient contrast",
    sharpness_low: "low sharpness",
    lighting_low: "insufficient lighting",
    pose_bad: "suboptimal pose/angle",
    jawline_weak: "weak jawline",
    contrast_low: "low contrast",
    symmetry_low: "low facial symmetry",
    no_face: "no face detected",
    empty_crop: "could not extract face region",
    decode_failed: "could not load image"
  },
  yaw: (deg) => `head turned sideways (yaw≈${deg.toFixed(1)}°)`,
  pitch: (deg) => `head tilted (pitch≈${deg.toFixed(1)}°)`,
  exposure: (diff) => `exposure ${signed(diff)}`
};

const RU: MessageCatalog = {
  text: {
    sharpness_high: "очень высокая резкость",
    lighting_good: "хорошее освещение",
    pose_good: "удачный ракурс",
    jawline_strong: "выраженная линия челюсти",
    contrast_good: "достаточный контраст",
    sharpness_low: "низкая резкость",
    lighting_low: "недостаточное освещение",
    pose_bad: "неудачный ракурс",
    jawline_weak: "слабая линия челюсти",
    contrast_low: "низкий контраст",
    symmetry_low: "низкая симметрия лица",
    no_face: "лицо не обнаружено",
    empty_crop: "не удалось извлечь область лица",
    decode_failed: "не удалось загрузить изображение"
  },
  yaw: (deg) => `поворот головы в сторону (yaw≈${deg.toFixed(1)}°)`,
  pitch: (deg) => `наклон головы (pitch≈${deg.toFixed(1)}°)`,
  exposure: (diff) => `экспозиция ${signed(diff)}`
};

const CATALOGS: Readonly<Record<Locale, MessageCatalog>> = { en: EN, ru: RU };

export function messagesFor(locale: Locale): MessageCatalog {
  return CATALOGS[locale];
}
