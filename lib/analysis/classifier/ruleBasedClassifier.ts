/*
  facetier — Rule ladder classifier

  Decision order (first match wins)
  1. Hero override     strong sharpness + jawline + pose -> mogged / sigma
  2. Trash override    several very bad axes, or low composite with a blur/dark tag
  3. meh               composite below meh floor
  4. average           composite below average floor, or a weak axis
  5. Tiers             god -> mogged -> sigma, composite + per-axis floors
  6. Fallback          average / meh

  Hero "mogged" confidence is its base shifted by (composite - pivot) / span
  and is not lifted back to base below the pivot. Every confidence is finally
  bounded to [0, 1].
*/

import { AXIS_NAMES, buildAnalysisConfig, type AnalysisConfig, type AxisName, type StyleLabel } from "../config";
import { messagesFor, type MessageCatalog, type MessageKey } from "../messages";
import type { AxisScores, ClassificationResult } from "../types";
import type { StyleClassifier } from "./styleClassifier";

const LIGHT_PENALTY_AXES: ReadonlySet<AxisName> = new Set<AxisName>(["lighting", "contrast"]);

const POSITIVE_KEYS: Readonly<Record<AxisName, MessageKey>> = {
  sharpness: "sharpness_high",
  lighting: "lighting_good",
  pose: "pose_good",
  jawline: "jawline_strong",
  contrast: "contrast_good"
};

const NEGATIVE_KEYS: Readonly<Record<AxisName, MessageKey>> = {
  sharpness: "sharpness_low",
  lighting: "lighting_low",
  pose: "pose_bad",
  jawline: "jawline_weak",
  contrast: "contrast_low"
};

function clamp(v: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, v));
}

function clamp01(v: number): number {
  if (!Number.isFinite(v)) return 0;
  return clamp(v, 0, 1);
}

function minAxis(axes: AxisScores): number {
  return Math.min(...AXIS_NAMES.map((k) => axes[k]));
}

export class RuleBasedClassifier implements StyleClassifier {
  readonly kind = "rule_based";
  private readonly messages: MessageCatalog;

  constructor(private readonly config: AnalysisConfig = buildAnalysisConfig()) {
    this.messages = messagesFor(config.locale);
  }

  /**
   * Weighted sum over clamped axes minus a running penalty. The penalty cap
   * grows with the number of penalized axes seen so far and is re-applied
   * after every axis, not once at the end.
   */
  composite(axes: AxisScores): number {
    const c = this.config.classifier;
    const p = c.penalty;

    let score = 0;
    for (const k of AXIS_NAMES) score += c.weights[k] * clamp(axes[k], 0, 100);

    let penalties = 0;
    let penalized = 0;
    for (const k of AXIS_NAMES) {
      const v = axes[k];
      const light = LIGHT_PENALTY_AXES.has(k);
      if (v < p.soft_threshold) {
        penalized += 1;
        penalties += (p.soft_threshold - v) * (light ? p.soft_factor_light : p.soft_factor);
      }
      if (v < p.hard_threshold) {
        penalties += (p.hard_threshold - v) * (light ? p.hard_factor_light : p.hard_factor);
      }
      if (penalized > 0) {
        penalties = Math.min(penalties, p.cap_base + p.cap_per_extra_axis * (penalized - 1));
      }
    }

    return clamp(score - penalties, 0, 100);
  }

  tags(axes: AxisScores): string[] {
    const th = this.config.classifier.tags;
    const tags: string[] = [];
    if (axes.sharpness < th.very_blurry) tags.push("very_blurry");
    else if (axes.sharpness < th.blurry) tags.push("blurry");
    if (axes.lighting < th.dark) tags.push("dark");
    if (axes.lighting > th.overexposed) tags.push("overexposed");
    if (axes.pose < th.bad_pose) tags.push("bad_pose");
    if (axes.jawline < th.weak_jaw) tags.push("weak_jaw");
    if (axes.contrast < th.low_contrast) tags.push("low_contrast");
    return tags;
  }

  reasons(axes: AxisScores): string[] {
    const { positive, negative } = this.config.classifier.reasons;
    const pos: string[] = [];
    const neg: string[] = [];
    for (const k of AXIS_NAMES) {
      if (axes[k] >= positive[k]) pos.push(this.messages.text[POSITIVE_KEYS[k]]);
      if (axes[k] < negative[k]) neg.push(this.messages.text[NEGATIVE_KEYS[k]]);
    }
    return [...pos, ...neg];
  }

  classify(axes: AxisScores): ClassificationResult {
    const c = this.config.classifier;
    const tags = this.tags(axes);
    const reasons = this.reasons(axes);
    const composite = this.composite(axes);
    const weakest = minAxis(axes);

    const result = (label: StyleLabel, confidence: number): ClassificationResult => ({
      label,
      confidence: clamp01(confidence),
      composite,
      tags,
      reasons
    });

    const conf = c.confidence;

    // 1. Hero override
    const hero = c.hero;
    if (axes.sharpness >= hero.sharpness && axes.jawline >= hero.jawline && axes.pose >= hero.pose) {
      if (
        composite >= hero.mogged_composite ||
        (axes.sharpness >= hero.mogged_sharpness && axes.jawline >= hero.mogged_jawline)
      ) {
        const m = conf.hero_mogged;
        return result("mogged", Math.min(m.ceiling, m.base + Math.min(m.max_gain, (composite - m.pivot) / m.span)));
      }
      const s = conf.hero_sigma;
      return result(
        "sigma",
        Math.min(s.ceiling, s.base + Math.min(s.max_gain, Math.max(0, composite - s.pivot) / s.span))
      );
    }

    // 2. Trash override
    const veryBad = AXIS_NAMES.filter((k) => axes[k] < c.trash.very_bad_axis).length;
    if (
      veryBad >= c.trash.very_bad_axes_count ||
      (composite < c.trash.composite_below && (tags.includes("very_blurry") || tags.includes("dark")))
    ) {
      const t = conf.trash;
      return result("trash", Math.min(t.ceiling, t.base + (Math.max(0, t.pivot - composite) / t.pivot) * t.gain));
    }

    // 3-4. Low composite bands
    if (composite < c.meh_below) return result("meh", conf.meh);
    if (composite < c.average_below || weakest < c.average_min_axis_below) return result("average", conf.average);

    // 5. Tiers
    for (const tier of c.tiers) {
      if (composite < tier.min) continue;
      const floorsOk = AXIS_NAMES.every((k) => {
        const floor = tier.floors[k];
        return floor === undefined || axes[k] >= floor;
      });
      if (floorsOk && weakest >= tier.min_axis) {
        const margin = Math.max(0, composite - tier.min);
        const gain = Math.min(tier.cap, margin / conf.tier_margin_span);
        return result(tier.name, Math.min(conf.tier_ceiling, tier.base + gain));
      }
    }

    // 6. Fallback
    if (composite >= c.fallback.average_composite && weakest >= c.fallback.average_min_axis) {
      return result("average", conf.fallback_average);
    }
    return result("meh", conf.fallback_meh);
  }
}
