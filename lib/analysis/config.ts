/*
  facetier — Analysis config + reason codes
  Every threshold the pipeline reads lives here: axis scaling, classifier
  weights and ladder, abstention limits, reason-note limits, decode bound.
  Routes build one config per request from the environment.
*/

export const CONFIG_VERSION = "facetier/analysis/v1" as const;

/**
 * Standardized reason codes attached to every analysis summary.
 * Keep these stable; add new ones as needed, but avoid renaming.
 */
export enum ReasonCode {
  E_OK = "E_OK",
  E_DECODE_FAILED = "E_DECODE_FAILED",
  E_NO_FACE = "E_NO_FACE",
  E_EMPTY_CROP = "E_EMPTY_CROP",
  E_NO_MESH = "E_NO_MESH",
  E_LOW_DETECTOR_CONFIDENCE = "E_LOW_DETECTOR_CONFIDENCE",
  E_EXTREME_POSE = "E_EXTREME_POSE",
  E_LOW_AXES = "E_LOW_AXES",
  E_ABSTAIN = "E_ABSTAIN"
}

export type ReasonCodeString = ReasonCode;

export const AXIS_NAMES = ["sharpness", "lighting", "pose", "jawline", "contrast"] as const;
export type AxisName = (typeof AXIS_NAMES)[number];

export const STYLE_LABELS = ["god", "mogged", "sigma", "average", "meh", "trash"] as const;
export type StyleLabel = (typeof STYLE_LABELS)[number];

export type TierName = "god" | "mogged" | "sigma";

export const SUPPORTED_LOCALES = ["en", "ru"] as const;
export type Locale = (typeof SUPPORTED_LOCALES)[number];

export interface TierRule {
  readonly name: TierName;
  /** Composite floor (inclusive) */
  readonly min: number;
  /** Per-axis floors (inclusive) */
  readonly floors: Readonly<Partial<Record<AxisName, number>>>;
  /** Floor for the weakest axis (inclusive); 0 disables */
  readonly min_axis: number;
  readonly base: number;
  readonly cap: number;
}

/** base + min(max_gain, (composite - pivot) / span), then capped at ceiling */
export interface ConfidenceRamp {
  readonly base: number;
  readonly pivot: number;
  readonly span: number;
  readonly max_gain: number;
  readonly ceiling: number;
}

export interface ConfidenceTable {
  /** Not floored at pivot: below it the confidence drops under base */
  readonly hero_mogged: ConfidenceRamp;
  /** Floored at pivot */
  readonly hero_sigma: ConfidenceRamp;
  /** base + (max(0, pivot - composite) / pivot) * gain, capped at ceiling */
  readonly trash: {
    readonly base: number;
    readonly pivot: number;
    readonly gain: number;
    readonly ceiling: number;
  };
  readonly meh: number;
  readonly average: number;
  readonly fallback_average: number;
  readonly fallback_meh: number;
  /** Tier confidence is base + min(cap, margin / tier_margin_span) */
  readonly tier_margin_span: number;
  readonly tier_ceiling: number;
}

export interface AnalysisConfig {
  /** Version string for auditability in logs */
  readonly version: typeof CONFIG_VERSION;

  /** Reported on every AnalysisResult */
  readonly model_version: string;

  readonly locale: Locale;

  /** Max width used for decoding. Maintains aspect ratio, never enlarges. */
  readonly max_width_used: number;

  /** Attach the 9x9 |Laplacian| map to the quality report (diagnostic only). */
  readonly include_sharpness_map: boolean;

  /**
   * Raw metric -> axis normalisation
   */
  readonly axes: {
    readonly laplacian_divisor: number;
    readonly laplacian_weight: number;
    readonly tenengrad_divisor: number;
    readonly tenengrad_weight: number;
    readonly frequency_weight: number;
    readonly exposure_weight: number;
    readonly clipping_weight: number;
    readonly contrast_multiplier: number;
    /** Used for pose/jawline when no mesh is available */
    readonly missing_mesh_default: number;
  };

  readonly classifier: {
    readonly weights: Readonly<Record<AxisName, number>>;

    /** Composite penalty ladder */
    readonly penalty: {
      readonly soft_threshold: number;
      readonly hard_threshold: number;
      readonly soft_factor: number;
      readonly soft_factor_light: number;
      readonly hard_factor: number;
      readonly hard_factor_light: number;
      readonly cap_base: number;
      readonly cap_per_extra_axis: number;
    };

    readonly tags: {
      readonly very_blurry: number;
      readonly blurry: number;
      readonly dark: number;
      readonly overexposed: number;
      readonly bad_pose: number;
      readonly weak_jaw: number;
      readonly low_contrast: number;
    };

    /** Positive reasons fire at >=, negative at < */
    readonly reasons: {
      readonly positive: Readonly<Record<AxisName, number>>;
      readonly negative: Readonly<Record<AxisName, number>>;
    };

    readonly hero: {
      readonly sharpness: number;
      readonly jawline: number;
      readonly pose: number;
      readonly mogged_composite: number;
      readonly mogged_sharpness: number;
      readonly mogged_jawline: number;
    };

    readonly trash: {
      readonly very_bad_axis: number;
      readonly very_bad_axes_count: number;
      readonly composite_below: number;
    };

    readonly meh_below: number;
    readonly average_below: number;
    readonly average_min_axis_below: number;

    /** Ordered; first satisfied wins */
    readonly tiers: ReadonlyArray<TierRule>;

    readonly fallback: {
      readonly average_composite: number;
      readonly average_min_axis: number;
    };

    /** Confidence attached to each rung of the ladder */
    readonly confidence: ConfidenceTable;
  };

  readonly abstain: {
    readonly min_detector_confidence: number;
    readonly max_abs_yaw: number;
    readonly max_abs_pitch: number;
    readonly min_mean_axis: number;
  };

  /** Extra reason notes appended after the classifier reasons */
  readonly notes: {
    readonly tilt_degrees: number;
    readonly exposure_deviation: number;
    readonly symmetry_below: number;
  };

  readonly debug: {
    /** If true, emits per-stage debug logs (still structured). */
    readonly log_stages: boolean;
  };
}

export const ANALYSIS_DEFAULTS: AnalysisConfig = {
  version: CONFIG_VERSION,
  model_version: "1.0.0",
  locale: "en",

  max_width_used: 2048,
  include_sharpness_map: false,

  axes: {
    laplacian_divisor: 1000,
    laplacian_weight: 50,
    tenengrad_divisor: 100000,
    tenengrad_weight: 30,
    frequency_weight: 20,
    exposure_weight: 0.7,
    clipping_weight: 0.3,
    contrast_multiplier: 2,
    missing_mesh_default: 50
  },

  classifier: {
    weights: {
      sharpness: 0.3,
      lighting: 0.18,
      pose: 0.2,
      jawline: 0.22,
      contrast: 0.1
    },

    // lighting/contrast get lighter penalties than sharpness/pose/jawline
    penalty: {
      soft_threshold: 45,
      hard_threshold: 30,
      soft_factor: 0.09,
      soft_factor_light: 0.06,
      hard_factor: 0.18,
      hard_factor_light: 0.12,
      cap_base: 8,
      cap_per_extra_axis: 3
    },

    tags: {
      very_blurry: 30,
      blurry: 45,
      dark: 42,
      overexposed: 88,
      bad_pose: 55,
      weak_jaw: 52,
      low_contrast: 45
    },

    reasons: {
      positive: { sharpness: 80, lighting: 72, pose: 80, jawline: 76, contrast: 70 },
      negative: { sharpness: 45, lighting: 45, pose: 55, jawline: 52, contrast: 45 }
    },

    hero: {
      sharpness: 78,
      jawline: 54,
      pose: 60,
      mogged_composite: 75,
      mogged_sharpness: 75,
      mogged_jawline: 72
    },

    trash: {
      very_bad_axis: 30,
      very_bad_axes_count: 2,
      composite_below: 45
    },

    meh_below: 50,
    average_below: 62,
    average_min_axis_below: 48,

    tiers: [
      { name: "god", min: 87, floors: { sharpness: 80, jawline: 75, pose: 75 }, min_axis: 0, base: 0.75, cap: 0.22 },
      { name: "mogged", min: 78, floors: { sharpness: 72, jawline: 70, pose: 68 }, min_axis: 0, base: 0.67, cap: 0.25 },
      { name: "sigma", min: 65, floors: { sharpness: 60, jawline: 58 }, min_axis: 50, base: 0.6, cap: 0.27 }
    ],

    fallback: {
      average_composite: 62,
      average_min_axis: 55
    },

    confidence: {
      hero_mogged: { base: 0.8, pivot: 80, span: 20, max_gain: 0.2, ceiling: 0.96 },
      hero_sigma: { base: 0.7, pivot: 70, span: 20, max_gain: 0.2, ceiling: 0.9 },
      trash: { base: 0.68, pivot: 55, gain: 0.25, ceiling: 0.96 },
      meh: 0.6,
      average: 0.55,
      fallback_average: 0.54,
      fallback_meh: 0.56,
      tier_margin_span: 15,
      tier_ceiling: 0.98
    }
  },

  abstain: {
    min_detector_confidence: 0.3,
    max_abs_yaw: 45,
    max_abs_pitch: 45,
    min_mean_axis: 20
  },

  notes: {
    tilt_degrees: 15,
    exposure_deviation: 10,
    symmetry_below: 70
  },

  debug: {
    log_stages: false
  }
};

export type AnalysisConfigOverrides = Partial<
  Omit<AnalysisConfig, "version" | "axes" | "classifier" | "abstain" | "notes" | "debug">
> & {
  axes?: Partial<AnalysisConfig["axes"]>;
  classifier?: Partial<AnalysisConfig["classifier"]>;
  abstain?: Partial<AnalysisConfig["abstain"]>;
  notes?: Partial<AnalysisConfig["notes"]>;
  debug?: Partial<AnalysisConfig["debug"]>;
};

/**
 * Defaults plus overrides, one level deep per nested table.
 * Classifier overrides replace whole sub-tables.
 */
export function buildAnalysisConfig(overrides: AnalysisConfigOverrides = {}): AnalysisConfig {
  const merged: AnalysisConfig = {
    ...ANALYSIS_DEFAULTS,
    ...overrides,
    version: CONFIG_VERSION,
    axes: {
      ...ANALYSIS_DEFAULTS.axes,
      ...(overrides.axes ?? {})
    },
    classifier: {
      ...ANALYSIS_DEFAULTS.classifier,
      ...(overrides.classifier ?? {})
    },
    abstain: {
      ...ANALYSIS_DEFAULTS.abstain,
      ...(overrides.abstain ?? {})
    },
    notes: {
      ...ANALYSIS_DEFAULTS.notes,
      ...(overrides.notes ?? {})
    },
    debug: {
      ...ANALYSIS_DEFAULTS.debug,
      ...(overrides.debug ?? {})
    }
  };

  assertAnalysisConfig(merged);
  return merged;
}

function isLocale(v: string): v is Locale {
  return (SUPPORTED_LOCALES as ReadonlyArray<string>).includes(v);
}

/**
 * Throws `AnalysisConfig invalid: ...` on the first violated invariant.
 */
export function assertAnalysisConfig(cfg: AnalysisConfig): void {
  const fail = (msg: string): never => {
    throw new Error(`AnalysisConfig invalid: ${msg}`);
  };

  if (cfg.version !== CONFIG_VERSION) fail(`version must be ${CONFIG_VERSION}`);
  if (!cfg.model_version.trim()) fail("model_version must be non-empty");
  if (!isLocale(cfg.locale)) fail(`locale must be one of ${SUPPORTED_LOCALES.join(", ")}`);

  if (!Number.isFinite(cfg.max_width_used) || cfg.max_width_used < 64) fail("max_width_used must be >= 64");

  const a = cfg.axes;
  if (a.laplacian_divisor <= 0 || a.tenengrad_divisor <= 0) fail("axes divisors must be > 0");
  if (a.missing_mesh_default < 0 || a.missing_mesh_default > 100)
    fail("axes.missing_mesh_default must be within 0..100");

  const c = cfg.classifier;
  const weightSum = AXIS_NAMES.reduce((s, k) => s + c.weights[k], 0);
  if (Math.abs(weightSum - 1) > 1e-9) fail(`classifier.weights must sum to 1 (got ${weightSum})`);
  for (const k of AXIS_NAMES) {
    if (c.weights[k] < 0) fail(`classifier.weights.${k} must be >= 0`);
  }

  if (c.penalty.hard_threshold > c.penalty.soft_threshold)
    fail("classifier.penalty.hard_threshold must be <= soft_threshold");
  if (c.penalty.cap_base < 0 || c.penalty.cap_per_extra_axis < 0)
    fail("classifier.penalty caps must be >= 0");

  if (c.tags.very_blurry > c.tags.blurry) fail("classifier.tags.very_blurry must be <= blurry");

  const in100 = (v: number): boolean => v >= 0 && v <= 100;
  for (const [k, v] of Object.entries(c.tags)) {
    if (!in100(v)) fail(`classifier.tags.${k} must be within 0..100`);
  }

  if (c.tiers.length === 0) fail("classifier.tiers must be non-empty");
  for (let i = 0; i < c.tiers.length; i++) {
    const t = c.tiers[i];
    if (!in100(t.min)) fail(`classifier.tiers.${t.name}.min must be within 0..100`);
    if (t.base < 0 || t.base > 1 || t.cap < 0 || t.base + t.cap > 1)
      fail(`classifier.tiers.${t.name} base/cap must keep confidence within [0,1]`);
    if (i > 0 && t.min > c.tiers[i - 1].min) fail("classifier.tiers must be ordered by descending min");
  }

  const conf = c.confidence;
  const in01 = (v: number): boolean => v >= 0 && v <= 1;
  for (const [k, v] of Object.entries({
    meh: conf.meh,
    average: conf.average,
    fallback_average: conf.fallback_average,
    fallback_meh: conf.fallback_meh,
    tier_ceiling: conf.tier_ceiling
  })) {
    if (!in01(v)) fail(`classifier.confidence.${k} must be within [0,1]`);
  }
  if (conf.hero_mogged.span <= 0 || conf.hero_sigma.span <= 0 || conf.trash.pivot <= 0 || conf.tier_margin_span <= 0)
    fail("classifier.confidence spans must be > 0");

  const ab = cfg.abstain;
  if (ab.min_detector_confidence < 0 || ab.min_detector_confidence > 1)
    fail("abstain.min_detector_confidence must be within [0,1]");
  if (ab.max_abs_yaw <= 0 || ab.max_abs_pitch <= 0) fail("abstain pose limits must be > 0");
}

/**
 * Declaration order of ReasonCode; used to iterate counts.
 */
export const ALL_REASON_CODES: ReadonlyArray<ReasonCodeString> = Object.values(ReasonCode);
