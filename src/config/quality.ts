/**
 * Study-design taxonomy and evidence tiers
 * Keyword rules for metadata classification and the tier → score table
 */

import type { QualityTier, StudyDesign } from "../lib/model";

export interface DesignRule {
  design: StudyDesign;
  patterns: RegExp[];
}

/**
 * Ordered most specific first; the first rule matching any publication
 * type wins
 */
export const DESIGN_RULES: DesignRule[] = [
  {
    design: "meta_analysis",
    patterns: [/meta[-\s]?analys[ie]s/, /\bnetwork meta\b/],
  },
  {
    design: "systematic_review",
    patterns: [/systematic (literature )?review/, /umbrella review/, /scoping review/],
  },
  {
    design: "rct",
    patterns: [
      /randomi[sz]ed controlled trial/,
      /randomi[sz]ed (clinical )?trial/,
      /controlled clinical trial/,
      /\brct\b/,
    ],
  },
  {
    design: "case_control",
    patterns: [/case[-\s]control/],
  },
  {
    design: "cohort",
    patterns: [/\bcohort\b/, /longitudinal stud/, /prospective stud/, /retrospective stud/],
  },
  {
    design: "cross_sectional",
    patterns: [/cross[-\s]sectional/, /prevalence stud/],
  },
  {
    design: "case_series",
    patterns: [/case series/],
  },
  {
    design: "case_report",
    patterns: [/case reports?\b/],
  },
  {
    design: "narrative_review",
    patterns: [/^review$/, /narrative review/, /literature review/],
  },
  {
    design: "editorial",
    patterns: [/\beditorial\b/, /^comment$/, /^letter$/, /\bopinion\b/],
  },
];

export const DESIGN_TIERS: Record<StudyDesign, QualityTier> = {
  systematic_review: "TIER_5_SYNTHESIS",
  meta_analysis: "TIER_5_SYNTHESIS",
  rct: "TIER_4_EXPERIMENTAL",
  cohort: "TIER_3_CONTROLLED",
  case_control: "TIER_3_CONTROLLED",
  cross_sectional: "TIER_2_OBSERVATIONAL",
  case_series: "TIER_2_OBSERVATIONAL",
  case_report: "TIER_1_ANECDOTAL",
  narrative_review: "TIER_1_ANECDOTAL",
  editorial: "TIER_1_ANECDOTAL",
  unclassified: "UNCLASSIFIED",
};

export const TIER_SCORES: Record<QualityTier, number> = {
  TIER_5_SYNTHESIS: 0.9,
  TIER_4_EXPERIMENTAL: 0.8,
  TIER_3_CONTROLLED: 0.65,
  TIER_2_OBSERVATIONAL: 0.5,
  TIER_1_ANECDOTAL: 0.3,
  UNCLASSIFIED: 0.3,
};

// Confidence attached to a metadata keyword match
export const METADATA_MATCH_CONFIDENCE = 0.9;
