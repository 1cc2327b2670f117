/**
 * Tiered quality assessment
 *
 * Tier 1: keyword rules over publication-type metadata (free, instant)
 * Tier 2: study-design classification by a chat model, only when Tier 1
 *         could not classify
 * Tier 3: detailed assessment with a direct 0-10 quality score
 *
 * A failed delegated call keeps the previous tier's result.
 */

import { z } from "zod";
import {
  DESIGN_RULES,
  DESIGN_TIERS,
  METADATA_MATCH_CONFIDENCE,
  TIER_SCORES,
} from "../../config/quality";
import type { LLMClient } from "../llm/client";
import { parseJsonResponse } from "../llm/json";
import { errorMessage, logger } from "../logger";
import type { AssessmentTier, Item, QualityResult, StudyDesign } from "../model";
import { clamp01 } from "./combine";

interface Assessment {
  design: StudyDesign;
  confidence: number;
  assessmentTier: AssessmentTier;
  qualityScore?: number;
  detail: Record<string, unknown>;
}

const CLASSIFY_PROMPT = `You classify biomedical papers by study design.

Allowed designs: systematic_review, meta_analysis, rct, cohort, case_control,
cross_sectional, case_series, case_report, narrative_review, editorial, unclassified.

Return JSON: {"study_design": "<one allowed design>", "confidence": <number 0.0-1.0>}`;

const ASSESS_PROMPT = `You appraise the methodological quality of biomedical papers from their title and abstract.

Return JSON with this structure:
{
  "quality_score": <number 0-10>,
  "study_design": "<systematic_review | meta_analysis | rct | cohort | case_control | cross_sectional | case_series | case_report | narrative_review | editorial | unclassified>",
  "risk_of_bias": "<low | moderate | high | unclear>",
  "strengths": ["<strength>", ...],
  "limitations": ["<limitation>", ...]
}`;

const ClassificationSchema = z.object({
  study_design: z.string(),
  confidence: z.coerce.number().finite().default(0.5),
});

const DetailedAssessmentSchema = z.object({
  quality_score: z.coerce.number().finite(),
  study_design: z.string().optional(),
  risk_of_bias: z.string().default("unclear"),
  strengths: z.array(z.string()).default([]),
  limitations: z.array(z.string()).default([]),
});

function isStudyDesign(value: string): value is StudyDesign {
  return Object.prototype.hasOwnProperty.call(DESIGN_TIERS, value);
}

/**
 * Publication types: metadata.pub_type (string or list) followed by the
 * item's categories
 */
export function extractPublicationTypes(item: Pick<Item, "metadata" | "categories">): string[] {
  const raw = item.metadata.pub_type;
  const pubTypes: string[] = [];

  if (typeof raw === "string") {
    pubTypes.push(raw);
  } else if (Array.isArray(raw)) {
    for (const value of raw) {
      if (typeof value === "string") {
        pubTypes.push(value);
      }
    }
  }

  pubTypes.push(...item.categories);
  return pubTypes.map((value) => value.trim()).filter((value) => value.length > 0);
}

/**
 * First rule (most specific first) matching any of the labels
 */
export function classifyPublicationTypes(labels: string[]): { design: StudyDesign; matched: string | null } {
  const lowered = labels.map((label) => label.toLowerCase().trim());
  for (const rule of DESIGN_RULES) {
    for (const label of lowered) {
      if (rule.patterns.some((pattern) => pattern.test(label))) {
        return { design: rule.design, matched: label };
      }
    }
  }
  return { design: "unclassified", matched: null };
}

/**
 * Map a free-form design label from a model response onto the taxonomy
 */
export function normalizeDesignLabel(label: string): StudyDesign {
  const key = label.toLowerCase().trim().replace(/[^a-z0-9]+/g, "_").replace(/^_|_$/g, "");
  if (isStudyDesign(key)) {
    return key;
  }
  return classifyPublicationTypes([key.replace(/_/g, " ")]).design;
}

/**
 * Direct score (0-10) when positive, otherwise the tier table
 */
export function qualityValueFor(design: StudyDesign, qualityScore?: number): number {
  if (qualityScore !== undefined && qualityScore > 0) {
    return clamp01(qualityScore / 10);
  }
  return TIER_SCORES[DESIGN_TIERS[design]];
}

function buildPaperText(item: Item): string {
  return `Title: ${item.title}\n\nAbstract: ${item.abstract || "N/A"}`;
}

export class QualityAssessor {
  /**
   * Without an LLM client only Tier 1 runs
   */
  constructor(private readonly llm: LLMClient | null = null) {}

  async assess(item: Item, maxTier: AssessmentTier = 1): Promise<QualityResult> {
    let assessment = this.classifyFromMetadata(item);

    if (maxTier >= 2 && this.llm) {
      if (assessment.design === "unclassified") {
        assessment = await this.classifyWithModel(this.llm, item, assessment);
      }
      if (maxTier >= 3) {
        assessment = await this.assessInDepth(this.llm, item, assessment);
      }
    } else if (maxTier >= 2) {
      logger.debug(`No LLM client configured, quality assessment stays at tier 1`, { itemId: item.id });
    }

    return {
      designLabel: assessment.design,
      tierLabel: DESIGN_TIERS[assessment.design],
      qualityValue: qualityValueFor(assessment.design, assessment.qualityScore),
      confidence: assessment.confidence,
      assessmentTier: assessment.assessmentTier,
      qualityScore: assessment.qualityScore,
      detail: assessment.detail,
    };
  }

  private classifyFromMetadata(item: Item): Assessment {
    const publicationTypes = extractPublicationTypes(item);
    const { design, matched } = classifyPublicationTypes(publicationTypes);
    return {
      design,
      confidence: design === "unclassified" ? 0 : METADATA_MATCH_CONFIDENCE,
      assessmentTier: 1,
      detail: { publicationTypes, matchedType: matched },
    };
  }

  private async classifyWithModel(llm: LLMClient, item: Item, previous: Assessment): Promise<Assessment> {
    try {
      const response = await llm.complete(
        [
          { role: "system", content: CLASSIFY_PROMPT },
          { role: "user", content: buildPaperText(item) },
        ],
        { json: true, maxTokens: 200 }
      );
      const parsed = parseJsonResponse(response, ClassificationSchema);
      if (!parsed) {
        logger.warn(`Unparseable design classification, keeping tier 1 result`, { itemId: item.id });
        return previous;
      }

      return {
        design: normalizeDesignLabel(parsed.study_design),
        confidence: clamp01(parsed.confidence),
        assessmentTier: 2,
        detail: { ...previous.detail, classifiedDesign: parsed.study_design },
      };
    } catch (error) {
      logger.warn(`Design classification failed, keeping tier 1 result`, {
        itemId: item.id,
        error: errorMessage(error),
      });
      return previous;
    }
  }

  private async assessInDepth(llm: LLMClient, item: Item, previous: Assessment): Promise<Assessment> {
    try {
      const response = await llm.complete(
        [
          { role: "system", content: ASSESS_PROMPT },
          { role: "user", content: buildPaperText(item) },
        ],
        { json: true, maxTokens: 600 }
      );
      const parsed = parseJsonResponse(response, DetailedAssessmentSchema);
      if (!parsed) {
        logger.warn(`Unparseable detailed assessment, keeping tier ${previous.assessmentTier} result`, {
          itemId: item.id,
        });
        return previous;
      }

      // A lower tier's classification stands; the detailed design only fills a gap
      const design =
        previous.design === "unclassified" && parsed.study_design
          ? normalizeDesignLabel(parsed.study_design)
          : previous.design;

      return {
        design,
        confidence: previous.confidence,
        assessmentTier: 3,
        qualityScore: Math.min(10, Math.max(0, parsed.quality_score)),
        detail: {
          ...previous.detail,
          riskOfBias: parsed.risk_of_bias,
          strengths: parsed.strengths,
          limitations: parsed.limitations,
        },
      };
    } catch (error) {
      logger.warn(`Detailed assessment failed, keeping tier ${previous.assessmentTier} result`, {
        itemId: item.id,
        error: errorMessage(error),
      });
      return previous;
    }
  }
}
