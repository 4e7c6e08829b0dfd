import type { RecommendationThresholds } from "../config";
import type { FusedHazard } from "../fusion/types";
import type { ComplianceTag, HazardTaxonomy } from "../taxonomy/types";

export type RecommendationReason = "AUTO_SELECTED" | "SUGGESTED";

export type TagRecommendation = {
  tag: ComplianceTag;
  confidence: number;
  reason: RecommendationReason;
  hazardTypes: string[];
};

export type RecommendationResult = {
  recommendations: TagRecommendation[];
  autoSelectTags: string[];
};

type TagAccumulator = {
  tag: ComplianceTag;
  confidence: number;
  hazardTypes: Set<string>;
};

function compareRecommendations(a: TagRecommendation, b: TagRecommendation): number {
  const reasonOrder = (reason: RecommendationReason) => (reason === "AUTO_SELECTED" ? 0 : 1);
  return (
    reasonOrder(a.reason) - reasonOrder(b.reason) ||
    b.confidence - a.confidence ||
    a.tag.priority - b.tag.priority ||
    a.tag.id.localeCompare(b.tag.id)
  );
}

export function classifyConfidence(
  confidence: number,
  thresholds: RecommendationThresholds
): RecommendationReason | null {
  if (confidence >= thresholds.autoSelect) {
    return "AUTO_SELECTED";
  }
  if (confidence >= thresholds.display) {
    return "SUGGESTED";
  }
  return null;
}

/**
 * Maps fused hazards onto compliance tags. Output depends only on the inputs.
 */
export function recommendTags(
  hazards: FusedHazard[],
  taxonomy: Pick<HazardTaxonomy, "tagsForHazard">,
  thresholds: RecommendationThresholds
): RecommendationResult {
  const byTag = new Map<string, TagAccumulator>();

  for (const hazard of hazards) {
    if (hazard.confidence < thresholds.display) {
      continue;
    }
    for (const tag of taxonomy.tagsForHazard(hazard.hazardType)) {
      const existing = byTag.get(tag.id);
      if (existing) {
        existing.confidence = Math.max(existing.confidence, hazard.confidence);
        existing.hazardTypes.add(hazard.hazardType);
      } else {
        byTag.set(tag.id, { tag, confidence: hazard.confidence, hazardTypes: new Set([hazard.hazardType]) });
      }
    }
  }

  const recommendations: TagRecommendation[] = [];
  for (const entry of byTag.values()) {
    const reason = classifyConfidence(entry.confidence, thresholds);
    if (!reason) {
      continue;
    }
    recommendations.push({
      tag: entry.tag,
      confidence: entry.confidence,
      reason,
      hazardTypes: Array.from(entry.hazardTypes).sort((a, b) => a.localeCompare(b))
    });
  }
  recommendations.sort(compareRecommendations);

  return {
    recommendations,
    autoSelectTags: recommendations
      .filter((recommendation) => recommendation.reason === "AUTO_SELECTED")
      .map((recommendation) => recommendation.tag.id)
  };
}
