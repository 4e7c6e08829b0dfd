import { createHash } from "node:crypto";
import type { BackendTier, HazardDetection } from "../backends/types";
import { SEVERITY_RANK } from "../taxonomy/types";
import { intersectionOverUnion, weightedRegion } from "./geometry";
import type { BackendDetections, FusedHazard, FusionOptions } from "./types";

type WeightedDetection = HazardDetection & { weight: number };

function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function compareDetections(a: HazardDetection, b: HazardDetection): number {
  return (
    a.hazardType.localeCompare(b.hazardType) ||
    a.backendId.localeCompare(b.backendId) ||
    b.confidence - a.confidence ||
    a.region.x - b.region.x ||
    a.region.y - b.region.y ||
    a.region.width - b.region.width ||
    a.region.height - b.region.height ||
    a.detectedAt - b.detectedAt
  );
}

function detectionKey(detection: HazardDetection): string {
  const { x, y, width, height } = detection.region;
  return [detection.backendId, detection.confidence, x, y, width, height].join(":");
}

export function buildFusedHazardId(hazardType: string, members: HazardDetection[]): string {
  const signature = [hazardType, ...members.map(detectionKey)].join("|");
  return createHash("sha256").update(signature).digest("hex").slice(0, 16);
}

// Greedy per-backend suppression of overlapping boxes; input is already in canonical order.
function suppressSameBackendDuplicates(detections: WeightedDetection[], iouThreshold: number): WeightedDetection[] {
  const kept: WeightedDetection[] = [];
  for (const detection of detections) {
    const duplicate = kept.some(
      (existing) =>
        existing.backendId === detection.backendId &&
        intersectionOverUnion(existing.region, detection.region) >= iouThreshold
    );
    if (!duplicate) {
      kept.push(detection);
    }
  }
  return kept;
}

type Link = { left: number; right: number; iou: number };

/**
 * Links overlapping detections of different backends, strongest overlap first.
 * A cluster holds at most one detection per backend, so a link that would bring
 * a second detection of a backend into a cluster is skipped and that detection
 * stays its own hazard. Input is in canonical order, so index ties are stable.
 */
function clusterAcrossBackends(detections: WeightedDetection[], iouThreshold: number): WeightedDetection[][] {
  const links: Link[] = [];
  for (let left = 0; left < detections.length; left += 1) {
    for (let right = left + 1; right < detections.length; right += 1) {
      if (detections[left].backendId === detections[right].backendId) {
        continue;
      }
      const iou = intersectionOverUnion(detections[left].region, detections[right].region);
      if (iou >= iouThreshold) {
        links.push({ left, right, iou });
      }
    }
  }
  links.sort((a, b) => b.iou - a.iou || a.left - b.left || a.right - b.right);

  const clusterOf = detections.map((_, index) => index);
  const clusters = new Map<number, number[]>(detections.map((_, index) => [index, [index]]));
  for (const link of links) {
    const leftCluster = clusterOf[link.left];
    const rightCluster = clusterOf[link.right];
    if (leftCluster === rightCluster) {
      continue;
    }
    const leftMembers = clusters.get(leftCluster) ?? [];
    const rightMembers = clusters.get(rightCluster) ?? [];
    const backends = new Set(leftMembers.map((index) => detections[index].backendId));
    if (rightMembers.some((index) => backends.has(detections[index].backendId))) {
      continue;
    }
    const keep = Math.min(leftCluster, rightCluster);
    const merged = [...leftMembers, ...rightMembers].sort((a, b) => a - b);
    clusters.delete(Math.max(leftCluster, rightCluster));
    clusters.set(keep, merged);
    merged.forEach((index) => {
      clusterOf[index] = keep;
    });
  }

  return Array.from(clusters.values()).map((members) => members.map((index) => detections[index]));
}

export function aggregateConfidence(members: Array<{ confidence: number; weight: number }>, agreementBoost: number): number {
  if (members.length === 0) {
    return 0;
  }
  if (members.length === 1) {
    return clampUnit(members[0].confidence * members[0].weight);
  }
  const totalWeight = members.reduce((sum, member) => sum + member.weight, 0);
  if (totalWeight <= 0) {
    return 0;
  }
  const weightedAverage = members.reduce((sum, member) => sum + member.confidence * member.weight, 0) / totalWeight;
  return clampUnit(weightedAverage * (1 + agreementBoost * (members.length - 1)));
}

export function compareFusedHazards(a: FusedHazard, b: FusedHazard): number {
  return (
    b.confidence - a.confidence ||
    SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity] ||
    a.hazardType.localeCompare(b.hazardType) ||
    a.region.y - b.region.y ||
    a.region.x - b.region.x ||
    a.id.localeCompare(b.id)
  );
}

/**
 * Merges detections from every backend that ran into one ranked hazard list.
 * The result does not depend on the order of `results` or of the detections in them.
 */
export function fuseDetections(results: BackendDetections[], options: FusionOptions): FusedHazard[] {
  const tierByBackend = new Map<string, BackendTier>();
  results.forEach((result) => tierByBackend.set(result.backendId, result.tier));

  const weightOf = (backendId: string): number => {
    const override = options.backendWeights?.[backendId];
    if (override !== undefined) {
      return override;
    }
    const tier = tierByBackend.get(backendId);
    return tier ? options.weights[tier] : 1;
  };

  const all: WeightedDetection[] = results
    .flatMap((result) => result.detections.map((detection) => ({ ...detection, backendId: result.backendId })))
    .sort(compareDetections)
    .map((detection) => ({ ...detection, weight: weightOf(detection.backendId) }));

  const byType = new Map<string, WeightedDetection[]>();
  for (const detection of all) {
    const group = byType.get(detection.hazardType) ?? [];
    group.push(detection);
    byType.set(detection.hazardType, group);
  }

  const fused: FusedHazard[] = [];
  for (const [hazardType, detections] of byType) {
    const kept = suppressSameBackendDuplicates(detections, options.iouThreshold);
    for (const members of clusterAcrossBackends(kept, options.iouThreshold)) {
      fused.push({
        id: buildFusedHazardId(hazardType, members),
        hazardType,
        confidence: aggregateConfidence(members, options.agreementBoost),
        severity: options.severityOf(hazardType),
        region: weightedRegion(
          members.map((member) => ({ region: member.region, weight: member.confidence * member.weight }))
        ),
        contributingBackends: Array.from(new Set(members.map((member) => member.backendId))).sort((a, b) =>
          a.localeCompare(b)
        ),
        detectionCount: members.length
      });
    }
  }

  return fused.sort(compareFusedHazards);
}
