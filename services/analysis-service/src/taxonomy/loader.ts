import { existsSync, readFileSync } from "node:fs";
import { createHash } from "node:crypto";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { ZodError } from "zod";
import { config } from "../config";
import { taxonomyDocumentSchema, type TaxonomyDocument } from "./schema";
import type { ComplianceTag, HazardDefinition, HazardTaxonomy, Severity } from "./types";

const TAXONOMY_FILE = "hazard-taxonomy.v1.yaml";
const UNKNOWN_HAZARD_SEVERITY: Severity = "medium";

export class TaxonomyError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = "TaxonomyError";
  }
}

function resolveTaxonomyRoot(): string {
  const roots = [
    process.cwd(),
    path.resolve(process.cwd(), ".."),
    path.resolve(process.cwd(), "..", ".."),
    path.resolve(process.cwd(), "..", "..", "..")
  ];

  for (const candidate of roots) {
    const taxonomyDir = path.resolve(candidate, "taxonomy");
    if (existsSync(path.resolve(taxonomyDir, TAXONOMY_FILE))) {
      return taxonomyDir;
    }
  }

  return path.resolve(process.cwd(), "taxonomy");
}

export function resolveTaxonomyPath(): string {
  return config.taxonomyPath ? path.resolve(config.taxonomyPath) : path.resolve(resolveTaxonomyRoot(), TAXONOMY_FILE);
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
}

export function buildTaxonomy(document: TaxonomyDocument, source: { path: string; hash: string }): HazardTaxonomy {
  const tags = new Map<string, ComplianceTag>();
  for (const tag of document.tags) {
    tags.set(tag.id, {
      id: tag.id,
      name: tag.name,
      category: tag.category,
      regulatoryCodes: [...tag.regulatoryCodes],
      priority: tag.priority
    });
  }

  const hazards = new Map<string, HazardDefinition>();
  for (const hazard of document.hazards) {
    hazards.set(hazard.type, {
      type: hazard.type,
      category: hazard.category,
      severity: hazard.severity,
      description: hazard.description,
      tagIds: [...hazard.tags]
    });
  }

  const tagsForHazard = (hazardType: string): ComplianceTag[] => {
    const hazard = hazards.get(hazardType);
    if (!hazard) {
      return [];
    }
    return hazard.tagIds
      .map((tagId) => tags.get(tagId))
      .filter((tag): tag is ComplianceTag => tag !== undefined);
  };

  return {
    info: {
      version: document.version,
      hash: source.hash,
      path: source.path,
      loadedAt: new Date().toISOString()
    },
    getHazard: (hazardType) => hazards.get(hazardType),
    tagsForHazard,
    severityOf: (hazardType) => hazards.get(hazardType)?.severity ?? UNKNOWN_HAZARD_SEVERITY,
    regulatoryCodesFor: (hazardType) =>
      Array.from(new Set(tagsForHazard(hazardType).flatMap((tag) => tag.regulatoryCodes))).sort((a, b) =>
        a.localeCompare(b)
      ),
    listTags: () => Array.from(tags.values()),
    listHazards: () => Array.from(hazards.values())
  };
}

export function parseTaxonomy(raw: string, sourcePath = "<inline>"): HazardTaxonomy {
  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TaxonomyError(`Taxonomy at ${sourcePath} is not valid YAML: ${reason}`);
  }
  const result = taxonomyDocumentSchema.safeParse(parsed);
  if (!result.success) {
    throw new TaxonomyError(`Taxonomy at ${sourcePath} failed validation`, formatIssues(result.error));
  }
  const hash = createHash("sha256").update(raw).digest("hex");
  return buildTaxonomy(result.data, { path: sourcePath, hash });
}

export function loadTaxonomyFromDisk(taxonomyPath = resolveTaxonomyPath()): HazardTaxonomy {
  if (!existsSync(taxonomyPath)) {
    throw new TaxonomyError(`Taxonomy file not found: ${taxonomyPath}`);
  }
  return parseTaxonomy(readFileSync(taxonomyPath, "utf-8"), taxonomyPath);
}

let cached: HazardTaxonomy | null = null;

export function getTaxonomy(): HazardTaxonomy {
  if (!cached) {
    cached = loadTaxonomyFromDisk();
  }
  return cached;
}
