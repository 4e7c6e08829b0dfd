export type Severity = "critical" | "high" | "medium" | "low";

export const SEVERITY_RANK: Record<Severity, number> = {
  critical: 4,
  high: 3,
  medium: 2,
  low: 1
};

export type ComplianceTag = {
  id: string;
  name: string;
  category: string;
  regulatoryCodes: string[];
  priority: number;
};

export type HazardDefinition = {
  type: string;
  category: string;
  severity: Severity;
  description: string;
  tagIds: string[];
};

export type TaxonomyInfo = {
  version: string;
  hash: string;
  path: string;
  loadedAt: string;
};

export type HazardTaxonomy = {
  info: TaxonomyInfo;
  getHazard: (hazardType: string) => HazardDefinition | undefined;
  tagsForHazard: (hazardType: string) => ComplianceTag[];
  severityOf: (hazardType: string) => Severity;
  regulatoryCodesFor: (hazardType: string) => string[];
  listTags: () => ComplianceTag[];
  listHazards: () => HazardDefinition[];
};
