import fs from "node:fs";
import { promises as fsp } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import {
  ConfigurationError,
  isAutoApplyPolicy,
  isGatePreCheck,
  isHandlerMode,
  isOutputFormat,
  isReviewGateTarget,
  parseReviewScope,
  type ContentFilter,
  type GatePreCheck,
  type SectionPolicy,
} from "@reqforge/shared";

const DEFAULT_DOC_KEY = "_default";

const VERSION_RE = /^\d+\.\d+$/;

/** Milestones applied to requirements documents whose registry declares none. */
export const DEFAULT_REQUIREMENTS_MILESTONES: Readonly<Record<string, string>> = {
  problem_statement: "0.1",
  goals_objectives: "0.2",
  success_criteria: "0.3",
  stakeholders_users: "0.4",
  assumptions: "0.5",
  constraints: "0.6",
  "review_gate:coherence_check": "0.7",
  requirements: "0.8",
  interfaces_integrations: "0.8",
  data_considerations: "0.8",
  "review_gate:final_review": "0.9",
  approval_record: "1.0",
};

interface DocTypePolicies {
  sections: Map<string, SectionPolicy>;
  milestones: Map<string, string>;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const fail = (docType: string, sectionId: string, field: string, expected: string): never => {
  throw new ConfigurationError(`Invalid ${docType}.${sectionId}.${field}: expected ${expected}`, {
    docType,
    sectionId,
    field,
  });
};

const readString = (raw: Record<string, unknown>, key: string, where: [string, string]): string | undefined => {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") return fail(where[0], where[1], key, "string");
  return value.trim();
};

const readStringList = (raw: Record<string, unknown>, key: string, where: [string, string]): string[] => {
  const value = raw[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value) || !value.every((entry): entry is string => typeof entry === "string")) {
    return fail(where[0], where[1], key, "list of strings");
  }
  return value.map((entry) => entry.trim()).filter(Boolean);
};

const readBoolean = (raw: Record<string, unknown>, key: string, where: [string, string]): boolean => {
  const value = raw[key];
  if (value === undefined || value === null) return false;
  if (typeof value !== "boolean") return fail(where[0], where[1], key, "boolean");
  return value;
};

const parseContentFilters = (raw: Record<string, unknown>, where: [string, string]): ContentFilter[] => {
  const value = raw.content_filters;
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) return fail(where[0], where[1], "content_filters", "list");
  return value.map((entry): ContentFilter => {
    if (entry === "dedupe_items") return { kind: "dedupe_items" };
    if (isRecord(entry) && typeof entry.drop_matching === "string") {
      try {
        new RegExp(entry.drop_matching, "i");
      } catch {
        return fail(where[0], where[1], "content_filters.drop_matching", "valid regular expression");
      }
      return { kind: "drop_matching", pattern: entry.drop_matching };
    }
    return fail(where[0], where[1], "content_filters", "'dedupe_items' or { drop_matching: <regex> }");
  });
};

export const buildGenericSectionPolicy = (docType: string, sectionId: string): SectionPolicy => ({
  docType,
  sectionId,
  mode: "integrate_then_questions",
  outputFormat: "prose",
  preserveHeaders: [],
  llmProfile: docType,
  scope: { kind: "all_prior_sections" },
  autoApplyPatches: "never",
  contentFilters: [],
  validationRules: [],
  preChecks: [],
  lockScopeOnPass: false,
});

export const parseSectionPolicy = (docType: string, sectionId: string, raw: unknown): SectionPolicy => {
  const where: [string, string] = [docType, sectionId];
  if (!isRecord(raw)) return fail(docType, sectionId, "(entry)", "mapping");
  const base = buildGenericSectionPolicy(docType, sectionId);

  const mode = readString(raw, "mode", where) ?? base.mode;
  if (!isHandlerMode(mode)) {
    return fail(docType, sectionId, "mode", "integrate_then_questions | questions_then_integrate | review_gate");
  }
  const outputFormat = readString(raw, "output_format", where) ?? base.outputFormat;
  if (!isOutputFormat(outputFormat)) return fail(docType, sectionId, "output_format", "prose | bullets | subsections");
  const autoApply = readString(raw, "auto_apply_patches", where) ?? base.autoApplyPatches;
  if (!isAutoApplyPolicy(autoApply)) {
    return fail(docType, sectionId, "auto_apply_patches", "never | always | if_validation_passes");
  }
  const scopeRaw = readString(raw, "scope", where);
  const scope = scopeRaw === undefined ? base.scope : parseReviewScope(scopeRaw);
  if (!scope) {
    return fail(
      docType,
      sectionId,
      "scope",
      "current_section | all_prior_sections | entire_document | sections:<id,...>",
    );
  }
  const preChecks: GatePreCheck[] = readStringList(raw, "pre_checks", where).map((check) =>
    isGatePreCheck(check) ? check : fail(docType, sectionId, "pre_checks", "open_questions_resolved | risks_low"),
  );
  if (isReviewGateTarget(sectionId) && mode !== "review_gate") {
    return fail(docType, sectionId, "mode", "review_gate for review_gate:* targets");
  }

  return {
    docType,
    sectionId,
    mode,
    outputFormat,
    preserveHeaders: readStringList(raw, "preserve_headers", where),
    llmProfile: readString(raw, "llm_profile", where) ?? base.llmProfile,
    scope,
    autoApplyPatches: autoApply,
    contentFilters: parseContentFilters(raw, where),
    validationRules: readStringList(raw, "validation_rules", where),
    preChecks,
    lockScopeOnPass: readBoolean(raw, "lock_scope_on_pass", where),
    approvalStatusOnPass: readString(raw, "approval_status_on_pass", where),
  };
};

const parseMilestones = (docType: string, raw: unknown): Map<string, string> => {
  const milestones = new Map<string, string>();
  if (raw === undefined || raw === null) return milestones;
  if (!isRecord(raw)) return fail(docType, "milestones", "(entry)", "mapping of target to X.Y");
  for (const [target, version] of Object.entries(raw)) {
    // YAML reads 0.10 as the number 0.1, so versions must be quoted strings
    if (typeof version === "number") {
      return fail(docType, "milestones", target, `quoted version string, got number ${version}`);
    }
    if (typeof version !== "string" || !VERSION_RE.test(version.trim())) {
      return fail(docType, "milestones", target, "version in X.Y form");
    }
    milestones.set(target, version.trim());
  }
  return milestones;
};

export const defaultPolicyPath = (): string => {
  const here = fileURLToPath(import.meta.url);
  return path.resolve(path.dirname(here), "../../../../../config/section_policies.yaml");
};

/**
 * Maps (document type, workflow target) to a processing policy. Entries are
 * validated into closed unions when the registry is built.
 */
export class PolicyRegistry {
  private constructor(private readonly docTypes: Map<string, DocTypePolicies>) {}

  static fromObject(raw: unknown, source = "policy registry"): PolicyRegistry {
    if (!isRecord(raw)) throw new ConfigurationError(`Invalid ${source}: expected a mapping of document types`);
    const docTypes = new Map<string, DocTypePolicies>();
    for (const [docType, entry] of Object.entries(raw)) {
      if (!isRecord(entry)) {
        throw new ConfigurationError(`Invalid ${source}: document type '${docType}' must be a mapping`);
      }
      const sectionsRaw = entry.sections ?? {};
      if (!isRecord(sectionsRaw)) {
        throw new ConfigurationError(`Invalid ${source}: '${docType}.sections' must be a mapping`);
      }
      const sections = new Map<string, SectionPolicy>();
      for (const [sectionId, policy] of Object.entries(sectionsRaw)) {
        sections.set(sectionId, parseSectionPolicy(docType, sectionId, policy));
      }
      let milestones = parseMilestones(docType, entry.milestones);
      if (milestones.size === 0 && docType === "requirements") {
        milestones = new Map(Object.entries(DEFAULT_REQUIREMENTS_MILESTONES));
      }
      docTypes.set(docType, { sections, milestones });
    }
    return new PolicyRegistry(docTypes);
  }

  static fromYaml(raw: string, source = "policy registry"): PolicyRegistry {
    let parsed: unknown;
    try {
      parsed = YAML.parse(raw);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`Failed to parse ${source}: ${message}`);
    }
    return PolicyRegistry.fromObject(parsed ?? {}, source);
  }

  static async load(filePath: string = defaultPolicyPath()): Promise<PolicyRegistry> {
    let raw: string;
    try {
      raw = await fsp.readFile(filePath, "utf8");
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`Unable to read policy registry at ${filePath}: ${message}`, { filePath });
    }
    return PolicyRegistry.fromYaml(raw, filePath);
  }

  static loadSync(filePath: string = defaultPolicyPath()): PolicyRegistry {
    if (!fs.existsSync(filePath)) {
      throw new ConfigurationError(`Policy registry not found at ${filePath}`, { filePath });
    }
    return PolicyRegistry.fromYaml(fs.readFileSync(filePath, "utf8"), filePath);
  }

  supportsDocType(docType: string): boolean {
    return this.docTypes.has(docType) || this.docTypes.has(DEFAULT_DOC_KEY);
  }

  listDocTypes(): string[] {
    return [...this.docTypes.keys()].filter((key) => key !== DEFAULT_DOC_KEY).sort();
  }

  resolve(docType: string, targetId: string): SectionPolicy {
    const policies = this.docTypePolicies(docType);
    const policy = policies.sections.get(targetId);
    if (policy) return { ...policy, docType };
    if (isReviewGateTarget(targetId)) {
      throw new ConfigurationError(`No review gate policy for '${targetId}' in document type '${docType}'`, {
        docType,
        targetId,
      });
    }
    return buildGenericSectionPolicy(docType, targetId);
  }

  milestoneFor(docType: string, targetId: string): string | undefined {
    return this.docTypePolicies(docType).milestones.get(targetId);
  }

  private docTypePolicies(docType: string): DocTypePolicies {
    const policies = this.docTypes.get(docType) ?? this.docTypes.get(DEFAULT_DOC_KEY);
    if (!policies) {
      throw new ConfigurationError(
        `Unknown document type '${docType}' and no ${DEFAULT_DOC_KEY} policies defined. Available: ${this.listDocTypes().join(", ")}`,
        { docType },
      );
    }
    return policies;
  }
}
