import { readFileSync } from "node:fs";
import { z } from "zod";
import { FIELD_SHAPES, SHAPE_NAMES, type FieldShape, type ShapeName } from "./candidateScorer.js";
import type { NormalizerKind } from "./fieldNormalizers.js";
import {
  DOCUMENT_TYPES,
  isFieldName,
  type DocumentType,
  type FieldKind,
  type FieldName
} from "../types/document.js";
import type { ImageRegion } from "../types/ocr.js";

export type LineItemLayout = "pipe" | "whitespace" | "numbered";

export interface FieldDefinition {
  name: FieldName;
  shapeName: ShapeName;
  shape: FieldShape;
  normalize: NormalizerKind;
  /** Most specific first. Compiled with the g, i and m flags. */
  patterns: readonly RegExp[];
  critical?: FieldKind;
  regions?: readonly ImageRegion[];
  /** Pick the nth distinct candidate in reading order instead of the best scoring one. */
  occurrence?: number;
  distinct: boolean;
}

export interface DocumentProfile {
  documentType: DocumentType;
  fields: readonly FieldDefinition[];
  required: readonly FieldName[];
}

export interface LineItemRowPattern {
  layout: LineItemLayout;
  pattern: RegExp;
}

const regionSchema = z.tuple([
  z.number().min(0).max(1),
  z.number().min(0).max(1),
  z.number().min(0).max(1),
  z.number().min(0).max(1)
]);

const fieldSchema = z.object({
  shape: z.enum(SHAPE_NAMES),
  normalize: z.enum(["text", "digits", "amount", "date", "code"]),
  patterns: z.array(z.string().min(1)).min(1),
  critical: z.enum(["cae", "cuit", "amount"]).optional(),
  regions: z.array(regionSchema).optional(),
  occurrence: z.number().int().nonnegative().optional(),
  distinct: z.boolean().optional()
});

const librarySchema = z.object({
  documentTypes: z.record(
    z.string(),
    z.object({
      fields: z.array(z.string()).min(1),
      required: z.array(z.string()),
      patternOverrides: z.record(z.string(), z.array(z.string().min(1)).min(1)).optional()
    })
  ),
  fields: z.record(z.string(), fieldSchema),
  lineItemRows: z.array(
    z.object({
      layout: z.enum(["pipe", "whitespace", "numbered"]),
      pattern: z.string().min(1)
    })
  )
});

export type PatternLibraryDefinition = z.infer<typeof librarySchema>;

const LINE_ITEM_GROUPS = ["description", "quantity", "unitPrice"] as const;

function invalid(field: string, reason: string): Error {
  return new Error(`pattern_library_invalid:${field}:${reason}`);
}

function compile(field: string, source: string, flags: string): RegExp {
  try {
    return new RegExp(source, flags);
  } catch (error) {
    throw invalid(field, error instanceof Error ? error.message : String(error));
  }
}

function captureGroupCount(pattern: RegExp): number {
  const probe = new RegExp(`${pattern.source}|`).exec("");
  return probe ? probe.length - 1 : 0;
}

/**
 * Immutable registry of per-document-type field patterns. Built once;
 * any malformed entry is a hard fault at construction.
 */
export class FieldPatternLibrary {
  private readonly profiles: ReadonlyMap<DocumentType, DocumentProfile>;
  readonly lineItemRows: readonly LineItemRowPattern[];

  constructor(definition: PatternLibraryDefinition) {
    const parsed = librarySchema.parse(definition);
    const profiles = new Map<DocumentType, DocumentProfile>();

    for (const documentType of DOCUMENT_TYPES) {
      const profileDefinition = parsed.documentTypes[documentType];
      if (!profileDefinition) {
        throw invalid(documentType, "missing_document_type");
      }

      const fields = profileDefinition.fields.map((name) =>
        this.buildField(name, parsed.fields[name], profileDefinition.patternOverrides?.[name])
      );

      const required = profileDefinition.required.map((name) => {
        if (!isFieldName(name) || !fields.some((field) => field.name === name)) {
          throw invalid(name, `required_but_not_extracted_for_${documentType}`);
        }
        return name;
      });

      profiles.set(documentType, { documentType, fields, required });
    }

    this.profiles = profiles;
    this.lineItemRows = parsed.lineItemRows.map((row) => {
      const pattern = compile(`line_item_${row.layout}`, row.pattern, "im");
      if (row.layout !== "pipe") {
        for (const group of LINE_ITEM_GROUPS) {
          if (!row.pattern.includes(`(?<${group}>`)) {
            throw invalid(`line_item_${row.layout}`, `missing_group_${group}`);
          }
        }
      }
      return { layout: row.layout, pattern };
    });
  }

  profile(documentType: DocumentType): DocumentProfile {
    const profile = this.profiles.get(documentType);
    if (!profile) {
      throw new Error(`unknown_document_type:${documentType}`);
    }
    return profile;
  }

  field(documentType: DocumentType, name: FieldName): FieldDefinition | undefined {
    return this.profile(documentType).fields.find((field) => field.name === name);
  }

  /** Definition lookup across every profile; fields share one definition. */
  definitionOf(name: FieldName): FieldDefinition | undefined {
    for (const profile of this.profiles.values()) {
      const field = profile.fields.find((entry) => entry.name === name);
      if (field) return field;
    }
    return undefined;
  }

  private buildField(
    name: string,
    definition: z.infer<typeof fieldSchema> | undefined,
    overridePatterns: string[] | undefined
  ): FieldDefinition {
    if (!isFieldName(name)) {
      throw invalid(name, "unknown_field");
    }
    if (!definition) {
      throw invalid(name, "missing_definition");
    }

    const patterns = (overridePatterns ?? definition.patterns).map((source) => {
      const pattern = compile(name, source, "gim");
      if (captureGroupCount(pattern) < 1) {
        throw invalid(name, "pattern_without_capture_group");
      }
      return pattern;
    });

    if (definition.distinct && definition.occurrence === undefined) {
      throw invalid(name, "distinct_requires_occurrence");
    }

    return {
      name,
      shapeName: definition.shape,
      shape: FIELD_SHAPES[definition.shape],
      normalize: definition.normalize,
      patterns,
      critical: definition.critical,
      regions: definition.regions?.map(([left, top, width, height]) => ({ left, top, width, height })),
      occurrence: definition.occurrence,
      distinct: definition.distinct ?? false
    };
  }
}

export function loadPatternLibrary(
  location: URL = new URL("../../rules/field-patterns.json", import.meta.url)
): FieldPatternLibrary {
  const raw: unknown = JSON.parse(readFileSync(location, "utf8"));
  return new FieldPatternLibrary(librarySchema.parse(raw));
}

export const fieldPatternLibrary = loadPatternLibrary();
