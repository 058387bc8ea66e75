/**
 * Feature table block splitting
 *
 * Turns the lines between FEATURES and ORIGIN into feature inputs: key,
 * location text and qualifiers, in file order. Locations are not parsed
 * here; the feature table does that on demand.
 *
 * @module genbank/features
 */

import type { FeatureInput } from "../../features/feature-table";
import type { NumberedLine } from "./types";
import { GENBANK_LIMITS } from "./types";

// Qualifiers whose wrapped lines are concatenated without a space
const UNSPACED_QUALIFIERS = new Set(["translation"]);

interface QualifierDraft {
  readonly name: string;
  raw: string;
  readonly quoted: boolean;
}

interface FeatureDraft {
  readonly key: string;
  location: string;
  readonly lineNumber: number;
  readonly qualifiers: QualifierDraft[];
}

function isClosedQuote(raw: string): boolean {
  if (raw.length < 2 || !raw.endsWith('"')) return false;
  let quotes = 0;
  for (const char of raw) {
    if (char === '"') quotes++;
  }
  // Embedded quotes are doubled, so a closed value has an even count
  return quotes % 2 === 0;
}

function startQualifier(text: string): QualifierDraft {
  const body = text.slice(1);
  const eq = body.indexOf("=");
  if (eq === -1) {
    return { name: body.trim(), raw: "", quoted: false };
  }
  const raw = body.slice(eq + 1).trim();
  return { name: body.slice(0, eq).trim(), raw, quoted: raw.startsWith('"') };
}

function qualifierValue(draft: QualifierDraft): string {
  if (!draft.quoted) return draft.raw;
  const inner = draft.raw.endsWith('"') && draft.raw.length >= 2 ? draft.raw.slice(1, -1) : draft.raw.slice(1);
  return inner.replace(/""/g, '"');
}

function toFeatureInput(draft: FeatureDraft): FeatureInput {
  // Names such as /constructor must not collide with Object.prototype
  const qualifiers = new Map<string, string | string[]>();

  for (const q of draft.qualifiers) {
    const value = qualifierValue(q);
    const existing = qualifiers.get(q.name);
    if (existing === undefined) {
      qualifiers.set(q.name, value);
    } else if (typeof existing === "string") {
      qualifiers.set(q.name, [existing, value]);
    } else {
      existing.push(value);
    }
  }

  return {
    key: draft.key,
    location: draft.location,
    qualifiers: Object.fromEntries(qualifiers),
    lineNumber: draft.lineNumber,
  };
}

/**
 * Split feature table lines into feature inputs
 *
 * @param lines - Feature section from {@link splitSections}
 * @param onWarning - Receives lines that precede the first feature key
 *
 * @example
 * ```typescript
 * parseFeatureBlock(numberLines([
 *   "     CDS             join(1..10,",
 *   "                     20..30)",
 *   '                     /gene="abc"',
 * ].join("\n")));
 * // [{ key: "CDS", location: "join(1..10,20..30)", qualifiers: { gene: "abc" }, lineNumber: 1 }]
 * ```
 */
export function parseFeatureBlock(
  lines: readonly NumberedLine[],
  onWarning: (warning: string, lineNumber?: number) => void = () => {}
): FeatureInput[] {
  const features: FeatureInput[] = [];
  let current: FeatureDraft | undefined;

  for (const { text, lineNumber } of lines) {
    const content = text.trim();
    if (content === "") continue;

    const indent = text.length - text.trimStart().length;
    const open = current?.qualifiers[current.qualifiers.length - 1];
    const inQuote = open !== undefined && open.quoted && !isClosedQuote(open.raw);

    if (indent < GENBANK_LIMITS.FEATURE_VALUE_COLUMN && !inQuote) {
      if (current !== undefined) features.push(toFeatureInput(current));
      const [key = "", ...rest] = content.split(/\s+/);
      current = { key, location: rest.join(""), lineNumber, qualifiers: [] };
      continue;
    }

    if (current === undefined) {
      onWarning(`Feature table line outside any feature: ${content}`, lineNumber);
      continue;
    }

    if (inQuote) {
      const separator = UNSPACED_QUALIFIERS.has(open.name) ? "" : " ";
      open.raw += separator + content;
    } else if (content.startsWith("/")) {
      current.qualifiers.push(startQualifier(content));
    } else if (current.qualifiers.length === 0) {
      current.location += content.replace(/\s+/g, "");
    } else if (open !== undefined) {
      open.raw += ` ${content}`;
    }
  }

  if (current !== undefined) features.push(toFeatureInput(current));
  return features;
}
