/**
 * Thrown when a label string does not belong to its category.
 * Record-to-profile conversion lets this propagate; the catalog decides
 * whether a failing record is skipped.
 */
export class UnknownLabelError extends Error {
  readonly category: string;
  readonly label: string;

  constructor(category: string, label: string, allowed: readonly string[]) {
    super(`Unknown ${category} '${label}' (expected one of: ${allowed.join(", ")})`);
    this.name = "UnknownLabelError";
    this.category = category;
    this.label = label;
  }
}

/**
 * Thrown when bundled taxonomy data does not have the expected structure.
 */
export class TaxonomyFormatError extends Error {
  readonly source: string;
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Malformed taxonomy data in ${source}:\n  ${issues.join("\n  ")}`);
    this.name = "TaxonomyFormatError";
    this.source = source;
    this.issues = issues;
  }
}
