/**
 * ANONYMIZED TEXT TYPE SYSTEM
 *
 * Branded strings separate text that still carries original entity values
 * from text that has been through the redactor or replacer.
 */

// ============================================================================
// BRANDED TYPES
// ============================================================================

/**
 * Brand tags - compile-time only markers
 */
type Brand<K, T> = K & { __brand: T };

/**
 * AnonymizedText - output of redaction or replacement
 */
export type AnonymizedText = Brand<string, "AnonymizedText">;

/**
 * Placeholder - a redaction marker like #1_PERSON_REDACTED
 */
export type Placeholder = Brand<string, "Placeholder">;

export const DEFAULT_PLACEHOLDER_FORMAT = "#{id}_{label}_REDACTED";

// ============================================================================
// TYPE CONSTRUCTORS
// ============================================================================

/**
 * Mark text as anonymized - ONLY CALL FROM REDACTOR / REPLACER
 *
 * @internal
 */
export function markAsAnonymized(text: string): AnonymizedText {
  return text as AnonymizedText;
}

export interface PlaceholderFields {
  readonly id: string;
  readonly label: string;
  readonly count: string;
}

/**
 * Fill a placeholder template. Supported fields: {id}, {label}, {count}.
 * Unknown fields are left as written.
 */
export function formatPlaceholder(template: string, fields: PlaceholderFields): Placeholder {
  const filled = template.replace(/\{(id|label|count)\}/g, (_match, field: string) => {
    if (field === "id") return fields.id;
    if (field === "label") return fields.label;
    return fields.count;
  });
  return filled as Placeholder;
}

// ============================================================================
// PLACEHOLDER INSPECTION
// ============================================================================

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Build a matcher for placeholders produced by `template`.
 * Capture groups: label (when the template has {label}), id (when it has {id}).
 */
export function placeholderPattern(template: string): RegExp {
  let source = "";
  let rest = template;
  const fieldPattern = /\{(id|label|count)\}/;
  const seen = new Set<string>();

  for (let match = fieldPattern.exec(rest); match; match = fieldPattern.exec(rest)) {
    source += escapeRegExp(rest.slice(0, match.index));
    const field = match[1];
    if (field === "label") {
      source += seen.has("label") ? "[A-Z0-9_]+" : "(?<label>[A-Z0-9_]+?)";
    } else if (field === "id" && !seen.has("id")) {
      source += "(?<id>\\d+)";
    } else {
      source += "\\d+";
    }
    seen.add(field);
    rest = rest.slice(match.index + match[0].length);
  }
  source += escapeRegExp(rest);

  return new RegExp(source, "g");
}

/**
 * Extract all placeholders from anonymized text
 */
export function extractPlaceholders(
  text: AnonymizedText,
  template: string = DEFAULT_PLACEHOLDER_FORMAT
): Placeholder[] {
  const matches = text.match(placeholderPattern(template)) ?? [];
  return matches.map((m) => m as Placeholder);
}

/**
 * Count placeholders by label
 */
export function countPlaceholdersByLabel(
  text: AnonymizedText,
  template: string = DEFAULT_PLACEHOLDER_FORMAT
): Record<string, number> {
  const counts: Record<string, number> = {};

  for (const match of text.matchAll(placeholderPattern(template))) {
    const label = match.groups?.label;
    if (label) {
      counts[label] = (counts[label] ?? 0) + 1;
    }
  }

  return counts;
}

/**
 * Reverse a redaction using its re-identification map.
 * Longer placeholders are restored first, so with a "{label}{id}" template
 * PERSON1 never clobbers PERSON12.
 */
export function reidentify(
  text: AnonymizedText,
  reIdentificationMap: Readonly<Record<string, string>>
): string {
  const placeholders = Object.keys(reIdentificationMap).sort((a, b) => b.length - a.length);

  let restored: string = text;
  for (const placeholder of placeholders) {
    restored = restored.split(placeholder).join(reIdentificationMap[placeholder]);
  }
  return restored;
}
