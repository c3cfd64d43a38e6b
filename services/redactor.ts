/**
 * ENTITY REDACTOR
 *
 * Replaces spans with numbered placeholders (#1_PERSON_REDACTED) and keeps
 * a re-identification map. Ids are per label: each distinct
 * (LABEL, original) pair gets the smallest unused positive id for its label,
 * and the instance remembers pairs across calls until clearHistory().
 *
 * Replacement runs in descending start order so earlier offsets stay valid.
 * Spans out of range, or overlapping a span already applied, are skipped.
 */

import { Effect } from "effect";
import { DEFAULT_REDACTION_CONFIG, type RedactionConfig } from "../schemas/config";
import {
  formatPlaceholder,
  markAsAnonymized,
  type AnonymizedText,
} from "../schemas/anonymized";
import type { RedactionDetail, RedactionInfo, ReIdentificationMap, Span } from "../schemas/schemas";
import { appLogger } from "./appLogger";
import { InputError } from "./errors";
import { planSubstitutions, spliceText } from "./spanPlanning";

export interface RedactionResult {
  readonly anonymizedText: AnonymizedText;
  readonly replacements: RedactionDetail[];
  readonly redactionInfo: RedactionInfo;
  readonly reIdentificationMap: ReIdentificationMap;
}

export interface LabelRedactionStats {
  readonly uniqueEntities: number;
  readonly maxIdUsed: number;
}

export interface RedactionStats {
  readonly totalUniqueEntities: number;
  readonly labelsProcessed: number;
  readonly totalRedactions: number;
  readonly labelStatistics: Record<string, LabelRedactionStats>;
  readonly defaultFormat: string;
}

export type RedactOptions = Partial<RedactionConfig>;

const identityKey = (label: string, original: string): string => `${label}\u0000${original}`;

interface PlannedRedaction {
  readonly span: Span;
  readonly label: string;
  readonly original: string;
}

export class EntityRedactor {
  private readonly identityMap = new Map<string, number>();
  private readonly usedIds = new Map<string, Set<number>>();
  private totalRedactions = 0;

  constructor(private readonly defaults: RedactionConfig = DEFAULT_REDACTION_CONFIG) {}

  /**
   * Smallest positive id not yet used for `label`; marks it used.
   */
  private nextId(label: string): number {
    let used = this.usedIds.get(label);
    if (!used) {
      used = new Set();
      this.usedIds.set(label, used);
    }
    let candidate = 1;
    while (used.has(candidate)) candidate++;
    used.add(candidate);
    return candidate;
  }

  private idFor(label: string, original: string): number {
    const key = identityKey(label, original);
    const known = this.identityMap.get(key);
    if (known !== undefined) return known;
    const id = this.nextId(label);
    this.identityMap.set(key, id);
    return id;
  }

  private resolveOptions(options: RedactOptions): RedactionConfig {
    return {
      placeholderFormat: options.placeholderFormat ?? this.defaults.placeholderFormat,
      numbered: options.numbered ?? this.defaults.numbered,
      consistentIds: options.consistentIds ?? this.defaults.consistentIds,
    };
  }

  redact(text: string, spans: ReadonlyArray<Span>, options: RedactOptions = {}): RedactionResult {
    const config = this.resolveOptions(options);

    if (spans.length === 0) {
      return {
        anonymizedText: markAsAnonymized(text),
        replacements: [],
        redactionInfo: {
          entitiesProcessed: 0,
          redactionsApplied: 0,
          skipped: 0,
          formatUsed: config.placeholderFormat,
          numbered: config.numbered,
          consistentIds: config.consistentIds,
          uniqueEntities: 0,
        },
        reIdentificationMap: {},
      };
    }

    const plan = planSubstitutions(text, spans);
    const planned: PlannedRedaction[] = plan.planned.map((span) => ({
      span,
      label: span.label.toUpperCase(),
      original: span.text,
    }));
    const skipped = plan.skipped;

    // Ids are handed out in reading order.
    const ids = new Map<PlannedRedaction, string>();
    for (const item of [...planned].reverse()) {
      if (!config.numbered) {
        ids.set(item, `${item.label}_STATIC`);
      } else if (config.consistentIds) {
        ids.set(item, String(this.idFor(item.label, item.original)));
      } else {
        ids.set(item, String(this.nextId(item.label)));
      }
    }

    let redacted = text;
    const details: RedactionDetail[] = [];
    const reIdentificationMap: Record<string, string> = {};

    for (const item of planned) {
      const redactionId = ids.get(item) ?? `${item.label}_STATIC`;
      const placeholder = config.numbered
        ? formatPlaceholder(config.placeholderFormat, { id: redactionId, label: item.label, count: redactionId })
        : `${item.label}_REDACTED`;

      redacted = spliceText(redacted, item.span.start, item.span.end, placeholder);
      details.push({
        label: item.label,
        original: item.original,
        placeholder,
        start: item.span.start,
        end: item.span.end,
        score: item.span.score,
        redactionId,
      });
      reIdentificationMap[placeholder] = item.original;
    }

    details.sort((a, b) => a.start - b.start);
    this.totalRedactions += details.length;

    if (skipped > 0) {
      appLogger.warn("Skipped spans that were out of range or overlapping", { skipped });
    }
    appLogger.debug("Redaction complete", { applied: details.length, skipped });

    return {
      anonymizedText: markAsAnonymized(redacted),
      replacements: details,
      redactionInfo: {
        entitiesProcessed: spans.length,
        redactionsApplied: details.length,
        skipped,
        formatUsed: config.placeholderFormat,
        numbered: config.numbered,
        consistentIds: config.consistentIds,
        uniqueEntities: new Set(details.map((d) => identityKey(d.label, d.original))).size,
      },
      reIdentificationMap,
    };
  }

  /**
   * Redact several texts with one id assignment across all of them.
   * Distinct pairs are numbered in order of first occurrence.
   */
  batchRedact(
    texts: ReadonlyArray<string>,
    spanLists: ReadonlyArray<ReadonlyArray<Span>>,
    options: RedactOptions = {}
  ): Effect.Effect<RedactionResult[], InputError> {
    if (texts.length !== spanLists.length) {
      return Effect.fail(
        new InputError({
          message: `Got ${texts.length} texts but ${spanLists.length} span lists`,
          operation: "batchRedact",
        })
      );
    }

    return Effect.sync(() => {
      const config = this.resolveOptions(options);

      if (config.numbered && config.consistentIds) {
        texts.forEach((text, i) => {
          const ascending = planSubstitutions(text, spanLists[i]).planned.reverse();
          for (const span of ascending) {
            this.idFor(span.label.toUpperCase(), span.text);
          }
        });
      }

      return texts.map((text, i) => this.redact(text, spanLists[i], config));
    });
  }

  clearHistory(): void {
    this.identityMap.clear();
    this.usedIds.clear();
    this.totalRedactions = 0;
  }

  getRedactionStats(): RedactionStats {
    const labelStatistics: Record<string, LabelRedactionStats> = {};
    for (const [label, used] of this.usedIds) {
      labelStatistics[label] = {
        uniqueEntities: used.size,
        maxIdUsed: used.size > 0 ? Math.max(...used) : 0,
      };
    }

    return {
      totalUniqueEntities: this.identityMap.size,
      labelsProcessed: this.usedIds.size,
      totalRedactions: this.totalRedactions,
      labelStatistics,
      defaultFormat: this.defaults.placeholderFormat,
    };
  }
}
