import type { Directive } from '../types';
import { describeDirective, isSameDirective } from '../types';

/**
 * One resolved pair, as reported by `entries()`.
 */
export type ResolutionEntry = {
  source: string;
  target: string;
  directive: Directive;
};

/**
 * Memo of resolved conversion directives keyed by
 * (concrete source type, target type).
 *
 * Entries are write-once: the methods a registered type exposes are
 * snapshotted at definition time, so the answer for a pair cannot change
 * afterwards. There is no eviction and no invalidation.
 */
export type ResolutionCache = {
  /**
   * @returns The directive stored for the pair, or `undefined` on a miss.
   */
  lookup(source: string, target: string): Directive | undefined;

  /**
   * Inserts the directive for a pair.
   *
   * Re-storing an equal directive is a no-op, so two resolutions of the same
   * pair racing each other are harmless.
   *
   * @throws If a different directive is already stored for the pair. Callers
   *   must `lookup` first.
   */
  store(source: string, target: string, directive: Directive): void;

  has(source: string, target: string): boolean;

  /**
   * Number of resolved pairs, `none` results included.
   */
  readonly size: number;

  entries(): ResolutionEntry[];
};

/**
 * Creates an empty resolution cache.
 *
 * Layout: source type → (target type → directive). Keying the outer map by
 * the concrete source type gives every subtype its own entries even when an
 * ancestor is convertible too.
 */
export function createResolutionCache(): ResolutionCache {
  const bySource = new Map<string, Map<string, Directive>>();
  let size = 0;

  return {
    lookup(source, target) {
      return bySource.get(source)?.get(target);
    },

    store(source, target, directive) {
      let byTarget = bySource.get(source);
      if (!byTarget) {
        byTarget = new Map();
        bySource.set(source, byTarget);
      }

      const existing = byTarget.get(target);
      if (existing) {
        if (isSameDirective(existing, directive)) return;
        throw new Error(
          `[coercible] Resolution for "${source}" -> "${target}" is already ` +
            `${describeDirective(existing)}; refusing to overwrite it with ${describeDirective(directive)}.`
        );
      }

      byTarget.set(target, directive);
      size += 1;
    },

    has(source, target) {
      return bySource.get(source)?.has(target) ?? false;
    },

    get size() {
      return size;
    },

    entries() {
      const entries: ResolutionEntry[] = [];
      for (const [source, byTarget] of bySource) {
        for (const [target, directive] of byTarget) {
          entries.push({ source, target, directive });
        }
      }
      return entries;
    }
  };
}
