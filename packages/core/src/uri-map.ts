import { LookupError } from "./errors.js";
import { type MatchPolicy, type URI, uriSegments } from "./uri.js";

/** Options for a single URIMap registration */
export interface URIMapRegisterOptions {
  /** Match policy of the registered URI (default: "exact") */
  readonly match?: MatchPolicy;
}

/** A registered entry as exposed by `URIMap.entries()` */
export interface URIMapEntry<V> {
  readonly uri: URI;
  readonly match: MatchPolicy;
  readonly value: V;
}

interface StoredEntry<V> {
  readonly uri: URI;
  readonly value: V;
}

interface PrefixEntry<V> extends StoredEntry<V> {
  readonly segments: readonly string[];
}

interface WildcardEntry<V> extends PrefixEntry<V> {
  readonly specificity: number;
}

/**
 * Mapping from URI to an arbitrary value.
 *
 * Exact registrations are the default and the only ones consulted unless
 * prefix or wildcard entries were registered explicitly. Resolution order:
 *
 * 1. exact entry for the URI
 * 2. longest registered prefix whose segments lead the URI's segments
 * 3. wildcard pattern with the same segment count and the most
 *    non-empty segments (first registered wins a tie)
 *
 * @example
 * ```typescript
 * const map = new URIMap<string>();
 * map.register(asUri("com.example.bad_arg"), "bad argument");
 * map.register(asUri("com.example"), "example", { match: "prefix" });
 *
 * map.resolve("com.example.bad_arg"); // "bad argument"
 * map.resolve("com.example.other");   // "example"
 * map.resolve("org.other");           // throws LookupError
 * ```
 */
export class URIMap<V> {
  private readonly exact = new Map<string, StoredEntry<V>>();
  private readonly prefixes = new Map<string, PrefixEntry<V>>();
  private readonly wildcards = new Map<string, WildcardEntry<V>>();

  /**
   * Store `value` under `uri`, replacing any value registered for the same
   * URI and match policy.
   *
   * @returns The replaced value, if there was one
   */
  register(uri: URI, value: V, options?: URIMapRegisterOptions): V | undefined {
    const match = options?.match ?? "exact";
    switch (match) {
      case "exact": {
        const previous = this.exact.get(uri);
        this.exact.set(uri, { uri, value });
        return previous?.value;
      }
      case "prefix": {
        const previous = this.prefixes.get(uri);
        this.prefixes.set(uri, { uri, segments: uriSegments(uri), value });
        return previous?.value;
      }
      case "wildcard": {
        const previous = this.wildcards.get(uri);
        const segments = uriSegments(uri);
        this.wildcards.set(uri, {
          uri,
          segments,
          specificity: segments.filter((segment) => segment.length > 0).length,
          value,
        });
        return previous?.value;
      }
    }
  }

  /**
   * Resolve a concrete URI to the most applicable registered value.
   *
   * @throws {LookupError} If no entry applies
   */
  resolve(uri: string): V {
    const found = this.lookup(uri);
    if (!found) {
      throw new LookupError(uri);
    }
    return found.value;
  }

  /** Resolve a concrete URI, returning undefined when no entry applies */
  get(uri: string): V | undefined {
    return this.lookup(uri)?.value;
  }

  /** Check if some entry applies to the URI */
  has(uri: string): boolean {
    return this.lookup(uri) !== undefined;
  }

  /**
   * Remove the entry registered for `uri` under the given match policy.
   *
   * @returns true if an entry was removed
   */
  delete(uri: URI, match: MatchPolicy = "exact"): boolean {
    if (match === "prefix") {
      return this.prefixes.delete(uri);
    }
    if (match === "wildcard") {
      return this.wildcards.delete(uri);
    }
    return this.exact.delete(uri);
  }

  clear(): void {
    this.exact.clear();
    this.prefixes.clear();
    this.wildcards.clear();
  }

  /** Number of registered entries across all match policies */
  get size(): number {
    return this.exact.size + this.prefixes.size + this.wildcards.size;
  }

  *entries(): IterableIterator<URIMapEntry<V>> {
    for (const { uri, value } of this.exact.values()) {
      yield { uri, match: "exact", value };
    }
    for (const { uri, value } of this.prefixes.values()) {
      yield { uri, match: "prefix", value };
    }
    for (const { uri, value } of this.wildcards.values()) {
      yield { uri, match: "wildcard", value };
    }
  }

  private lookup(uri: string): StoredEntry<V> | undefined {
    const exact = this.exact.get(uri);
    if (exact) {
      return exact;
    }

    const segments = uriSegments(uri);

    if (this.prefixes.size > 0) {
      let best: PrefixEntry<V> | undefined;
      for (const entry of this.prefixes.values()) {
        if (matchesPrefix(entry.segments, segments) && (!best || entry.segments.length > best.segments.length)) {
          best = entry;
        }
      }
      if (best) {
        return best;
      }
    }

    if (this.wildcards.size > 0) {
      let best: WildcardEntry<V> | undefined;
      for (const entry of this.wildcards.values()) {
        if (matchesWildcard(entry.segments, segments) && (!best || entry.specificity > best.specificity)) {
          best = entry;
        }
      }
      if (best) {
        return best;
      }
    }

    return undefined;
  }
}

function matchesPrefix(prefix: readonly string[], segments: readonly string[]): boolean {
  if (prefix.length > segments.length) {
    return false;
  }
  return prefix.every((part, index) => part === segments[index]);
}

function matchesWildcard(pattern: readonly string[], segments: readonly string[]): boolean {
  if (pattern.length !== segments.length) {
    return false;
  }
  return pattern.every((part, index) => part.length === 0 || part === segments[index]);
}
