/**
 * Semantic-version ordering of release tags
 */

import semver, { type SemVer } from "semver";
import { InvalidInputError } from "../utils/errors.js";

export type BumpKind = "major" | "minor" | "patch";

export const BUMP_KINDS: readonly BumpKind[] = ["major", "minor", "patch"];

/**
 * Tags split into the semver-ordered ones (ascending) and the rest
 */
export interface TagOrdering {
  ordered: string[];
  malformed: string[];
}

export function isBumpKind(value: string): value is BumpKind {
  return BUMP_KINDS.some((kind) => kind === value);
}

export class VersionResolver {
  readonly prefix: string;

  constructor(prefix = "v") {
    this.prefix = prefix;
  }

  /**
   * Parse `<prefix>MAJOR.MINOR.PATCH[-PRERELEASE]`, or null when the tag does
   * not follow that grammar exactly.
   */
  tryParse(tag: string): SemVer | null {
    if (!tag.startsWith(this.prefix)) return null;
    const rest = tag.slice(this.prefix.length);
    const parsed = semver.parse(rest);
    // semver.parse accepts a leading "v", "=" and build metadata; a tag must not carry them
    if (!parsed || parsed.version !== rest) return null;
    return parsed;
  }

  parse(tag: string): SemVer {
    const parsed = this.tryParse(tag);
    if (!parsed) {
      throw new InvalidInputError(`'${tag}' is not a valid release tag`, {
        code: "INVALID_TAG",
        context: { tag, prefix: this.prefix },
        suggestion: `Tags look like ${this.prefix}1.2.3 or ${this.prefix}1.2.3-rc.1`,
      });
    }
    return parsed;
  }

  format(version: string): string {
    return `${this.prefix}${version}`;
  }

  /**
   * Order tags ascending by semver precedence; duplicates collapse
   */
  order(tags: Iterable<string>): TagOrdering {
    const valid = new Map<string, SemVer>();
    const malformed: string[] = [];

    for (const tag of tags) {
      const parsed = this.tryParse(tag);
      if (parsed) {
        valid.set(tag, parsed);
      } else if (!malformed.includes(tag)) {
        malformed.push(tag);
      }
    }

    const ordered = [...valid.entries()]
      .sort(([, a], [, b]) => semver.compare(a, b))
      .map(([tag]) => tag);

    return { ordered, malformed };
  }

  latest(tags: Iterable<string>): string | undefined {
    const { ordered } = this.order(tags);
    return ordered[ordered.length - 1];
  }

  /**
   * Highest tag strictly below `tag`
   */
  predecessor(tags: Iterable<string>, tag: string): string {
    this.parse(tag);
    const { ordered } = this.order(tags);
    const index = ordered.indexOf(tag);

    if (index === -1) {
      throw new InvalidInputError(`Cannot find a predecessor: ${tag} is not a known tag`, {
        code: "NO_PREDECESSOR",
        context: { tag, known: ordered },
      });
    }
    const previous = ordered[index - 1];
    if (previous === undefined) {
      throw new InvalidInputError(`${tag} is the first release; there is nothing to roll back to`, {
        code: "NO_PREDECESSOR",
        context: { tag },
      });
    }

    return previous;
  }

  /**
   * Next unused tag above the current latest
   */
  next(tags: Iterable<string>, bump: BumpKind = "patch"): string {
    const current = this.latest(tags);
    const base = current ? this.parse(current).version : "0.0.0";
    const bumped = semver.inc(base, bump);

    if (!bumped) {
      throw new InvalidInputError(`Cannot apply a ${bump} bump to ${base}`, {
        code: "INVALID_ARGUMENT",
        context: { base, bump },
      });
    }

    return this.format(bumped);
  }
}
