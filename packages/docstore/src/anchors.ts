import { InvalidAnchorError } from "./errors";

export const DEFAULT_ANCHOR = "section";

const NON_ANCHOR_CHARACTERS = /[^\p{L}\p{M}\p{N}\p{Pc} -]/gu;

/**
 * Derives the anchor a Markdown host would generate for a heading:
 * lower-cased, punctuation dropped, each space turned into a hyphen.
 * Hyphen runs are kept so `Props & State` becomes `props--state`.
 */
export function slugifyHeading(text: string): string {
  const slug = text
    .trim()
    .toLowerCase()
    .replace(NON_ANCHOR_CHARACTERS, "")
    .replace(/ /g, "-");
  return slug.length > 0 ? slug : DEFAULT_ANCHOR;
}

/** Hands out unique anchors in document order (`hooks`, `hooks-1`, ...). */
export class AnchorRegistry {
  private readonly claimed = new Set<string>();
  private readonly occurrences = new Map<string, number>();

  claim(headingText: string): string {
    const base = slugifyHeading(headingText);
    let count = this.occurrences.get(base) ?? 0;
    let candidate = count === 0 ? base : `${base}-${count}`;

    while (this.claimed.has(candidate)) {
      count += 1;
      candidate = `${base}-${count}`;
    }

    this.occurrences.set(base, count + 1);
    this.claimed.add(candidate);
    return candidate;
  }

  has(anchor: string): boolean {
    return this.claimed.has(anchor);
  }
}

export function normalizeAnchor(value: string): string {
  const trimmed = value.trim();
  const bare = trimmed.startsWith("#") ? trimmed.slice(1) : trimmed;
  if (bare.length === 0) {
    throw new InvalidAnchorError(value, "anchor must not be empty");
  }

  try {
    return decodeURIComponent(bare);
  } catch (error) {
    throw new InvalidAnchorError(value, "malformed percent-encoding", {
      cause: error,
    });
  }
}
