/**
 * Wake-phrase filter for transcripts. Detection is a case-insensitive substring match;
 * stripping removes whole-word occurrences so "ai" is not cut out of "said".
 */

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const LEADING = /^[\s\p{P}]+/u;
const TRAILING = /[\s,;:]+$/;
const BEFORE_TERMINAL = /[\s,;:]+([.!?])/g;

export class WakeWordFilter {
  private readonly phrases: string[];
  private readonly patterns: RegExp[];

  constructor(wakeWords: readonly string[]) {
    const phrases = wakeWords.map((w) => w.trim().toLowerCase()).filter((w) => w.length > 0);
    if (phrases.length === 0) throw new RangeError("at least one wake phrase is required");
    // Longest first: "hey haro" goes before "haro".
    this.phrases = [...new Set(phrases)].sort((a, b) => b.length - a.length);
    this.patterns = this.phrases.map(
      (p) => new RegExp(`(^|[^\\p{L}\\p{N}'])${escapeRegExp(p).replace(/ +/g, "\\s+")}(?=$|[^\\p{L}\\p{N}'])[,;:!.]*`, "giu")
    );
  }

  get wakeWords(): readonly string[] {
    return this.phrases;
  }

  detect(utterance: string): boolean {
    const text = utterance.toLowerCase();
    return this.phrases.some((p) => text.includes(p));
  }

  /**
   * Utterance with every wake phrase removed, along with punctuation left dangling at the
   * edges; "" for a bare activation. A closing "?" or "." stays.
   */
  strip(utterance: string): string {
    let text = utterance;
    for (const pattern of this.patterns) {
      text = text.replace(pattern, "$1 ");
    }
    return text.replace(/\s+/g, " ").replace(BEFORE_TERMINAL, "$1").replace(LEADING, "").replace(TRAILING, "");
  }
}
