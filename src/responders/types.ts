/**
 * Responder capability: turns an utterance (and the history around it) into reply text.
 * Selected once when the session is built; remote and local variants.
 */

import type { Turn } from "../memory/types";

export type ResponderMode = "remote" | "local";

export interface IntentResult {
  intent: string;
  /** 0..1 */
  confidence: number;
  entities: string[];
  requiresAction: boolean;
}

export interface ResponderRequest {
  /** Trimmed user utterance. */
  utterance: string;
  /** Full ordered history ending with the pending user turn. */
  history: readonly Turn[];
  /** Session-scoped user metadata. */
  context: ReadonlyMap<string, string>;
}

export interface Responder {
  readonly mode: ResponderMode;
  /** Model or knowledge-base label for summaries. */
  readonly label: string;
  /** Reply text. Rejects on any generation failure; the session owns the fallback. */
  generate(request: ResponderRequest): Promise<string>;
  /** Never rejects; unknown result on failure. */
  analyzeIntent(utterance: string): Promise<IntentResult>;
}
