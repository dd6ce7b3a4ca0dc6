import type { IntentResult } from "../responders/types";

export type OrchestratorState = "stopped" | "initializing" | "listening";

export type IgnoreReason = "not-listening" | "no-wake-word";

/** What happened to one recognized utterance. */
export type TurnOutcome =
  | { kind: "ignored"; reason: IgnoreReason }
  | { kind: "activation"; reply: string }
  | { kind: "reply"; utterance: string; reply: string; intent?: IntentResult };

/** Optional hooks for the CLI and tests. */
export interface PipelineCallbacks {
  onStateChange?: (state: OrchestratorState) => void;
  /** Raw transcript, before wake-word filtering. */
  onUserTranscript?: (text: string) => void;
  onIntent?: (utterance: string, intent: IntentResult) => void;
  /** Reply handed to the speech queue. */
  onReply?: (utterance: string, reply: string) => void;
}
