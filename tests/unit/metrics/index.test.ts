/**
 * Unit tests for turn metrics and outcome counters.
 */

import {
  countTurnOutcome,
  getLastTurnMetrics,
  getTurnCounters,
  recordTurnMetrics,
  resetMetrics,
} from "../../../src/metrics";

beforeEach(() => resetMetrics());

describe("metrics", () => {
  it("keeps the last recorded turn", () => {
    recordTurnMetrics({ responseLatencyMs: 120, replyLength: 14 });
    recordTurnMetrics({ asrLatencyMs: 300, responseLatencyMs: 80, replyLength: 9 });
    expect(getLastTurnMetrics()).toEqual({ asrLatencyMs: 300, responseLatencyMs: 80, replyLength: 9 });
  });

  it("counts outcomes by kind", () => {
    countTurnOutcome("reply");
    countTurnOutcome("reply");
    countTurnOutcome("no-speech");
    expect(getTurnCounters()).toEqual({ ignored: 0, activation: 0, reply: 2, "no-speech": 1, "asr-failed": 0 });
  });

  it("returns copies", () => {
    recordTurnMetrics({ replyLength: 3 });
    const snapshot = getLastTurnMetrics();
    snapshot.replyLength = 99;
    expect(getLastTurnMetrics().replyLength).toBe(3);
  });

  it("resets everything", () => {
    countTurnOutcome("ignored");
    recordTurnMetrics({ replyLength: 3 });
    resetMetrics();
    expect(getLastTurnMetrics()).toEqual({});
    expect(getTurnCounters().ignored).toBe(0);
  });
});
