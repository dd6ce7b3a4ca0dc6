/**
 * Unit tests for the conversation session: fallback policy, budget, ordering and reset.
 */

import { ConversationSession, FALLBACK_REPLIES, REPEAT_PROMPT } from "../../../src/conversation/session";
import { LocalResponder, localSystemPrompt } from "../../../src/responders/local";
import type { IntentResult, Responder, ResponderMode, ResponderRequest } from "../../../src/responders/types";
import { deferred, flushPromises } from "../../helpers/fixtures";

class FakeResponder implements Responder {
  readonly mode: ResponderMode = "remote";
  readonly label = "fake-model";
  readonly requests: ResponderRequest[] = [];
  intentCalls = 0;

  constructor(private readonly reply: (request: ResponderRequest) => Promise<string>) {}

  generate(request: ResponderRequest): Promise<string> {
    this.requests.push(request);
    return this.reply(request);
  }

  async analyzeIntent(_utterance: string): Promise<IntentResult> {
    this.intentCalls++;
    throw new Error("intent endpoint down");
  }
}

function session(responder: Responder, maxExchanges = 10, systemPrompt: string | undefined = "S"): ConversationSession {
  return new ConversationSession(responder, { aiName: "Haro", systemPrompt, maxExchanges, random: () => 0 });
}

const contents = (s: ConversationSession): string[] => s.getHistory().map((t) => t.content);

describe("ConversationSession.process", () => {
  it("records a successful exchange", async () => {
    const s = session(new FakeResponder(async () => " Hi there! "));
    await expect(s.process("  hello ")).resolves.toBe("Hi there!");
    expect(s.getHistory().map((t) => [t.role, t.content])).toEqual([
      ["system", "S"],
      ["user", "hello"],
      ["assistant", "Hi there!"],
    ]);
  });

  it("passes the full history ending with the pending user turn, and the user context", async () => {
    const responder = new FakeResponder(async (r) => `echo ${r.utterance}`);
    const s = session(responder);
    s.setContext("name", "Sam");
    await s.process("one");
    await s.process("two");
    const last = responder.requests[1];
    expect(last.utterance).toBe("two");
    expect(last.history.map((t) => t.content)).toEqual(["S", "one", "echo one", "two"]);
    expect(last.history[3].role).toBe("user");
    expect(last.context.get("name")).toBe("Sam");
  });

  it("asks the user to repeat a blank utterance without calling the responder", async () => {
    const responder = new FakeResponder(async () => "never");
    const s = session(responder);
    await expect(s.process("   ")).resolves.toBe(REPEAT_PROMPT);
    expect(responder.requests).toHaveLength(0);
    expect(contents(s)).toEqual(["S"]);
  });

  it("apologizes on failure and leaves history unchanged", async () => {
    const s = session(new FakeResponder(async () => Promise.reject(new Error("timeout"))));
    await expect(s.process("hello")).resolves.toBe(FALLBACK_REPLIES[0]);
    expect(contents(s)).toEqual(["S"]);
  });

  it("treats an empty reply as a failure", async () => {
    const s = session(new FakeResponder(async () => "  "));
    await expect(s.process("hello")).resolves.toBe(FALLBACK_REPLIES[0]);
    expect(s.getHistory()).toHaveLength(1);
  });

  it("picks the apology with the injected random source", async () => {
    const s = new ConversationSession(new FakeResponder(async () => Promise.reject(new Error("down"))), {
      aiName: "Haro",
      maxExchanges: 3,
      random: () => 0.99,
    });
    await expect(s.process("hello")).resolves.toBe(FALLBACK_REPLIES[2]);
  });

  it("keeps history within the exchange budget", async () => {
    const s = session(new FakeResponder(async (r) => `re ${r.utterance}`), 2);
    for (const u of ["a", "b", "c"]) await s.process(u);
    expect(contents(s)).toEqual(["S", "b", "re b", "c", "re c"]);
  });

  it("completes concurrent calls in the order they were made", async () => {
    const first = deferred<string>();
    const responder = new FakeResponder((r) => (r.utterance === "one" ? first.promise : Promise.resolve("reply two")));
    const s = session(responder);
    const p1 = s.process("one");
    const p2 = s.process("two");
    await flushPromises();
    expect(responder.requests.map((r) => r.utterance)).toEqual(["one"]);
    first.resolve("reply one");
    await expect(p1).resolves.toBe("reply one");
    await expect(p2).resolves.toBe("reply two");
    expect(contents(s)).toEqual(["S", "one", "reply one", "two", "reply two"]);
  });

  it("does not record an exchange that was in flight during reset", async () => {
    const pending = deferred<string>();
    const s = session(new FakeResponder(() => pending.promise));
    const reply = s.process("hello");
    await flushPromises();
    s.reset();
    pending.resolve("late reply");
    await expect(reply).resolves.toBe("late reply");
    expect(contents(s)).toEqual(["S"]);
  });
});

describe("ConversationSession state", () => {
  it("reset keeps the system turn and the user context", async () => {
    const s = session(new FakeResponder(async () => "ok"));
    s.setContext("name", "Sam");
    await s.process("hello");
    s.reset();
    expect(contents(s)).toEqual(["S"]);
    expect(s.getContext("name")).toBe("Sam");
  });

  it("context is last write wins", () => {
    const s = session(new FakeResponder(async () => "ok"));
    s.setContext("name", "Sam");
    s.setContext("name", "Alex");
    expect(s.getContext("name")).toBe("Alex");
    expect(s.getContext("missing")).toBeUndefined();
  });

  it("summarizes with and without a system turn", async () => {
    const responder = new FakeResponder(async () => "ok");
    const withSystem = session(responder);
    await withSystem.process("a");
    await withSystem.process("b");
    expect(withSystem.summary()).toEqual({
      totalExchanges: 2,
      historyLength: 5,
      aiName: "Haro",
      modelLabel: "fake-model",
      mode: "remote",
    });

    const local = session(new LocalResponder({ aiName: "Haro" }), 10, localSystemPrompt("Haro"));
    await local.process("hello");
    expect(local.summary()).toMatchObject({ totalExchanges: 1, historyLength: 3, modelLabel: "Local Knowledge Base", mode: "local" });
    expect(local.getHistory()[0]).toMatchObject({
      role: "system",
      content: "You are Haro, a helpful AI assistant running locally.",
    });

    const bare = session(new LocalResponder({ aiName: "Haro" }), 10, undefined);
    await bare.process("hello");
    expect(bare.summary()).toMatchObject({ totalExchanges: 1, historyLength: 2 });
  });

  it("analyzeIntent falls back to unknown and leaves history alone", async () => {
    const responder = new FakeResponder(async () => "ok");
    const s = session(responder);
    await expect(s.analyzeIntent("turn on the lights")).resolves.toEqual({
      intent: "unknown",
      confidence: 0,
      entities: [],
      requiresAction: false,
    });
    expect(responder.intentCalls).toBe(1);
    expect(contents(s)).toEqual(["S"]);
  });
});
