import { RemoteResponder } from "../../../src/responders/remote";
import { TimeoutError } from "../../../src/pipeline/timeouts";
import type { Turn } from "../../../src/memory/types";
import { HangingLLM, ScriptedLLM } from "../../helpers/fixtures";

const history: Turn[] = [
  { role: "system", content: "You are Haro.", timestamp: 0 },
  { role: "user", content: "hi", timestamp: 1 },
];

function request(context: Map<string, string> = new Map()) {
  return { utterance: "hi", history, context };
}

describe("RemoteResponder.generate", () => {
  it("sends the history with sampling options and trims the reply", async () => {
    const llm = new ScriptedLLM(["  Hello! How are you?  "]);
    const responder = new RemoteResponder(llm, { label: "gpt-4o" });
    await expect(responder.generate(request())).resolves.toBe("Hello! How are you?");
    expect(llm.calls[0].messages).toEqual([
      { role: "system", content: "You are Haro." },
      { role: "user", content: "hi" },
    ]);
    expect(llm.calls[0].options?.temperature).toBe(0.7);
    expect(llm.calls[0].options?.maxTokens).toBe(150);
    expect(llm.calls[0].options?.signal).toBeDefined();
  });

  it("adds known user context as a system note", async () => {
    const llm = new ScriptedLLM(["Hi Sam"]);
    const responder = new RemoteResponder(llm, { label: "gpt-4o", temperature: 0.2, maxTokens: 60 });
    await responder.generate(request(new Map([["name", "Sam"], ["city", "Oslo"]])));
    expect(llm.calls[0].messages[1]).toEqual({
      role: "system",
      content: "What you know about the user:\n- name: Sam\n- city: Oslo",
    });
    expect(llm.calls[0].options?.temperature).toBe(0.2);
    expect(llm.calls[0].options?.maxTokens).toBe(60);
  });

  it("rejects an empty completion", async () => {
    const responder = new RemoteResponder(new ScriptedLLM(["   "]), { label: "gpt-4o" });
    await expect(responder.generate(request())).rejects.toThrow("Completion returned no text");
  });

  it("propagates transport errors", async () => {
    const responder = new RemoteResponder(new ScriptedLLM([new Error("503 Service Unavailable")]), { label: "gpt-4o" });
    await expect(responder.generate(request())).rejects.toThrow("503 Service Unavailable");
  });

  it("times out and aborts the request", async () => {
    const llm = new HangingLLM();
    const responder = new RemoteResponder(llm, { label: "gpt-4o", timeoutMs: 20 });
    await expect(responder.generate(request())).rejects.toBeInstanceOf(TimeoutError);
    expect(llm.aborted).toBe(true);
  });
});

describe("RemoteResponder.analyzeIntent", () => {
  it("requests JSON and parses the result", async () => {
    const llm = new ScriptedLLM(['{"intent":"request","confidence":0.8,"entities":["lights"],"requires_action":true}']);
    const responder = new RemoteResponder(llm, { label: "gpt-4o" });
    await expect(responder.analyzeIntent("turn on the lights")).resolves.toEqual({
      intent: "request",
      confidence: 0.8,
      entities: ["lights"],
      requiresAction: true,
    });
    expect(llm.calls[0].options?.responseFormat).toBe("json");
    expect(llm.calls[0].options?.maxTokens).toBe(100);
    expect(llm.calls[0].messages[0].content).toContain('User input: "turn on the lights"');
  });

  it("falls back to the unknown intent on malformed output or failure", async () => {
    const responder = new RemoteResponder(new ScriptedLLM(["not json", new Error("down")]), { label: "gpt-4o" });
    const unknown = { intent: "unknown", confidence: 0, entities: [], requiresAction: false };
    await expect(responder.analyzeIntent("hmm")).resolves.toEqual(unknown);
    await expect(responder.analyzeIntent("hmm")).resolves.toEqual(unknown);
  });
});

describe("RemoteResponder.verify", () => {
  it("sends one tiny request", async () => {
    const llm = new ScriptedLLM(["Hi"]);
    await new RemoteResponder(llm, { label: "gpt-4o" }).verify();
    expect(llm.calls).toHaveLength(1);
    expect(llm.calls[0].messages).toEqual([{ role: "user", content: "Hello" }]);
    expect(llm.calls[0].options?.maxTokens).toBe(10);
  });

  it("rejects when the endpoint is unreachable", async () => {
    const responder = new RemoteResponder(new ScriptedLLM([new Error("ECONNREFUSED")]), { label: "gpt-4o" });
    await expect(responder.verify()).rejects.toThrow("ECONNREFUSED");
  });
});
