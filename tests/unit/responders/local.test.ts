import {
  CATEGORY_ORDER,
  LocalResponder,
  formatClockTime,
  formatLongDate,
  formatShortDate,
} from "../../../src/responders/local";
import knowledge from "../../../src/responders/knowledge.json";

// Monday, 4 March 2024, 14:05 local time.
const fixedNow = (): Date => new Date(2024, 2, 4, 14, 5);

function responder(random: () => number = () => 0): LocalResponder {
  return new LocalResponder({ aiName: "Haro", random, now: fixedNow });
}

describe("clock formatting", () => {
  it("formats 12-hour time with AM/PM", () => {
    expect(formatClockTime(new Date(2024, 2, 4, 14, 5))).toBe("2:05 PM");
    expect(formatClockTime(new Date(2024, 2, 4, 0, 30))).toBe("12:30 AM");
    expect(formatClockTime(new Date(2024, 2, 4, 12, 0))).toBe("12:00 PM");
  });

  it("formats long and short dates", () => {
    expect(formatLongDate(fixedNow())).toBe("Monday, March 04, 2024");
    expect(formatShortDate(fixedNow())).toBe("03/04/2024");
  });
});

describe("LocalResponder.categorize", () => {
  const r = responder();

  it.each([
    ["Hello there", "greeting"],
    ["ok bye now", "goodbye"],
    ["thanks a lot", "thanks"],
    ["what time is it", "time"],
    ["what day is it today", "date"],
    ["is it going to rain", "weather"],
    ["what is 15 plus 7", "math"],
    ["what is 7 divided by 0", "math"],
    ["what is 10 x 3", "math"],
    ["what is 10 over 2", "math"],
    ["the game is over", "unknown"],
    ["can you walk", "robot"],
    ["what can you do", "capabilities"],
    ["who are you", "identity"],
    ["tell me about volcanoes", "unknown"],
  ])("%s -> %s", (utterance, category) => {
    expect(r.categorize(utterance)).toBe(category);
  });

  it("matches alphabetic keywords as whole words only", () => {
    // "this" contains "hi" but is not a greeting.
    expect(r.categorize("this is odd")).toBe("unknown");
  });

  it("tries categories in a fixed order", () => {
    expect(CATEGORY_ORDER[0]).toBe("greeting");
    // Greeting wins over time when both match.
    expect(r.categorize("hi, what time is it")).toBe("greeting");
  });
});

describe("LocalResponder.respond", () => {
  it("picks from the category pool with the injected random source", () => {
    expect(responder(() => 0).respond("hello")).toBe(knowledge.pools.greeting[0]);
    expect(responder(() => 0.99).respond("hello")).toBe(knowledge.pools.greeting[3]);
    expect(responder(() => 0.5).respond("thank you")).toBe("My pleasure!");
  });

  it("personalizes greetings and goodbyes with a known name", () => {
    const context = new Map([["name", "Sam"]]);
    expect(responder().respond("hello", context)).toBe("Hello, Sam! Great to see you again!");
    expect(responder().respond("goodbye", context)).toBe("Goodbye, Sam! It was great talking with you!");
  });

  it("renders time and date from the clock", () => {
    expect(responder(() => 0).respond("what time is it")).toBe("The current time is 2:05 PM");
    expect(responder(() => 0).respond("what is the date")).toBe("Today is Monday, March 04, 2024");
    expect(responder(() => 0.9).respond("what is the date")).toBe("The date is 03/04/2024");
  });

  it("answers arithmetic", () => {
    expect(responder().respond("what is 15 plus 7")).toBe("The answer is 22");
    expect(responder().respond("calculate (2 + 3) * 4")).toBe("The answer is 20");
    expect(responder().respond("10 divided by 4")).toBe("The answer is 2.5");
    expect(responder().respond("what is 10 x 3")).toBe("The answer is 30");
    expect(responder().respond("what is 10 over 2")).toBe("The answer is 5");
  });

  it("replies with the help string when math cannot be evaluated", () => {
    expect(responder().respond("what is 7 divided by 0")).toBe(knowledge.math.help);
    expect(responder().respond("help me with math")).toBe(knowledge.math.help);
  });

  it("introduces itself with its name and purpose", () => {
    expect(responder().respond("who are you")).toBe(
      "I'm Haro, I'm your personal AI assistant designed to help with daily tasks. " +
        "I can help you with many things like answering questions, basic calculations, and friendly conversation!"
    );
  });

  it("falls back to the unknown pool", () => {
    expect(responder(() => 0).respond("tell me about volcanoes")).toBe(knowledge.pools.unknown[0]);
  });
});

describe("LocalResponder knowledge", () => {
  it("answers unknown utterances from added knowledge", () => {
    const r = responder();
    r.addKnowledge("Volcanoes", "Volcanoes are openings in the planet's crust.");
    expect(r.respond("tell me about volcanoes")).toBe("Volcanoes are openings in the planet's crust.");
  });

  it("looks up custom entries, then pools, then facts", () => {
    const r = responder();
    r.addKnowledge("pets", "You have a cat.");
    expect(r.getKnowledge("pets")).toBe("You have a cat.");
    expect(r.getKnowledge("time")).toBe("The current time is 2:05 PM");
    expect(r.getKnowledge("raspberry_pi")).toBe(knowledge.facts.raspberry_pi);
    expect(r.getKnowledge("nothing")).toBeUndefined();
  });

  it("ignores blank topics", () => {
    const r = responder();
    r.addKnowledge("  ", "x");
    expect(r.getKnowledge("")).toBeUndefined();
  });
});

describe("LocalResponder as a responder", () => {
  it("generates from the utterance and classifies intent heuristically", async () => {
    const r = responder();
    await expect(
      r.generate({ utterance: "what is 2 times 3", history: [], context: new Map() })
    ).resolves.toBe("The answer is 6");
    await expect(r.analyzeIntent("what is 2 * 3")).resolves.toEqual({
      intent: "calculation",
      confidence: 0.7,
      entities: ["2", "3"],
      requiresAction: true,
    });
    expect(r.mode).toBe("local");
    expect(r.label).toBe("Local Knowledge Base");
  });
});
