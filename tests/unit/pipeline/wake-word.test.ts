import { WakeWordFilter } from "../../../src/pipeline/wake-word";

describe("WakeWordFilter", () => {
  const filter = new WakeWordFilter(["haro", "Hey Haro", "ai"]);

  it("orders phrases longest first", () => {
    expect(filter.wakeWords).toEqual(["hey haro", "haro", "ai"]);
  });

  it("detects a wake phrase anywhere, case-insensitively", () => {
    expect(filter.detect("Hey Haro, what time is it?")).toBe(true);
    expect(filter.detect("what time is it, HARO")).toBe(true);
    expect(filter.detect("what time is it")).toBe(false);
  });

  it("detects by substring", () => {
    expect(filter.detect("I said hello")).toBe(true);
  });

  it.each([
    ["Hey Haro, what time is it?", "what time is it?"],
    ["What time is it, Haro?", "What time is it?"],
    ["HEY HARO what's up", "what's up"],
    ["AI, what is 5 plus 3", "what is 5 plus 3"],
    ["haro haro tell me a joke", "tell me a joke"],
    ["I said hello, Haro", "I said hello"],
  ])("strips %j to %j", (utterance, cleaned) => {
    expect(filter.strip(utterance)).toBe(cleaned);
  });

  it("strips a bare activation to nothing", () => {
    expect(filter.strip("Haro")).toBe("");
    expect(filter.strip("hey haro!")).toBe("");
    expect(filter.strip("  Hey Haro.  ")).toBe("");
  });

  it("requires at least one phrase", () => {
    expect(() => new WakeWordFilter([" ", ""])).toThrow(RangeError);
  });
});
