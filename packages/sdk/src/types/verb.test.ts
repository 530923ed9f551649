import { describe, it, expect } from "vitest";
import { VerbFlag, hasVerbFlag, type Verb } from "./verb.js";

const handler = () => 0;

describe("hasVerbFlag", () => {
  it("should report flags present in the set", () => {
    const verb: Verb<void> = {
      name: "start",
      minArgs: 1,
      maxArgs: 1,
      flags: [VerbFlag.OnlineOnly, VerbFlag.MustBeRoot],
      handler,
    };
    expect(hasVerbFlag(verb, VerbFlag.OnlineOnly)).toBe(true);
    expect(hasVerbFlag(verb, VerbFlag.MustBeRoot)).toBe(true);
    expect(hasVerbFlag(verb, VerbFlag.Default)).toBe(false);
  });

  it("should treat missing flags as empty", () => {
    const verb: Verb<void> = { name: "list", minArgs: 1, maxArgs: 1, handler };
    expect(hasVerbFlag(verb, VerbFlag.Default)).toBe(false);
  });
});
