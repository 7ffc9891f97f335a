import { describe, it, expect } from "vitest";
import { PersonaCatalog, pickFollowUp, renderIntro } from "../../src/conversation/persona.js";
import { exactMatch } from "../../src/policy/similarity.js";

const friendly = {
  name: "Friendly",
  systemPrompt: "Be kind.",
  intro: "Hi{name}!",
  consentRequest: "May I write first sometimes?",
  followUps: ["First ping", "Second ping"],
};

describe("PersonaCatalog", () => {
  const catalog = new PersonaCatalog(
    { friendly, terse: { ...friendly, name: "Terse", followUps: ["Hey"] } },
    "friendly",
  );

  it("resolves personas by id", () => {
    expect(catalog.resolve("terse").name).toBe("Terse");
    expect(catalog.resolve("terse").id).toBe("terse");
  });

  it("falls back to the default for unknown ids", () => {
    expect(catalog.resolve("retired").id).toBe("friendly");
  });

  it("lists every persona", () => {
    expect(catalog.list().map((p) => p.id)).toEqual(["friendly", "terse"]);
  });

  it("requires the default persona", () => {
    expect(() => new PersonaCatalog({ friendly }, "missing")).toThrow(
      "Default persona not configured: missing",
    );
  });
});

describe("renderIntro", () => {
  const persona = { id: "friendly", ...friendly };

  it("greets by name and asks for consent", () => {
    expect(renderIntro(persona, "Alice")).toBe("Hi, Alice!\n\nMay I write first sometimes?");
  });

  it("drops the name placeholder when the name is unknown", () => {
    expect(renderIntro(persona, null)).toBe("Hi!\n\nMay I write first sometimes?");
  });
});

describe("pickFollowUp", () => {
  const persona = { id: "friendly", ...friendly };

  it("takes the first template not sent recently", () => {
    expect(pickFollowUp(persona, [], exactMatch)).toBe("First ping");
    expect(pickFollowUp(persona, ["First ping"], exactMatch)).toBe("Second ping");
  });

  it("falls back to the first template when all were used", () => {
    expect(pickFollowUp(persona, ["First ping", "Second ping"], exactMatch)).toBe("First ping");
  });
});
