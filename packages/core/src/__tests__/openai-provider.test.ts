import { beforeEach, describe, it, expect, vi } from "vitest";
import { ResearchError } from "../errors";
import { OpenAIProvider } from "../services/llm/openai-provider";
import { formatPromptDate, renderPrompt } from "../services/llm/prompts";

const { create } = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock("openai", () => ({
  default: class {
    chat = { completions: { create } };
  },
}));

function completion(content: string | null) {
  return { choices: [{ message: { content } }] };
}

describe("OpenAIProvider", () => {
  beforeEach(() => {
    create.mockReset();
  });

  it("parses JSON answers", async () => {
    create.mockResolvedValue(completion('{"brief":"Acme brief"}'));
    const provider = new OpenAIProvider("test-secret");

    const answer = await provider.query([{ role: "user", content: "plan" }], {
      temperature: 0.3,
    });

    expect(answer).toEqual({ brief: "Acme brief" });
    expect(create).toHaveBeenCalledWith(
      {
        model: "gpt-4o-mini",
        temperature: 0.3,
        messages: [{ role: "user", content: "plan" }],
        response_format: { type: "json_object" },
      },
      { signal: undefined }
    );
  });

  it("rejects invalid JSON", async () => {
    create.mockResolvedValue(completion("not json"));

    await expect(
      new OpenAIProvider("test-secret").query([{ role: "user", content: "plan" }])
    ).rejects.toThrow(ResearchError);
  });

  it("returns plain text completions", async () => {
    create.mockResolvedValue(completion("# Report"));
    const provider = new OpenAIProvider("test-secret", "gpt-4o");

    const text = await provider.complete([{ role: "system", content: "write" }]);

    expect(text).toBe("# Report");
    expect(create.mock.calls[0][0]).toEqual({
      model: "gpt-4o",
      temperature: 0.7,
      messages: [{ role: "system", content: "write" }],
    });
  });

  it("rejects an empty completion", async () => {
    create.mockResolvedValue(completion(null));

    await expect(
      new OpenAIProvider("test-secret").complete([{ role: "user", content: "x" }])
    ).rejects.toThrow("No content in OpenAI response");
  });
});

describe("prompts", () => {
  it("replaces every placeholder occurrence", () => {
    expect(renderPrompt("{{a}} and {{a}} then {{b}}", { a: "x", b: 2 })).toBe("x and x then 2");
  });

  it("formats dates in long US form", () => {
    expect(formatPromptDate(new Date(2024, 0, 15))).toBe("Monday, January 15, 2024");
  });
});
