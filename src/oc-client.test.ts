import { describe, expect, it, vi } from "vitest";
import { createOpenCodeCompleter, extractText, parseModel, type OpenCodeSessions } from "./oc-client";

function fakeSessions(reply: unknown): OpenCodeSessions & { removed: string[] } {
  const removed: string[] = [];
  return {
    removed,
    create: vi.fn(async () => ({ data: { id: "session-1" } })),
    prompt: vi.fn(async () => reply),
    remove: vi.fn(async (id: string) => {
      removed.push(id);
    })
  };
}

describe("createOpenCodeCompleter", () => {
  it("prompts a fresh session and deletes it afterwards", async () => {
    const sessions = fakeSessions({ data: { parts: [{ type: "text", text: "A summary." }] } });
    const connect = vi.fn(async () => ({ sessions }));
    const completer = createOpenCodeCompleter({ model: "anthropic/claude-sonnet", connect });

    await expect(completer.complete("Summarize this")).resolves.toBe("A summary.");
    expect(sessions.prompt).toHaveBeenCalledWith(
      "session-1",
      { providerID: "anthropic", modelID: "claude-sonnet" },
      "Summarize this"
    );
    expect(sessions.removed).toEqual(["session-1"]);
  });

  it("connects once across requests", async () => {
    const sessions = fakeSessions({ data: { parts: [{ text: "ok" }] } });
    const connect = vi.fn(async () => ({ sessions }));
    const completer = createOpenCodeCompleter({ model: "gpt-4o-mini", connect });

    await completer.complete("one");
    await completer.complete("two");

    expect(connect).toHaveBeenCalledTimes(1);
    expect(connect).toHaveBeenCalledWith("gpt-4o-mini");
  });

  it("retries the connection after a failure", async () => {
    const sessions = fakeSessions({ data: { parts: [{ text: "ok" }] } });
    const connect = vi
      .fn<(model: string) => Promise<{ sessions: OpenCodeSessions }>>()
      .mockRejectedValueOnce(new Error("server not running"))
      .mockResolvedValue({ sessions });
    const completer = createOpenCodeCompleter({ model: "openai/gpt-4o-mini", connect });

    await expect(completer.complete("first")).rejects.toThrow("server not running");
    await expect(completer.complete("second")).resolves.toBe("ok");
  });

  it("rejects an empty reply but still deletes the session", async () => {
    const sessions = fakeSessions({ data: { parts: [] } });
    const completer = createOpenCodeCompleter({ model: "openai/gpt-4o-mini", connect: async () => ({ sessions }) });

    await expect(completer.complete("prompt")).rejects.toThrow("OpenCode response did not contain text output");
    expect(sessions.removed).toEqual(["session-1"]);
  });

  it("runs the connection cleanup on close", async () => {
    const cleanup = vi.fn(async () => {});
    const sessions = fakeSessions({ data: { parts: [{ text: "ok" }] } });
    const completer = createOpenCodeCompleter({
      model: "openai/gpt-4o-mini",
      connect: async () => ({ sessions, cleanup })
    });

    await completer.complete("prompt");
    await completer.close();
    await completer.close();

    expect(cleanup).toHaveBeenCalledTimes(1);
  });
});

describe("extractText", () => {
  it("joins text parts", () => {
    expect(extractText({ data: { parts: [{ text: "First." }, { type: "step-start" }, { content: "Second." }] } })).toBe(
      "First.\nSecond."
    );
  });

  it("reads parts nested under info", () => {
    expect(extractText({ data: { info: { parts: [{ text: "Nested." }] } } })).toBe("Nested.");
  });

  it("returns an empty string for unexpected shapes", () => {
    expect(extractText(null)).toBe("");
    expect(extractText({ error: "boom" })).toBe("");
  });
});

describe("parseModel", () => {
  it("splits provider and model", () => {
    expect(parseModel("github-copilot/gpt-4.1")).toEqual({ providerID: "github-copilot", modelID: "gpt-4.1" });
    expect(parseModel("gpt-4o-mini")).toEqual({ providerID: "openai", modelID: "gpt-4o-mini" });
  });
});
