import { describe, expect, it } from "vitest";
import { RenderTimeoutError } from "../errors.js";
import { PNG_BYTES, ScriptedRenderer } from "../test/fakes.js";
import { renderWithTimeout } from "./renderer.js";

const REQ = { url: "https://example.com", width: 1200, height: 630 };

describe("renderWithTimeout", () => {
  it("returns the rendered bytes", async () => {
    const renderer = new ScriptedRenderer();
    await expect(renderWithTimeout(renderer, REQ, 1_000)).resolves.toBe(PNG_BYTES);
    expect(renderer.calls).toEqual([REQ]);
  });

  it("passes render errors through", async () => {
    const renderer = new ScriptedRenderer();
    renderer.behavior = "throw";
    await expect(renderWithTimeout(renderer, REQ, 1_000)).rejects.toThrow("net::ERR_NAME_NOT_RESOLVED");
  });

  it("times out with a 'timeout' error and aborts the render", async () => {
    const renderer = new ScriptedRenderer();
    renderer.behavior = "hang";

    const err = await renderWithTimeout(renderer, REQ, 20).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RenderTimeoutError);
    expect(err).toMatchObject({ message: "timeout", timeoutMs: 20 });
    // the abort signal let the hanging render unwind
    await new Promise((r) => setTimeout(r, 0));
    expect(renderer.active).toBe(0);
  });
});
