import { describe, it, expect, vi } from "vitest";
import type { Logger } from "../shared/logger.js";
import { openQuietly } from "./opener.js";

const spyLogger = (): Logger => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() });

describe("openQuietly", () => {
  it("opens the file", async () => {
    const logger = spyLogger();
    const opener = { open: vi.fn(async () => {}) };

    await openQuietly(opener, "/out/a.pdf", logger);

    expect(opener.open).toHaveBeenCalledWith("/out/a.pdf");
    expect(logger.debug).not.toHaveBeenCalled();
  });

  it("logs and swallows a failure", async () => {
    const logger = spyLogger();
    const opener = { open: vi.fn(async () => Promise.reject(new Error("xdg-open not found"))) };

    await expect(openQuietly(opener, "/out/a.pdf", logger)).resolves.toBeUndefined();
    expect(logger.debug).toHaveBeenCalledWith("Could not open /out/a.pdf: xdg-open not found");
  });
});
