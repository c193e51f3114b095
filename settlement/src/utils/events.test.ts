import { describe, it, expect, vi } from "vitest";
import { EngineEvents } from "./events.js";
import { createLogger } from "./logger.js";

const payload = {
  bidder: "0x1111111111111111111111111111111111111111",
  newSigner: "0x2222222222222222222222222222222222222222",
};

describe("EngineEvents", () => {
  it("delivers the payload to every listener", () => {
    const events = new EngineEvents(createLogger("silent"));
    const first = vi.fn();
    const second = vi.fn();
    events.on("DelegationChanged", first);
    events.on("DelegationChanged", second);

    events.emit("DelegationChanged", payload);

    expect(first).toHaveBeenCalledWith(payload);
    expect(second).toHaveBeenCalledWith(payload);
  });

  it("logs a throwing listener and keeps notifying the rest", () => {
    const logger = createLogger("silent");
    const error = vi.spyOn(logger, "error");
    const events = new EngineEvents(logger);
    const later = vi.fn();
    events.on("DelegationChanged", () => {
      throw new Error("listener failed");
    });
    events.on("DelegationChanged", later);

    expect(() => events.emit("DelegationChanged", payload)).not.toThrow();
    expect(later).toHaveBeenCalledWith(payload);
    expect(error).toHaveBeenCalledWith(
      { event: "DelegationChanged", error: "listener failed" },
      "Event listener failed"
    );
  });

  it("stops delivering after unsubscribe", () => {
    const events = new EngineEvents(createLogger("silent"));
    const listener = vi.fn();
    const off = events.on("DelegationChanged", listener);

    off();
    events.emit("DelegationChanged", payload);

    expect(listener).not.toHaveBeenCalled();
  });
});
