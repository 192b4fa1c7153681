import { afterEach, describe, expect, it, vi } from "vitest";
import { emitModelEvent, setModelEventSink } from "@/lib/modelEvents";

afterEach(() => {
  setModelEventSink(null);
  vi.restoreAllMocks();
});

describe("emitModelEvent", () => {
  it("does nothing without a sink", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    emitModelEvent("scenario_evaluated", { points: 1 });
    expect(info).not.toHaveBeenCalled();
  });

  it("writes one tagged JSON line to the console sink", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    setModelEventSink("console");
    emitModelEvent("scenario_rejected", { field: "tempStepC" });

    expect(info).toHaveBeenCalledTimes(1);
    const [tag, line] = info.mock.calls[0] ?? [];
    expect(tag).toBe("[model][battery_aging]");
    const event: unknown = JSON.parse(String(line));
    expect(event).toMatchObject({
      schema: "battery_aging.model.v1",
      name: "scenario_rejected",
      payload: { field: "tempStepC" },
    });
  });

  it("hands events to a custom sink", () => {
    const sink = vi.fn();
    setModelEventSink(sink);
    emitModelEvent("model_domain_warning", { temperatureC: 60 });
    expect(sink).toHaveBeenCalledTimes(1);
    expect(sink.mock.calls[0]?.[0]).toMatchObject({ name: "model_domain_warning", payload: { temperatureC: 60 } });
  });
});
