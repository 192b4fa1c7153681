import { readModelEventsFlag } from "@/lib/agingConfig";

export type ModelEventName = "scenario_evaluated" | "scenario_rejected" | "model_domain_warning";

export type ModelEventV1 = {
  schema: "battery_aging.model.v1";
  ts: string;
  name: ModelEventName;
  payload: Record<string, unknown>;
};

export type ModelEventSink = (event: ModelEventV1) => void;

const consoleSink: ModelEventSink = (event) => {
  // One line per event so runs can be grepped.
  console.info("[model][battery_aging]", JSON.stringify(event));
};

let sink: ModelEventSink | null = readModelEventsFlag() ? consoleSink : null;

/** Route events elsewhere (or to the console with `"console"`); `null` turns them off. */
export function setModelEventSink(next: ModelEventSink | "console" | null): void {
  sink = next === "console" ? consoleSink : next;
}

export function emitModelEvent(name: ModelEventName, payload: Record<string, unknown>): void {
  if (!sink) return;
  sink({
    schema: "battery_aging.model.v1",
    ts: new Date().toISOString(),
    name,
    payload,
  });
}
