export * from "./lib/modelResult";
export * from "./lib/axes";
export * from "./lib/capacityDecay";
export * from "./lib/selfDischarge";
export * from "./lib/arrhenius";
export * from "./lib/interpolate";
export * from "./lib/inrush";
export * from "./lib/batteryPresets";
export * from "./lib/agingConfig";
export * from "./lib/modelEvents";
export * from "./lib/agingScenario";
export * from "./lib/chartTokens";
export * from "./lib/chartFactories";
export * from "./lib/format";
export * from "./lib/agingSummary";
export type * from "./types/batteryAging";
