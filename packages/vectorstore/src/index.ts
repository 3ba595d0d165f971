export * from "./vectorIndex.js";
export * from "./indexHandle.js";
export * from "./indexStore.js";
export * from "./sqliteSidecar.js";
