export type * from "./store.js";
export type * from "./types/api.js";
export type * from "./types/document.js";
export type * from "./types/graph.js";
export type * from "./types/metadata.js";
export type * from "./types/partition.js";
