export type * from "./types/api.js";
export type * from "./types/chat.js";
export type * from "./types/document.js";
export type * from "./store.js";
