export type { Clock } from "./clock.js";
export type { PromptService } from "./prompt.js";
export type { SignalHandler } from "./signal-handler.js";
export type { FetchLike } from "./http.js";
