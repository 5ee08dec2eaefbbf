export { systemClock } from "./system-clock.js";
export { interactivePrompts } from "./interactive-prompts.js";
export { createProcessSignalHandler } from "./process-signals.js";
export { globalFetch } from "./global-fetch.js";
