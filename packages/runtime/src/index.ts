export * from "./model-adapter.js";
export * from "./completion.js";
export * from "./openai-adapter.js";
export * from "./prompt-builder.js";
export * from "./tool-registry.js";
export * from "./agent-session.js";
export * from "./session-registry.js";
