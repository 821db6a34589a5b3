export * from "./types";
export * from "./errors";

export * from "./store/SessionStore";
export * from "./store/MemorySessionStore";

export * from "./session/SessionSerializer";
