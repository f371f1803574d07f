export * from "./cookie-jar";
export * from "./session-store";
export * from "./http-client";
export * from "./cvcue-client";
