export * from "./base";
export * from "./managed-devices";
