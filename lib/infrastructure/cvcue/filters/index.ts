export * from "./filter";
export * from "./filter-builder";
