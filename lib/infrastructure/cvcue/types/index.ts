export * from "./api-responses";
