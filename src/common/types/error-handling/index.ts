export * from "./api-error.types";
