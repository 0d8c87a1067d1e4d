export * from "./base.types";
