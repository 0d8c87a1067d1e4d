export * from "./logging.types";
