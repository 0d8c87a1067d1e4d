export * from "./oracle.types";
export * from "./oracle-events.types";
export * from "./oracle-state.types";
