// Core base classes
export * from "./base.service";
export * from "./base.controller";

// Capability mixins (compose these as needed)
export * from "./mixins/configurable.mixin";
export * from "./mixins/events.mixin";
export * from "./mixins/logging.mixin";

// Composed service classes
export * from "./composed.service";
