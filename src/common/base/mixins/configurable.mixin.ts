import type { AbstractConstructor } from "../../types/services/base.types";
import type { LoggingCapabilities } from "./logging.mixin";

/**
 * Configuration management capabilities
 */
export interface ConfigurableCapabilities<TConfig extends object> {
  updateConfig(newConfig: Partial<TConfig>): void;
  getConfig(): Readonly<TConfig>;
  validateConfig(config: Readonly<TConfig>): void;
}

/**
 * Mixin that adds validated, roll-back-on-failure configuration to a service.
 * Must be applied on top of a class that already has logging.
 */
export function WithConfiguration<TConfig extends object>(defaultConfig: TConfig) {
  return function <TBase extends AbstractConstructor<LoggingCapabilities>>(
    Base: TBase
  ) {
    abstract class ConfigurableMixin extends Base implements ConfigurableCapabilities<TConfig> {
      public config: TConfig;

      // eslint-disable-next-line @typescript-eslint/no-explicit-any
      constructor(...args: any[]) {
        super(...args);
        this.config = { ...defaultConfig };
      }

      updateConfig(newConfig: Partial<TConfig>): void {
        const oldConfig = { ...this.config };
        const candidate = { ...this.config, ...newConfig };

        try {
          this.validateConfig(candidate);
        } catch (error) {
          this.logWarning(
            `Configuration update rejected: ${error instanceof Error ? error.message : String(error)}`,
            "updateConfig"
          );
          throw error;
        }

        this.config = candidate;
        const changes = this.getConfigChanges(oldConfig, candidate);
        if (Object.keys(changes).length > 0) {
          this.logDebug("Configuration updated", "updateConfig", changes);
        }
      }

      getConfig(): Readonly<TConfig> {
        return { ...this.config };
      }

      validateConfig(_config: Readonly<TConfig>): void {
        // Override in subclasses for specific validation
      }

      public getConfigChanges(oldConfig: TConfig, newConfig: TConfig): Record<string, { old: unknown; new: unknown }> {
        const changes: Record<string, { old: unknown; new: unknown }> = {};

        for (const key in newConfig) {
          if (oldConfig[key] !== newConfig[key]) {
            changes[key] = { old: oldConfig[key], new: newConfig[key] };
          }
        }

        return changes;
      }
    }
    return ConfigurableMixin;
  };
}
