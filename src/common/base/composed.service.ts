import { BaseService } from "./base.service";
import { WithEvents } from "./mixins/events.mixin";

/**
 * Pre-composed service classes for common use cases
 * These are concrete classes that can be extended directly
 */

// Service with events
export abstract class EventService extends WithEvents(BaseService) {}
