import { Inject, Injectable } from "@nestjs/common";
import { BaseService } from "@/common/base/base.service";
import { OWNER_CAPABILITY } from "../oracle.constants";
import { type OwnerCapability, requireOwner } from "./owner-capability";
import type { RegisteredSource, SourceId } from "../types";

/**
 * Authorization flag per source identity.
 *
 * Insertion order of the underlying map is the source-registration order the
 * aggregator folds quotes in: a source keeps its position across
 * deauthorize / authorize cycles.
 */
@Injectable()
export class AuthorizationRegistry extends BaseService {
  private readonly flags = new Map<SourceId, boolean>();

  constructor(@Inject(OWNER_CAPABILITY) private readonly ownerCapability: OwnerCapability) {
    super();
  }

  /**
   * Owner-only, idempotent. Returns whether the flag actually changed.
   */
  authorize(caller: SourceId, source: SourceId): boolean {
    requireOwner(this.ownerCapability, caller, "authorize sources");
    return this.setFlag(source, true);
  }

  /**
   * Owner-only, idempotent. Returns whether the flag actually changed.
   */
  deauthorize(caller: SourceId, source: SourceId): boolean {
    requireOwner(this.ownerCapability, caller, "deauthorize sources");
    return this.setFlag(source, false);
  }

  isAuthorized(source: SourceId): boolean {
    return this.flags.get(source) === true;
  }

  registeredSources(): SourceId[] {
    return [...this.flags.keys()];
  }

  listSources(): RegisteredSource[] {
    return [...this.flags].map(([source, authorized]) => ({ source, authorized }));
  }

  restore(sources: readonly RegisteredSource[]): void {
    this.flags.clear();
    for (const { source, authorized } of sources) {
      this.flags.set(source, authorized);
    }
  }

  private setFlag(source: SourceId, authorized: boolean): boolean {
    if (this.flags.get(source) === authorized) {
      return false;
    }
    // Unregistered sources are already unauthorized
    if (!authorized && !this.flags.has(source)) {
      return false;
    }
    this.flags.set(source, authorized);
    this.logDebug(`${authorized ? "Authorized" : "Deauthorized"} source ${source}`);
    return true;
  }
}
