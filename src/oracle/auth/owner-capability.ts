import { OracleError } from "../errors/oracle.errors";
import type { SourceId } from "../types";

/**
 * Capability check for owner-gated operations. Call sites depend only on
 * this interface so a multi-signer or role-based owner can replace it.
 */
export interface OwnerCapability {
  isOwner(caller: SourceId): boolean;
  currentOwner(): SourceId;
  transferTo(newOwner: SourceId): void;
}

export class SingleOwnerCapability implements OwnerCapability {
  constructor(private owner: SourceId) {}

  isOwner(caller: SourceId): boolean {
    return caller === this.owner;
  }

  currentOwner(): SourceId {
    return this.owner;
  }

  transferTo(newOwner: SourceId): void {
    this.owner = newOwner;
  }
}

export function requireOwner(capability: OwnerCapability, caller: SourceId, action: string): void {
  if (!capability.isOwner(caller)) {
    throw OracleError.notAuthorized(caller, action);
  }
}
