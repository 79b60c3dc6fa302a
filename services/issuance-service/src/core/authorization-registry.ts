import {
  fail,
  isNullIdentity,
  ok,
  parseIdentity,
  type AdminAddedEvent,
  type AdminRemovedEvent,
  type Identity,
  type OwnershipTransferredEvent,
  type RecordedEvent,
  type Result,
} from "@holderpass/shared";
import type { IssuanceStore } from "../storage/issuance-store.js";

export type Clock = () => string;

/**
 * Owner plus admin set. The owner is never stored as an admin, and ownership
 * transfer leaves the admin set untouched in both directions. Identities are
 * checksummed on the way in, so casing never splits one account in two.
 */
export class AuthorizationRegistry {
  constructor(
    private readonly store: IssuanceStore,
    private readonly now: Clock,
  ) {}

  owner(): Identity {
    const owner = this.store.getSetting("owner");
    if (!owner) {
      throw new Error("authorization registry has no owner; store was not initialized");
    }
    return owner;
  }

  adminCount(): number {
    return Number(this.store.getSetting("admin_count") ?? "0");
  }

  listAdmins(): Identity[] {
    return this.store.listAdmins();
  }

  isOwner(identity: string): boolean {
    return parseIdentity(identity) === this.owner();
  }

  isAdmin(identity: string): boolean {
    const admin = parseIdentity(identity);
    return admin !== null && this.store.isAdmin(admin);
  }

  isAuthorized(identity: string): boolean {
    return this.isOwner(identity) || this.isAdmin(identity);
  }

  requireOwner(caller: string): Result<void> {
    if (!this.isOwner(caller)) {
      return fail("Unauthorized", `${caller} is not the owner`);
    }
    return ok(undefined);
  }

  requireAuthorized(caller: string): Result<void> {
    if (!this.isAuthorized(caller)) {
      return fail("Unauthorized", `${caller} is neither owner nor admin`);
    }
    return ok(undefined);
  }

  addAdmin(caller: string, rawAdmin: string): Result<RecordedEvent> {
    const gate = this.requireOwner(caller);
    if (!gate.ok) return gate;
    const admin = parseIdentity(rawAdmin);
    if (!admin) {
      return fail("InvalidAddress", `'${rawAdmin}' is not an account address`);
    }
    if (isNullIdentity(admin)) {
      return fail("InvalidAddress", "admin cannot be the null address");
    }
    if (admin === this.owner()) {
      return fail("OwnerAlreadyAdmin", "the owner already holds every admin privilege");
    }
    if (this.store.isAdmin(admin)) {
      return fail("AlreadyAdmin", `${admin} is already an admin`);
    }

    return this.store.transaction(() => {
      const occurredAt = this.now();
      this.store.insertAdmin(admin, occurredAt);
      this.store.setSetting("admin_count", String(this.adminCount() + 1));
      const event: AdminAddedEvent = { type: "ADMIN_ADDED", occurredAt, admin };
      return ok(this.store.appendEvent(event));
    });
  }

  removeAdmin(caller: string, rawAdmin: string): Result<RecordedEvent> {
    const gate = this.requireOwner(caller);
    if (!gate.ok) return gate;
    const admin = parseIdentity(rawAdmin);
    if (!admin || !this.store.isAdmin(admin)) {
      return fail("NotAdmin", `${rawAdmin} is not an admin`);
    }

    return this.store.transaction(() => {
      const occurredAt = this.now();
      this.store.deleteAdmin(admin);
      this.store.setSetting("admin_count", String(this.adminCount() - 1));
      const event: AdminRemovedEvent = { type: "ADMIN_REMOVED", occurredAt, admin };
      return ok(this.store.appendEvent(event));
    });
  }

  transferOwnership(caller: string, rawNewOwner: string): Result<RecordedEvent> {
    const gate = this.requireOwner(caller);
    if (!gate.ok) return gate;
    const newOwner = parseIdentity(rawNewOwner);
    if (!newOwner) {
      return fail("InvalidAddress", `'${rawNewOwner}' is not an account address`);
    }
    if (isNullIdentity(newOwner)) {
      return fail("InvalidAddress", "new owner cannot be the null address");
    }

    return this.store.transaction(() => {
      const previousOwner = this.owner();
      this.store.setSetting("owner", newOwner);
      const event: OwnershipTransferredEvent = {
        type: "OWNERSHIP_TRANSFERRED",
        occurredAt: this.now(),
        previousOwner,
        newOwner,
      };
      return ok(this.store.appendEvent(event));
    });
  }
}
