/**
 * Listing lifecycle service.
 *
 * Purpose: sale form -> pending listing -> screenshots by DM -> published listing, plus edits,
 * cancellation and the expiry sweep.
 *
 * Invariants:
 * - At most one pending listing per owner; a new sale form replaces the previous one.
 * - A pending listing is consumed with an atomic take, so it is published at most once.
 * - The active-listing cap is checked when the sale form is submitted, not when images arrive.
 */
import type { ActiveListing, PendingListing } from "@/db/schemas/listing";
import type { ListingId, UserId } from "@/db/types";
import { bestEffort, type MarketDeps } from "@/modules/market/deps";
import type { PublishedListingRef } from "@/modules/market/presenter";
import {
  MarketError,
  resolveListingCategory,
  storeFailure,
} from "@/modules/market/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { parsePrice } from "./price";

export const MAX_ACCOUNT_TYPE_LENGTH = 100;
export const MAX_DESCRIPTION_LENGTH = 1000;

export interface ListingOwner {
  id: UserId;
  name: string;
}

export interface BeginListingInput {
  owner: ListingOwner;
  accountType: string;
  price: string;
  description: string;
}

export interface ListingEdit {
  accountType?: string;
  price?: string;
  description?: string;
}

export interface SweepReport {
  pending: number;
  active: number;
}

export interface ListingService {
  beginListing(input: BeginListingInput): Promise<Result<PendingListing, MarketError>>;
  submitImages(ownerId: UserId, images: string[]): Promise<Result<ActiveListing, MarketError>>;
  editListing(
    listingId: ListingId,
    requesterId: UserId,
    edit: ListingEdit,
  ): Promise<Result<ActiveListing, MarketError>>;
  cancelListing(listingId: ListingId, requesterId: UserId): Promise<Result<ActiveListing, MarketError>>;
  sweepExpired(now?: Date): Promise<Result<SweepReport, MarketError>>;
  getListing(listingId: ListingId): Promise<Result<ActiveListing | null, MarketError>>;
  listByOwner(ownerId: UserId): Promise<Result<ActiveListing[], MarketError>>;
}

const validation = (message: string) => new MarketError("VALIDATION", message);

function requireText(
  label: string,
  value: string,
  max: number,
): Result<string, MarketError> {
  const trimmed = value.trim();
  if (!trimmed) return ErrResult(validation(`${label} is required.`));
  if (trimmed.length > max) {
    return ErrResult(validation(`${label} must be at most ${max} characters.`));
  }
  return OkResult(trimmed);
}

export const publishedRef = (listing: ActiveListing): PublishedListingRef => ({
  channelId: listing.channelId,
  messageId: listing.messageId,
  extraMessageIds: listing.extraMessageIds,
});

class ListingServiceImpl implements ListingService {
  constructor(private readonly deps: MarketDeps) {}

  async beginListing(input: BeginListingInput): Promise<Result<PendingListing, MarketError>> {
    const { store, presenter, settings, logger } = this.deps;

    const accountType = requireText("Account type", input.accountType, MAX_ACCOUNT_TYPE_LENGTH);
    if (accountType.isErr()) return ErrResult(accountType.error);
    const price = parsePrice(input.price);
    if (price.isErr()) return ErrResult(price.error);
    const description = requireText("Description", input.description, MAX_DESCRIPTION_LENGTH);
    if (description.isErr()) return ErrResult(description.error);

    const countRes = await store.listings.countByOwner(input.owner.id);
    if (countRes.isErr()) return ErrResult(storeFailure("listings.countByOwner", countRes.error));
    if (countRes.unwrap() >= settings.maxActiveListings) {
      return ErrResult(
        new MarketError(
          "QUOTA_EXCEEDED",
          `You already have ${settings.maxActiveListings} active listings.`,
        ),
      );
    }

    const now = this.deps.now();
    const pending: PendingListing = {
      _id: input.owner.id,
      ownerName: input.owner.name,
      accountType: accountType.unwrap(),
      price: price.unwrap().raw,
      description: description.unwrap(),
      createdAt: now,
      expiresAt: new Date(now.getTime() + settings.pendingListingTtlMs),
    };

    const saved = await store.pendingListings.save(pending);
    if (saved.isErr()) return ErrResult(storeFailure("pendingListings.save", saved.error));

    try {
      await presenter.notifyUser(input.owner.id, {
        kind: "IMAGE_REQUEST",
        maxImages: settings.maxImages,
        expiresAt: pending.expiresAt,
      });
    } catch (error) {
      logger.debug("[listings] could not DM image request", { ownerId: input.owner.id, error });
      const removed = await store.pendingListings.remove(input.owner.id);
      if (removed.isErr()) {
        logger.warn("[listings] failed to drop undeliverable pending listing", {
          ownerId: input.owner.id,
          error: removed.error,
        });
      }
      return ErrResult(
        new MarketError("DIRECT_MESSAGES_CLOSED", "I can't DM you. Please enable DMs from server members."),
      );
    }

    return OkResult(pending);
  }

  async submitImages(ownerId: UserId, images: string[]): Promise<Result<ActiveListing, MarketError>> {
    const { store, presenter, settings, logger } = this.deps;

    const urls = images.map((url) => url.trim()).filter(Boolean);
    if (!urls.length) {
      return ErrResult(validation("Send at least one screenshot."));
    }
    if (urls.length > settings.maxImages) {
      return ErrResult(
        new MarketError("TOO_MANY_IMAGES", `Send at most ${settings.maxImages} screenshots.`),
      );
    }

    const taken = await store.pendingListings.take(ownerId);
    if (taken.isErr()) return ErrResult(storeFailure("pendingListings.take", taken.error));
    const pending = taken.unwrap();
    if (!pending) {
      return ErrResult(
        new MarketError(
          "NO_PENDING_LISTING",
          "You don't have an active listing. Start one with the market panel.",
        ),
      );
    }

    const now = this.deps.now();
    if (now.getTime() >= pending.expiresAt.getTime()) {
      return ErrResult(new MarketError("EXPIRED", "Your listing form expired. Please start again."));
    }

    const id = this.deps.generateId();
    const category = resolveListingCategory(pending.accountType);

    let ref: PublishedListingRef;
    try {
      ref = await presenter.publishListing({
        id,
        ownerId,
        ownerName: pending.ownerName,
        category,
        accountType: pending.accountType,
        price: pending.price,
        description: pending.description,
        images: urls,
      });
    } catch (error) {
      logger.error("[listings] failed to publish listing", { ownerId, listingId: id, error });
      const restored = await store.pendingListings.save(pending);
      if (restored.isErr()) {
        logger.error("[listings] failed to restore pending listing", {
          ownerId,
          error: restored.error,
        });
      }
      return ErrResult(
        new MarketError("EXTERNAL_FAILURE", "Could not post your listing. Please try again.", {
          cause: error,
        }),
      );
    }

    const listing: ActiveListing = {
      _id: id,
      ownerId,
      ownerName: pending.ownerName,
      accountType: pending.accountType,
      price: pending.price,
      description: pending.description,
      images: urls,
      channelId: ref.channelId,
      messageId: ref.messageId,
      extraMessageIds: ref.extraMessageIds,
      createdAt: now,
      updatedAt: now,
    };

    const inserted = await store.listings.insert(listing);
    if (inserted.isErr()) {
      await bestEffort(logger, "[listings] failed to retract orphaned listing", { listingId: id }, () =>
        presenter.retractListing(ref),
      );
      return ErrResult(storeFailure("listings.insert", inserted.error));
    }

    await bestEffort(logger, "[listings] could not confirm listing by DM", { ownerId, listingId: id }, () =>
      presenter.notifyUser(ownerId, {
        kind: "LISTING_PUBLISHED",
        listingId: id,
        channelId: ref.channelId,
        messageId: ref.messageId,
      }),
    );

    logger.info("[listings] listing published", { listingId: id, ownerId, category });
    return OkResult(listing);
  }

  private async ownedListing(
    listingId: ListingId,
    requesterId: UserId,
  ): Promise<Result<ActiveListing, MarketError>> {
    const found = await this.deps.store.listings.find(listingId);
    if (found.isErr()) return ErrResult(storeFailure("listings.find", found.error));
    const listing = found.unwrap();
    if (!listing) return ErrResult(new MarketError("NOT_FOUND", "This listing no longer exists."));
    if (listing.ownerId !== requesterId) {
      return ErrResult(new MarketError("FORBIDDEN", "Only the seller can manage this listing."));
    }
    return OkResult(listing);
  }

  async editListing(
    listingId: ListingId,
    requesterId: UserId,
    edit: ListingEdit,
  ): Promise<Result<ActiveListing, MarketError>> {
    const { store, presenter, logger } = this.deps;

    const owned = await this.ownedListing(listingId, requesterId);
    if (owned.isErr()) return owned;

    const patch: ListingEdit = {};
    if (edit.accountType !== undefined) {
      const value = requireText("Account type", edit.accountType, MAX_ACCOUNT_TYPE_LENGTH);
      if (value.isErr()) return ErrResult(value.error);
      patch.accountType = value.unwrap();
    }
    if (edit.price !== undefined) {
      const value = parsePrice(edit.price);
      if (value.isErr()) return ErrResult(value.error);
      patch.price = value.unwrap().raw;
    }
    if (edit.description !== undefined) {
      const value = requireText("Description", edit.description, MAX_DESCRIPTION_LENGTH);
      if (value.isErr()) return ErrResult(value.error);
      patch.description = value.unwrap();
    }
    if (!Object.keys(patch).length) {
      return ErrResult(validation("Nothing to update."));
    }

    const updated = await store.listings.update(listingId, patch, this.deps.now());
    if (updated.isErr()) return ErrResult(storeFailure("listings.update", updated.error));
    const listing = updated.unwrap();
    if (!listing) return ErrResult(new MarketError("NOT_FOUND", "This listing no longer exists."));

    await bestEffort(logger, "[listings] could not refresh listing message", { listingId }, () =>
      presenter.updateListing(listing),
    );
    return OkResult(listing);
  }

  async cancelListing(
    listingId: ListingId,
    requesterId: UserId,
  ): Promise<Result<ActiveListing, MarketError>> {
    const { store, presenter, logger } = this.deps;

    const owned = await this.ownedListing(listingId, requesterId);
    if (owned.isErr()) return owned;
    const listing = owned.unwrap();

    const removed = await store.listings.remove(listingId);
    if (removed.isErr()) return ErrResult(storeFailure("listings.remove", removed.error));
    if (!removed.unwrap()) {
      return ErrResult(new MarketError("NOT_FOUND", "This listing no longer exists."));
    }

    await bestEffort(logger, "[listings] could not retract listing messages", { listingId }, () =>
      presenter.retractListing(publishedRef(listing)),
    );
    logger.info("[listings] listing canceled", { listingId, ownerId: requesterId });
    return OkResult(listing);
  }

  async sweepExpired(at?: Date): Promise<Result<SweepReport, MarketError>> {
    const { store, presenter, settings, logger } = this.deps;
    const now = at ?? this.deps.now();
    const report: SweepReport = { pending: 0, active: 0 };

    const expired = await store.pendingListings.listExpired(now);
    if (expired.isErr()) return ErrResult(storeFailure("pendingListings.listExpired", expired.error));

    for (const pending of expired.unwrap()) {
      const removed = await store.pendingListings.removeExpired(pending._id, now);
      if (removed.isErr()) {
        logger.warn("[listings] failed to drop expired pending listing", {
          ownerId: pending._id,
          error: removed.error,
        });
        continue;
      }
      // Another sweep (or the owner's images) got there first.
      if (!removed.unwrap()) continue;
      report.pending += 1;
      await bestEffort(logger, "[listings] could not notify pending expiry", { ownerId: pending._id }, () =>
        presenter.notifyUser(pending._id, {
          kind: "PENDING_LISTING_EXPIRED",
          accountType: pending.accountType,
        }),
      );
    }

    const cutoff = new Date(now.getTime() - settings.activeListingMaxAgeMs);
    const stale = await store.listings.listCreatedBefore(cutoff);
    if (stale.isErr()) return ErrResult(storeFailure("listings.listCreatedBefore", stale.error));

    for (const listing of stale.unwrap()) {
      const removed = await store.listings.removeIfCreatedBefore(listing._id, cutoff);
      if (removed.isErr()) {
        logger.warn("[listings] failed to drop stale listing", {
          listingId: listing._id,
          error: removed.error,
        });
        continue;
      }
      if (!removed.unwrap()) continue;
      report.active += 1;
      await bestEffort(logger, "[listings] could not retract stale listing", { listingId: listing._id }, () =>
        presenter.retractListing(publishedRef(listing)),
      );
    }

    if (report.pending || report.active) {
      logger.info("[listings] sweep removed expired listings", report);
    }
    return OkResult(report);
  }

  async getListing(listingId: ListingId): Promise<Result<ActiveListing | null, MarketError>> {
    const found = await this.deps.store.listings.find(listingId);
    return found.isErr() ? ErrResult(storeFailure("listings.find", found.error)) : OkResult(found.unwrap());
  }

  async listByOwner(ownerId: UserId): Promise<Result<ActiveListing[], MarketError>> {
    const found = await this.deps.store.listings.listByOwner(ownerId);
    return found.isErr()
      ? ErrResult(storeFailure("listings.listByOwner", found.error))
      : OkResult(found.unwrap());
  }
}

export function createListingService(deps: MarketDeps): ListingService {
  return new ListingServiceImpl(deps);
}
