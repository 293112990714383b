/**
 * Repositorio de listados: pendientes (`pending_listings`, uno por dueño) y publicados
 * (`active_listings`).
 *
 * @remarks
 * `take` usa `findOneAndDelete` para que un listado pendiente se publique una sola vez aunque el
 * dueño mande imágenes dos veces seguidas.
 */
import { MongoCollection } from "@/db/mongo-store";
import {
  ActiveListingSchema,
  PendingListingSchema,
  type ActiveListing,
  type PendingListing,
} from "@/db/schemas/listing";
import type { ListingRepository, PendingListingRepository } from "@/db/store";

const pending = new MongoCollection<PendingListing>(
  "pending_listings",
  PendingListingSchema,
  [{ key: { expiresAt: 1 } }],
);

const active = new MongoCollection<ActiveListing>(
  "active_listings",
  ActiveListingSchema,
  [{ key: { ownerId: 1 } }, { key: { createdAt: 1 } }],
);

export const mongoPendingListingRepository: PendingListingRepository = {
  async save(listing) {
    return pending.run(async (col) => {
      await col.replaceOne({ _id: listing._id }, listing, { upsert: true });
    });
  },

  async take(ownerId) {
    return pending.run(async (col) =>
      pending.parse(await col.findOneAndDelete({ _id: ownerId })),
    );
  },

  async remove(ownerId) {
    return pending.run(async (col) => {
      const res = await col.deleteOne({ _id: ownerId });
      return res.deletedCount > 0;
    });
  },

  async listExpired(now) {
    return pending.run(async (col) =>
      pending.parseMany(await col.find({ expiresAt: { $lte: now } }).toArray()),
    );
  },

  async removeExpired(ownerId, now) {
    return pending.run(async (col) => {
      const res = await col.deleteOne({ _id: ownerId, expiresAt: { $lte: now } });
      return res.deletedCount > 0;
    });
  },
};

export const mongoListingRepository: ListingRepository = {
  async insert(listing) {
    return active.run(async (col) => {
      await col.insertOne(listing);
    });
  },

  async find(id) {
    return active.run(async (col) => active.parse(await col.findOne({ _id: id })));
  },

  async listByOwner(ownerId) {
    return active.run(async (col) =>
      active.parseMany(
        await col.find({ ownerId }).sort({ createdAt: 1 }).toArray(),
      ),
    );
  },

  async countByOwner(ownerId) {
    return active.run(async (col) => col.countDocuments({ ownerId }));
  },

  async update(id, patch, now) {
    return active.run(async (col) =>
      active.parse(
        await col.findOneAndUpdate(
          { _id: id },
          { $set: { ...patch, updatedAt: now } },
          { returnDocument: "after" },
        ),
      ),
    );
  },

  async remove(id) {
    return active.run(async (col) => {
      const res = await col.deleteOne({ _id: id });
      return res.deletedCount > 0;
    });
  },

  async listCreatedBefore(cutoff) {
    return active.run(async (col) =>
      active.parseMany(await col.find({ createdAt: { $lte: cutoff } }).toArray()),
    );
  },

  async removeIfCreatedBefore(id, cutoff) {
    return active.run(async (col) => {
      const res = await col.deleteOne({ _id: id, createdAt: { $lte: cutoff } });
      return res.deletedCount > 0;
    });
  },
};
