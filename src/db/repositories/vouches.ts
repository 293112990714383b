/**
 * Repositorio de vouches: slots pendientes por trade (`pending_vouches`) y vouches permanentes
 * (`vouches`, `_id` = `${tradeId}:${raterId}`).
 *
 * @remarks
 * El par pendiente es un único documento: escribir un slot y "tomar el par completo" son
 * operaciones atómicas sobre ese documento, así que un par se publica como mucho una vez.
 */
import type { Filter } from "mongodb";
import { MongoCollection } from "@/db/mongo-store";
import {
  PendingVouchPairSchema,
  VouchSchema,
  vouchKey,
  type PendingVouchPair,
  type Vouch,
} from "@/db/schemas/vouch";
import type { VouchRepository } from "@/db/store";
import type { UserId } from "@/db/types";
import type { Result } from "@/utils/result";

const pairs = new MongoCollection<PendingVouchPair>(
  "pending_vouches",
  PendingVouchPairSchema,
  [{ key: { "slots.buyer.ratedId": 1 } }, { key: { "slots.seller.ratedId": 1 } }],
);

const vouches = new MongoCollection<Vouch>("vouches", VouchSchema, [
  { key: { ratedId: 1, createdAt: -1 } },
  { key: { raterId: 1 } },
  { key: { tradeId: 1 } },
]);

async function removeMatching(filter: Filter<Vouch>): Promise<Result<Vouch[]>> {
  return vouches.run(async (col) => {
    const found = vouches.parseMany(await col.find(filter).toArray());
    if (!found.length) return [];
    // Only the rows read above are removed, so the caller adjusts aggregates for exactly those.
    await col.deleteMany({ _id: { $in: found.map((v) => v._id) } });
    return found;
  });
}

const slotAbout = (userId: UserId) => [
  { "slots.buyer.ratedId": userId },
  { "slots.seller.ratedId": userId },
];

export const mongoVouchRepository: VouchRepository = {
  async upsertSlot(tradeId, role, slot, now) {
    const other = role === "buyer" ? "seller" : "buyer";
    return pairs.run(async (col) => {
      const before = await col.findOneAndUpdate(
        { _id: tradeId },
        {
          $set: { [`slots.${role}`]: slot, updatedAt: now },
          $setOnInsert: { [`slots.${other}`]: null, createdAt: now },
        },
        { upsert: true, returnDocument: "before" },
      );
      const previous = pairs.parse(before);
      return previous ? previous.slots[role] : null;
    });
  },

  async takeCompletePair(tradeId) {
    return pairs.run(async (col) =>
      pairs.parse(
        await col.findOneAndDelete({
          _id: tradeId,
          "slots.buyer": { $ne: null },
          "slots.seller": { $ne: null },
        }),
      ),
    );
  },

  async restorePair(pair) {
    return pairs.run(async (col) => {
      await col.replaceOne({ _id: pair._id }, pair, { upsert: true });
    });
  },

  async insertVouches(rows) {
    return vouches.run(async (col) => {
      if (rows.length) await col.insertMany(rows);
    });
  },

  async hasVouch(tradeId, raterId) {
    return vouches.run(async (col) => {
      const count = await col.countDocuments({ _id: vouchKey(tradeId, raterId) }, { limit: 1 });
      return count > 0;
    });
  },

  async listReceived(userId, limit) {
    return vouches.run(async (col) =>
      vouches.parseMany(
        await col.find({ ratedId: userId }).sort({ createdAt: -1 }).limit(limit).toArray(),
      ),
    );
  },

  async removeForTrade(tradeId) {
    return removeMatching({ tradeId });
  },

  async removeBetween(raterId, ratedId) {
    return removeMatching({ raterId, ratedId });
  },

  async removeReceived(userId) {
    return removeMatching({ ratedId: userId });
  },

  async removeInvolving(userId) {
    return removeMatching({ $or: [{ raterId: userId }, { ratedId: userId }] });
  },

  async clearSlotsAbout(userId, now) {
    return pairs.run(async (col) => {
      const buyer = await col.updateMany(
        { "slots.buyer.ratedId": userId },
        { $set: { "slots.buyer": null, updatedAt: now } },
      );
      const seller = await col.updateMany(
        { "slots.seller.ratedId": userId },
        { $set: { "slots.seller": null, updatedAt: now } },
      );
      return buyer.modifiedCount + seller.modifiedCount;
    });
  },

  async removePairsInvolving(userId) {
    return pairs.run(async (col) => {
      const res = await col.deleteMany({
        $or: [
          ...slotAbout(userId),
          { "slots.buyer.raterId": userId },
          { "slots.seller.raterId": userId },
        ],
      });
      return res.deletedCount;
    });
  },
};
