/**
 * Repositorio de reputación (`user_reputation`).
 *
 * Responsabilidad:
 * - Contadores de ventas/compras y el agregado de calificaciones por usuario.
 * - Toda mutación es un update atómico sobre un único documento.
 */
import type { UpdateFilter } from "mongodb";
import { MongoCollection } from "@/db/mongo-store";
import {
  UserReputationSchema,
  type ReputationCounter,
  type ReputationDelta,
  type UserReputation,
} from "@/db/schemas/reputation";
import type { ReputationRepository } from "@/db/store";
import type { UserId } from "@/db/types";
import type { Result } from "@/utils/result";

const COUNTERS: ReputationCounter[] = ["sales", "purchases", "ratingTotal", "ratingCount"];

const reputation = new MongoCollection<UserReputation>(
  "user_reputation",
  UserReputationSchema,
);

type ReputationFields = Omit<UserReputation, "_id">;

// $setOnInsert must not touch the paths written by $inc/$set in the same update.
function insertDefaults(now: Date, touched: ReadonlySet<string>): Partial<ReputationFields> {
  const defaults: Partial<ReputationFields> = { createdAt: now };
  if (!touched.has("displayName")) defaults.displayName = null;
  for (const counter of COUNTERS) {
    if (!touched.has(counter)) defaults[counter] = 0;
  }
  return defaults;
}

function nonZero(delta: ReputationDelta): ReputationDelta {
  const inc: ReputationDelta = {};
  for (const counter of COUNTERS) {
    const value = delta[counter];
    if (value) inc[counter] = value;
  }
  return inc;
}

function refreshed(now: Date, displayName: string | null): Partial<ReputationFields> {
  return displayName ? { updatedAt: now, displayName } : { updatedAt: now };
}

export const mongoReputationRepository: ReputationRepository = {
  async find(userId: UserId): Promise<Result<UserReputation | null>> {
    return reputation.run(async (col) =>
      reputation.parse(await col.findOne({ _id: userId })),
    );
  },

  async ensure(userId, displayName, now) {
    return reputation.run(async (col) => {
      const set = refreshed(now, displayName);
      const doc = await col.findOneAndUpdate(
        { _id: userId },
        { $set: set, $setOnInsert: insertDefaults(now, new Set(Object.keys(set))) },
        { upsert: true, returnDocument: "after" },
      );
      const parsed = reputation.parse(doc);
      if (!parsed) throw new Error(`REPUTATION_UPSERT_FAILED:${userId}`);
      return parsed;
    });
  },

  async increment(userId, delta, displayName, now) {
    return reputation.run(async (col) => {
      const inc = nonZero(delta);
      const set = refreshed(now, displayName);
      const touched = new Set([...Object.keys(inc), ...Object.keys(set)]);
      const update: UpdateFilter<UserReputation> = {
        $set: set,
        $setOnInsert: insertDefaults(now, touched),
      };
      if (Object.keys(inc).length) update.$inc = inc;

      const doc = await col.findOneAndUpdate({ _id: userId }, update, {
        upsert: true,
        returnDocument: "after",
      });
      const parsed = reputation.parse(doc);
      if (!parsed) throw new Error(`REPUTATION_UPSERT_FAILED:${userId}`);
      return parsed;
    });
  },

  async subtractRatings(userId, stars, count, now) {
    return reputation.run(async (col) => {
      // Pipeline update: single-document and atomic, clamped at zero.
      const doc = await col.findOneAndUpdate(
        { _id: userId },
        [
          {
            $set: {
              ratingTotal: { $max: [0, { $subtract: ["$ratingTotal", stars] }] },
              ratingCount: { $max: [0, { $subtract: ["$ratingCount", count] }] },
              updatedAt: now,
            },
          },
        ],
        { returnDocument: "after" },
      );
      return reputation.parse(doc);
    });
  },

  async clearRatings(userId, now) {
    return reputation.run(async (col) => {
      const res = await col.updateOne(
        { _id: userId },
        { $set: { ratingTotal: 0, ratingCount: 0, updatedAt: now } },
      );
      return res.matchedCount > 0;
    });
  },

  async remove(userId) {
    return reputation.run(async (col) => {
      const res = await col.deleteOne({ _id: userId });
      return res.deletedCount > 0;
    });
  },
};
