/**
 * Repositorio de sesiones de trade (`trades`) e historial (`trade_history`).
 *
 * @remarks
 * Las transiciones de estado son CAS sobre `status`: solo un caller gana cada transición, y eso es
 * lo que garantiza que un trade se finaliza o cancela una única vez.
 */
import { isDuplicateKeyError, MongoCollection } from "@/db/mongo-store";
import {
  TradeHistorySchema,
  TradeSessionSchema,
  type TradeHistoryEntry,
  type TradeSession,
} from "@/db/schemas/trade";
import type { TradeHistoryRepository, TradeRepository } from "@/db/store";
import { toError } from "@/utils/result";

const OPEN_TRADE_INDEX = "uniq_negotiating_trade_per_buyer";

const trades = new MongoCollection<TradeSession>("trades", TradeSessionSchema, [
  {
    key: { listingId: 1, buyerId: 1 },
    options: {
      name: OPEN_TRADE_INDEX,
      unique: true,
      partialFilterExpression: { status: "NEGOTIATING" },
    },
  },
]);

const history = new MongoCollection<TradeHistoryEntry>(
  "trade_history",
  TradeHistorySchema,
  [{ key: { sellerId: 1 } }, { key: { buyerId: 1 } }],
);

const mapInsertError = (error: unknown): Error =>
  isDuplicateKeyError(error) ? new Error("TRADE_ALREADY_OPEN") : toError(error);

export const mongoTradeRepository: TradeRepository = {
  async insert(trade) {
    return trades.run(async (col) => {
      await col.insertOne(trade);
    }, mapInsertError);
  },

  async find(id) {
    return trades.run(async (col) => trades.parse(await col.findOne({ _id: id })));
  },

  async findOpen(listingId, buyerId) {
    return trades.run(async (col) =>
      trades.parse(
        await col.findOne({
          listingId,
          buyerId,
          status: { $in: ["NEGOTIATING", "FINALIZING"] },
        }),
      ),
    );
  },

  async addConfirmations(id, partyIds, now) {
    return trades.run(async (col) =>
      trades.parse(
        await col.findOneAndUpdate(
          { _id: id, status: "NEGOTIATING" },
          {
            $addToSet: { confirmedBy: { $each: partyIds } },
            $set: { updatedAt: now },
          },
          { returnDocument: "after" },
        ),
      ),
    );
  },

  async transition(id, from, to, patch, now) {
    return trades.run(async (col) =>
      trades.parse(
        await col.findOneAndUpdate(
          { _id: id, status: from },
          { $set: { ...patch, status: to, updatedAt: now } },
          { returnDocument: "after" },
        ),
      ),
    );
  },
};

export const mongoTradeHistoryRepository: TradeHistoryRepository = {
  async append(entry) {
    const { _id, ...fields } = entry;
    return history.run(async (col) => {
      await col.updateOne({ _id }, { $setOnInsert: fields }, { upsert: true });
    });
  },
};
