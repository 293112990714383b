/**
 * Repositorio de tickets de soporte (`support_tickets`, `_id` = canal del ticket).
 */
import { MongoCollection } from "@/db/mongo-store";
import { SupportTicketSchema, type SupportTicket } from "@/db/schemas/ticket";
import type { TicketRepository } from "@/db/store";

const tickets = new MongoCollection<SupportTicket>(
  "support_tickets",
  SupportTicketSchema,
  [{ key: { userId: 1, status: 1 } }],
);

export const mongoTicketRepository: TicketRepository = {
  async insert(ticket) {
    return tickets.run(async (col) => {
      await col.insertOne(ticket);
    });
  },

  async find(channelId) {
    return tickets.run(async (col) => tickets.parse(await col.findOne({ _id: channelId })));
  },

  async listOpenByUser(userId) {
    return tickets.run(async (col) =>
      tickets.parseMany(
        await col.find({ userId, status: "open" }).sort({ createdAt: 1, _id: 1 }).toArray(),
      ),
    );
  },

  async close(channelId, closedBy, now) {
    return tickets.run(async (col) =>
      tickets.parse(
        await col.findOneAndUpdate(
          { _id: channelId, status: "open" },
          { $set: { status: "closed", closedAt: now, closedBy } },
          { returnDocument: "after" },
        ),
      ),
    );
  },

  async remove(channelId) {
    return tickets.run(async (col) => {
      const res = await col.deleteOne({ _id: channelId });
      return res.deletedCount > 0;
    });
  },

  async counts() {
    return tickets.run(async (col) => {
      const [open, total] = await Promise.all([
        col.countDocuments({ status: "open" }),
        col.countDocuments({}),
      ]);
      return { open, total };
    });
  },
};
