/**
 * Zod schema for support tickets (keyed by the ticket channel id).
 */
import { z } from "zod";

export const TicketStatusSchema = z.enum(["open", "closed"]);

export const SupportTicketSchema = z.object({
  _id: z.string(),
  userId: z.string(),
  status: TicketStatusSchema,
  createdAt: z.date(),
  closedAt: z.date().nullable().default(null),
  closedBy: z.string().nullable().default(null),
});

export type TicketStatus = z.infer<typeof TicketStatusSchema>;
export type SupportTicket = z.infer<typeof SupportTicketSchema>;
