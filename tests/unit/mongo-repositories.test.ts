/**
 * Unit Tests: Mongo repositories
 *
 * Purpose: queries go out keyed by string ids, documents come back through the Zod schema and
 * driver failures come back as `Err`. The database handle is an in-process fake.
 */

import { beforeEach, describe, it, expect, vi } from "vitest";
import { mongoTicketRepository } from "@/db/repositories/tickets";
import { expectErr, expectOk } from "../_utils/fixtures";

const fake = vi.hoisted(() => {
  type Call = { collection: string; method: string; args: unknown[] };
  interface FakeCursor {
    sort(...args: unknown[]): FakeCursor;
    toArray(): Promise<unknown[]>;
  }

  const calls: Call[] = [];
  const state: { docs: unknown[]; failWith: Error | null } = { docs: [], failWith: null };

  const collection = (name: string) => {
    const record = (method: string, args: unknown[]) => {
      if (state.failWith) throw state.failWith;
      calls.push({ collection: name, method, args });
    };
    return {
      createIndex: async (...args: unknown[]) => {
        calls.push({ collection: name, method: "createIndex", args });
        return "index";
      },
      findOne: async (...args: unknown[]) => {
        record("findOne", args);
        return state.docs[0] ?? null;
      },
      find: (...args: unknown[]): FakeCursor => {
        record("find", args);
        const cursor: FakeCursor = {
          sort: (...sortArgs: unknown[]) => {
            record("sort", sortArgs);
            return cursor;
          },
          toArray: async () => state.docs,
        };
        return cursor;
      },
      deleteOne: async (...args: unknown[]) => {
        record("deleteOne", args);
        return { deletedCount: 1 };
      },
    };
  };

  return { calls, state, db: { collection } };
});

vi.mock("@/db/mongo", () => ({ getDb: async () => fake.db }));

const TICKET_DOC = {
  _id: "ticket-channel-1",
  userId: "buyer-1",
  status: "open",
  createdAt: new Date("2026-03-01T12:00:00Z"),
};

const callsOf = (method: string) => fake.calls.filter((call) => call.method === method);

beforeEach(() => {
  fake.calls.length = 0;
  fake.state.docs = [];
  fake.state.failWith = null;
});

describe("mongoTicketRepository", () => {
  it("creates the indexes once, on first use", async () => {
    expectOk(await mongoTicketRepository.find("ticket-channel-1"));
    expectOk(await mongoTicketRepository.find("ticket-channel-2"));

    expect(callsOf("createIndex")).toEqual([
      { collection: "support_tickets", method: "createIndex", args: [{ userId: 1, status: 1 }, {}] },
    ]);
  });

  it("looks tickets up by channel id and fills schema defaults", async () => {
    fake.state.docs = [TICKET_DOC];

    const ticket = expectOk(await mongoTicketRepository.find("ticket-channel-1"));
    expect(ticket).toEqual({ ...TICKET_DOC, closedAt: null, closedBy: null });
    expect(callsOf("findOne")).toEqual([
      { collection: "support_tickets", method: "findOne", args: [{ _id: "ticket-channel-1" }] },
    ]);
  });

  it("lists open tickets oldest first and drops invalid documents", async () => {
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => undefined);
    fake.state.docs = [TICKET_DOC, { _id: "ticket-channel-2", status: "archived" }];

    const open = expectOk(await mongoTicketRepository.listOpenByUser("buyer-1"));
    expect(open.map((row) => row._id)).toEqual(["ticket-channel-1"]);
    expect(callsOf("find")[0]?.args).toEqual([{ userId: "buyer-1", status: "open" }]);
    expect(callsOf("sort")[0]?.args).toEqual([{ createdAt: 1, _id: 1 }]);
    expect(consoleError).toHaveBeenCalledTimes(1);
    consoleError.mockRestore();
  });

  it("returns driver failures as errors", async () => {
    fake.state.failWith = new Error("connection reset");

    expect(expectErr(await mongoTicketRepository.remove("ticket-channel-1")).message).toBe("connection reset");
  });
});
