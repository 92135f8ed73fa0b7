import "reflect-metadata";
import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import { Dispatcher, getGlobalDispatcher, MockAgent, setGlobalDispatcher } from "undici";
import { CommentariatClient } from "../CommentariatClient";
import { MockLogger } from "../../logging/__tests__/MockLogger";
import { createTestConfig } from "../../../__tests__/helpers/fakes";

const ORIGIN = "https://commentary.test";

describe("CommentariatClient", () => {
  let agent: MockAgent;
  let original: Dispatcher;
  let logger: MockLogger;
  let client: CommentariatClient;

  beforeEach(() => {
    original = getGlobalDispatcher();
    agent = new MockAgent();
    agent.disableNetConnect();
    setGlobalDispatcher(agent);

    logger = new MockLogger();
    client = new CommentariatClient(createTestConfig(), logger);
  });

  afterEach(async () => {
    await agent.close();
    setGlobalDispatcher(original);
  });

  it("should fetch the first verse's commentary and clean its text", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: "/commentaries/mhc/John/3/16", method: "GET" })
      .reply(200, {
        commentary: { name: "Matthew Henry's Commentary" },
        entries: [{ verse_start: 16, verse_end: 17, text: "God *so* loved.\\parMore." }],
      });

    const result = await client.lookup("John 3:16-17", "mhc");

    expect(result).toEqual({
      source: "mhc",
      sourceName: "Matthew Henry's Commentary",
      reference: "John 3:16-17",
      entries: [{ verseStart: 16, verseEnd: 17, text: "God so loved.\n\nMore." }],
    });
  });

  it("should ask for a whole chapter and encode the book name", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: "/commentaries/calvincommentaries/1%20Corinthians/13", method: "GET" })
      .reply(200, { entries: [{ verse_start: 1, verse_end: 13, text: "Love." }] });

    const result = await client.lookup("1 Corinthians 13", "calvincommentaries");

    expect(result?.sourceName).toBe("calvincommentaries");
    expect(result?.entries).toHaveLength(1);
  });

  it("should resolve to null for 404 without logging", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: "/commentaries/mhc/John/3/16", method: "GET" })
      .reply(404, { error: "not found" });

    await expect(client.lookup("John 3:16", "mhc")).resolves.toBeNull();
    expect(logger.warnCalls).toEqual([]);
  });

  it("should resolve to null and warn on error statuses", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: "/commentaries/mhc/John/3/16", method: "GET" })
      .reply(500, "boom");

    await expect(client.lookup("John 3:16", "mhc")).resolves.toBeNull();
    expect(logger.warnCalls[0]).toEqual({
      message: "Commentary lookup failed",
      context: { reference: "John 3:16", source: "mhc", statusCode: 500 },
    });
  });

  it("should resolve to null when there are no entries", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: "/commentaries/mhc/John/3/16", method: "GET" })
      .reply(200, { entries: [] });

    await expect(client.lookup("John 3:16", "mhc")).resolves.toBeNull();
  });

  it("should resolve to null on transport failures", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: "/commentaries/mhc/John/3/16", method: "GET" })
      .replyWithError(new Error("socket hang up"));

    await expect(client.lookup("John 3:16", "mhc")).resolves.toBeNull();
    expect(logger.warnCalls[0].message).toBe("Commentary lookup error");
  });

  it("should resolve to null for references it cannot parse", async () => {
    await expect(client.lookup("Not A Book 1", "mhc")).resolves.toBeNull();
    expect(logger.warnCalls[0].context).toEqual({
      reference: "Not A Book 1",
      reason: "Unknown book 'Not A Book'.",
    });
  });
});
